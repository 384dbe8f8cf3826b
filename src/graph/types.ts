/**
 * Graph Model Type Definitions
 *
 * A unit is a small program held as data: nodes (steps), edges (dependencies)
 * and two drive scalars, tension and importance.
 */

import type { Unit } from './unit.js';

export const UNIT_TYPES = ['sense', 'act', 'feedback', 'composite', 'blueprint'] as const;
export const NODE_TYPES = ['input', 'process', 'output'] as const;
export const PHASES = ['sense', 'act', 'feedback'] as const;
export const NODE_STATES = ['pending', 'active', 'completed', 'failed'] as const;

export type UnitType = (typeof UNIT_TYPES)[number];
export type NodeType = (typeof NODE_TYPES)[number];
export type Phase = (typeof PHASES)[number];
export type NodeState = (typeof NODE_STATES)[number];

/**
 * Where a node takes its input from. Variable references are resolved against
 * the run's shared context; a missing variable resolves to `undefined`.
 */
export type InputRef =
  | { kind: 'var'; name: string }
  | { kind: 'literal'; value: unknown }
  | { kind: 'list'; items: InputRef[] };

export interface UnitNode {
  id: string;
  type: NodeType;
  /** Advisory grouping; only the cycle fallback orders by it */
  phase: Phase;
  description: string;
  primitive?: string;
  unitRef?: string;
  input?: InputRef;
  /** Context variable the node's value is bound to */
  output?: string;
  args: Record<string, unknown>;
  tension: number;
  state: NodeState;
}

export interface Edge {
  from: string;
  to: string;
  /** Carried through storage; the scheduler does not evaluate it */
  condition?: string;
}

export interface TensionProfile {
  maxTension: number;
  nodeConflicts: string[];
  barriers: string[];
  unresolvedDesires: string[];
  blockedBy: string[];
}

export interface UnitMetadata {
  createdAt: string;
  updatedAt: string;
  version: number;
  parentId: string | null;
  deadline?: string;
}

/**
 * Fields accepted by `Unit.create`. Profile and metadata are filled with
 * defaults when omitted.
 */
export interface UnitInit {
  id: string;
  type?: UnitType;
  intent: string;
  phases?: Phase[];
  tension: number;
  importance: number;
  nodes: UnitNode[];
  edges: Edge[];
  tensionProfile?: Partial<TensionProfile>;
  metadata?: Partial<UnitMetadata>;
}

/**
 * Anything that can hand the interpreter a unit by reference.
 */
export type UnitLoader = (ref: string) => Promise<Unit | null>;
