import type { Unit } from '../graph/unit.js';
import type { UnitloomConfig } from '../core/types.js';

export type EvolutionConfig = UnitloomConfig['evolution'];

/** Chosen member name per pool; null where the pool is empty */
export type Selections = Record<string, string | null>;

export interface PoolMember {
  pool: string;
  name: string;
  unit: Unit;
}

export interface Composition {
  selections: Selections;
  unit: Unit;
}

export interface EvolvedMember {
  pool: string;
  name: string;
  unit: Unit;
}

export interface EvolutionTask {
  intent?: string;
  input?: Record<string, unknown>;
  expected?: unknown;
}

export interface StepResult {
  intent: string;
  selections: Selections;
  output: unknown;
  success: number;
  evolved: boolean;
}

export interface RoundResult {
  round: number;
  results: StepResult[];
  avgSuccess: number;
}

export interface LoopResult {
  rounds: RoundResult[];
  totalTasks: number;
  improvement: number;
}

// ─── Events ───

export interface StepEvent {
  result: StepResult;
}

export interface EvolvedEvent {
  pool: string;
  from: string;
  to: string;
  reason?: string;
}

export interface PrunedEvent {
  pool: string;
  names: string[];
}
