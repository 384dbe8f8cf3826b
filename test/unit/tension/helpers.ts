import { Unit } from '../../../src/graph/unit.js';
import { createNode } from '../../../src/graph/builder.js';
import type { NodeState } from '../../../src/graph/types.js';

export interface TensionUnitOptions {
  importance?: number;
  tension?: number;
  deadline?: string;
  blockedBy?: string[];
  states?: NodeState[];
}

export function tensionUnit(id: string, options: TensionUnitOptions = {}): Unit {
  const states = options.states ?? ['pending'];
  return Unit.create({
    id,
    intent: `Unit ${id}`,
    tension: options.tension ?? 0.5,
    importance: options.importance ?? 0.5,
    nodes: states.map((state, i) => ({ ...createNode(`n${i + 1}`, 'emit'), state })),
    edges: [],
    tensionProfile: { blockedBy: options.blockedBy ?? [] },
    metadata: options.deadline !== undefined ? { deadline: options.deadline } : {},
  });
}
