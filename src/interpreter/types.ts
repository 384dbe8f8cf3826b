import type { UnitLoader } from '../graph/types.js';

export type HistoryAction = 'completed' | 'failed';

export interface HistoryEntry {
  nodeId: string;
  action: HistoryAction;
  /** Node value, or the error message for a failure */
  result: unknown;
}

export interface RunResult {
  /** Value of the last node that completed */
  result: unknown;
  context: Record<string, unknown>;
  history: HistoryEntry[];
  errors: string[];
  success: boolean;
}

export interface InterpreterOptions {
  loader?: UnitLoader;
  /** Deepest allowed sub-unit nesting */
  maxDepth?: number;
}

export interface MainLoopOptions {
  /** Stop once the root's tension is at or below this */
  threshold?: number;
  maxIterations?: number;
  initialContext?: Record<string, unknown>;
}

export interface MainLoopResult {
  result: unknown;
  iterations: number;
  finalTension: number;
  context: Record<string, unknown>;
}
