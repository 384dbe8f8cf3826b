export { Interpreter, topologicalOrder, orderByPhase, executionOrder } from './interpreter.js';
export { MainLoop, nextTension } from './main-loop.js';
export { ExecutionContext } from './context.js';
export type {
  RunResult,
  HistoryEntry,
  HistoryAction,
  InterpreterOptions,
  MainLoopOptions,
  MainLoopResult,
} from './types.js';
