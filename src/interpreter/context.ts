import { stripVarPrefix, resolveInputRef } from '../graph/reference.js';
import type { InputRef } from '../graph/types.js';
import type { HistoryAction, HistoryEntry } from './types.js';

/**
 * Mutable state of one run: variables shared by every node, plus the
 * history and error log.
 */
export class ExecutionContext {
  readonly variables: Record<string, unknown>;
  readonly history: HistoryEntry[] = [];
  readonly errors: string[] = [];

  constructor(initial: Record<string, unknown> = {}) {
    this.variables = initial;
  }

  set(name: string, value: unknown): void {
    this.variables[stripVarPrefix(name)] = value;
  }

  get(name: string): unknown {
    const key = stripVarPrefix(name);
    return Object.prototype.hasOwnProperty.call(this.variables, key) ? this.variables[key] : undefined;
  }

  resolve(ref: InputRef | undefined): unknown {
    return resolveInputRef(ref, this.variables);
  }

  log(nodeId: string, action: HistoryAction, result: unknown): void {
    this.history.push({ nodeId, action, result });
  }

  addError(error: string): void {
    this.errors.push(error);
  }
}
