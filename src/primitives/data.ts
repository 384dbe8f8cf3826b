import type { Primitive } from './types.js';
import { deepEqual, isRecord, isTruthy } from '../utils/guards.js';

function field(item: unknown, key: string): unknown {
  return isRecord(item) ? item[key] : undefined;
}

function compare(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export const get: Primitive = {
  name: 'get',
  description: 'Read a context variable, falling back to the input',
  invoke(input, args, { variables }) {
    const key = args.key;
    if (typeof key === 'string' && key && Object.prototype.hasOwnProperty.call(variables, key)) {
      return variables[key];
    }
    return input;
  },
};

export const set: Primitive = {
  name: 'set',
  description: 'Write the input to a context variable',
  invoke(input, args, { variables }) {
    if (typeof args.key === 'string' && args.key) {
      variables[args.key] = input;
    }
    return input;
  },
};

export const merge: Primitive = {
  name: 'merge',
  description: 'Merge a list of objects into one',
  invoke(input) {
    if (Array.isArray(input)) {
      const result: Record<string, unknown> = {};
      for (const item of input) {
        if (isRecord(item)) Object.assign(result, item);
      }
      return result;
    }
    if (isRecord(input)) return input;
    return { value: input };
  },
};

export const filter: Primitive = {
  name: 'filter',
  description: 'Keep list items by threshold, value or truthiness',
  invoke(input, args) {
    if (!Array.isArray(input)) {
      return isTruthy(input) ? [input] : [];
    }
    const key = typeof args.key === 'string' ? args.key : undefined;
    const threshold = args.threshold;

    if (key && typeof threshold === 'number') {
      return input.filter(item => {
        const value = field(item, key) ?? 0;
        return typeof value === 'number' && value >= threshold;
      });
    }
    if (key && args.value !== undefined && args.value !== null) {
      return input.filter(item => deepEqual(field(item, key), args.value));
    }
    return input.filter(isTruthy);
  },
};

export const map: Primitive = {
  name: 'map',
  description: 'Pluck a key from every list item',
  invoke(input, args) {
    const items = Array.isArray(input) ? input : [input];
    const key = args.key;
    if (typeof key === 'string' && key) {
      return items.map(item => (isRecord(item) ? item[key] : item));
    }
    return items;
  },
};

export const first: Primitive = {
  name: 'first',
  description: 'First element of a list',
  invoke(input) {
    return Array.isArray(input) && input.length > 0 ? input[0] : input;
  },
};

export const sort: Primitive = {
  name: 'sort',
  description: 'Stable sort, optionally by a key',
  invoke(input, args) {
    if (!Array.isArray(input)) return [input];
    const by = typeof args.by === 'string' ? args.by : undefined;
    const direction = args.order === 'desc' ? -1 : 1;
    const keyOf = (item: unknown): unknown => (by && isRecord(item) ? (item[by] ?? 0) : item);
    return [...input].sort((a, b) => direction * compare(keyOf(a), keyOf(b)));
  },
};

export interface StateDiff {
  changes: Array<{ key: string; old: unknown; new: unknown }>;
  added: string[];
  removed: string[];
}

export const diff: Primitive = {
  name: 'diff',
  description: 'Key-level difference between [old, new] objects',
  invoke(input): StateDiff {
    const result: StateDiff = { changes: [], added: [], removed: [] };
    if (!Array.isArray(input) || input.length < 2) return result;

    const [before, after] = input;
    if (!isRecord(before) || !isRecord(after)) return result;

    for (const key of Object.keys(after)) {
      if (!(key in before)) {
        result.added.push(key);
      } else if (!deepEqual(before[key], after[key])) {
        result.changes.push({ key, old: before[key], new: after[key] });
      }
    }
    for (const key of Object.keys(before)) {
      if (!(key in after)) result.removed.push(key);
    }
    return result;
  },
};

export const DATA_PRIMITIVES: Primitive[] = [get, set, merge, filter, map, first, sort, diff];
