import type { Primitive } from './types.js';
import { isRecord, isTruthy } from '../utils/guards.js';

const MAX_LOOP_ITEMS = 100;

/**
 * Two named conditions are understood; anything else is a truthiness test.
 */
export const ifPrimitive: Primitive = {
  name: 'if',
  description: 'Choose between two values by a condition on the input',
  invoke(input, args) {
    const condition = typeof args.condition === 'string' ? args.condition : '';
    const thenValue = 'then' in args ? args.then : true;
    const elseValue = 'else' in args ? args.else : false;

    let holds: boolean;
    switch (condition) {
      case 'success < 0.5': {
        const success = isRecord(input) && typeof input.success === 'number' ? input.success : 1.0;
        holds = success < 0.5;
        break;
      }
      case 'result != null':
        holds = input !== null && input !== undefined;
        break;
      default:
        holds = isTruthy(input);
    }
    return holds ? thenValue : elseValue;
  },
};

export const loop: Primitive = {
  name: 'loop',
  description: 'Bound a list to at most `max` items',
  invoke(input, args) {
    if (!Array.isArray(input)) return [input];
    const max = typeof args.max === 'number' ? args.max : MAX_LOOP_ITEMS;
    return input.slice(0, max);
  },
};

export const branch: Primitive = {
  name: 'branch',
  description: 'Map the input onto a named branch',
  invoke(input, args) {
    const branches = isRecord(args.branches) ? args.branches : {};
    const fallback = 'default' in args ? args.default : 'main';
    if (typeof input === 'string' && Object.prototype.hasOwnProperty.call(branches, input)) {
      return branches[input];
    }
    return fallback;
  },
};

export const CONTROL_PRIMITIVES: Primitive[] = [ifPrimitive, loop, branch];
