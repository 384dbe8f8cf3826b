import type { Primitive } from './types.js';
import { calculateTension, propagateTensionUp } from '../tension/calculus.js';
import { asNumber, isRecord } from '../utils/guards.js';

function tensionOf(item: unknown, fallback: number): number {
  return isRecord(item) ? asNumber(item.tension, fallback) : fallback;
}

export const calculateTensionPrimitive: Primitive = {
  name: 'calculate_tension',
  description: 'Tension from importance, urgency, unresolved and blocking factors',
  invoke(input, _args, { services }) {
    if (!isRecord(input)) return 0.5;
    return calculateTension(
      {
        importance: asNumber(input.importance, 0.5),
        urgency: asNumber(input.urgency, 0.5),
        unresolved: asNumber(input.unresolved, 0.5),
        blocking: asNumber(input.blocking, 0),
      },
      services.tension,
    );
  },
};

export const propagateTension: Primitive = {
  name: 'propagate_tension',
  description: 'Combine child tensions into a parent tension',
  invoke(input, _args, { services }) {
    if (!Array.isArray(input)) {
      return { tension: tensionOf(input, 0.5) };
    }
    if (input.length === 0) return { tension: 0.5 };

    const tensions = input.map(item => tensionOf(item, 0.5));
    return {
      tension: propagateTensionUp(tensions, services.tension),
      max: Math.max(...tensions),
      avg: tensions.reduce((a, b) => a + b, 0) / tensions.length,
    };
  },
};

export const getHighestTension: Primitive = {
  name: 'get_highest_tension',
  description: 'The list item with the highest tension',
  invoke(input) {
    if (!Array.isArray(input)) return input;
    if (input.length === 0) return null;

    let best: unknown = input[0];
    for (const item of input.slice(1)) {
      if (tensionOf(item, 0) > tensionOf(best, 0)) best = item;
    }
    return best;
  },
};

export const TENSION_PRIMITIVES: Primitive[] = [calculateTensionPrimitive, propagateTension, getHighestTension];
