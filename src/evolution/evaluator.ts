import { deepEqual } from '../utils/guards.js';

const FAILURE_PHRASES = ['error', 'failed', 'cannot', 'unable', 'sorry', 'please provide'];

/**
 * Heuristic success score in [0, 1] for a run's output. With an expected
 * value the output is compared to it; without one, strings are judged by
 * failure phrases and length.
 */
export function evaluateResult(result: unknown, expected?: unknown): number {
  if (expected !== undefined && expected !== null) {
    if (typeof expected === 'string' && typeof result === 'string') {
      const want = expected.toLowerCase();
      const got = result.toLowerCase();
      if (got.includes(want)) return 1.0;
      if (want.split(/\s+/).some(word => word !== '' && got.includes(word))) return 0.7;
      return 0.3;
    }
    return deepEqual(result, expected) ? 1.0 : 0.5;
  }

  if (result === null || result === undefined) return 0.0;

  if (typeof result === 'string') {
    const lower = result.toLowerCase();
    if (FAILURE_PHRASES.some(phrase => lower.includes(phrase))) return 0.3;
    if (result.length < 10) return 0.4;
    if (result.length > 50) return 0.8;
    return 0.6;
  }

  return 0.5;
}
