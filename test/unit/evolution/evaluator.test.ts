import { describe, it, expect } from 'vitest';
import { evaluateResult } from '../../../src/evolution/evaluator.js';

describe('evaluateResult', () => {
  describe('with an expected value', () => {
    it('should score containment, word overlap and misses', () => {
      expect(evaluateResult('The capital is Paris', 'paris')).toBe(1.0);
      expect(evaluateResult('a whale, surely', 'blue whale')).toBe(0.7);
      expect(evaluateResult('green', 'blue')).toBe(0.3);
    });

    it('should compare structured values for equality', () => {
      expect(evaluateResult({ a: [1] }, { a: [1] })).toBe(1.0);
      expect(evaluateResult({ a: [1] }, { a: [2] })).toBe(0.5);
    });
  });

  describe('without an expected value', () => {
    it('should score a missing result as 0', () => {
      expect(evaluateResult(undefined)).toBe(0);
      expect(evaluateResult(null)).toBe(0);
    });

    it('should penalise failure phrases', () => {
      expect(evaluateResult('Sorry, I am unable to help with that request today.')).toBe(0.3);
    });

    it('should judge strings by length', () => {
      expect(evaluateResult('short')).toBe(0.4);
      expect(evaluateResult('a medium length answer')).toBe(0.6);
      expect(evaluateResult('x'.repeat(60))).toBe(0.8);
    });

    it('should give other values a neutral score', () => {
      expect(evaluateResult(42)).toBe(0.5);
    });
  });
});
