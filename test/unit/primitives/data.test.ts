import { describe, it, expect } from 'vitest';
import { get, set, merge, filter, map, first, sort, diff } from '../../../src/primitives/data.js';
import { makeScope } from '../../helpers/fixtures.js';

describe('data primitives', () => {
  describe('get', () => {
    it('should read a context variable', () => {
      expect(get.invoke('fallback', { key: 'name' }, makeScope({ name: 'Ada' }))).toBe('Ada');
    });

    it('should fall back to the input for a missing key', () => {
      expect(get.invoke('fallback', { key: 'missing' }, makeScope())).toBe('fallback');
    });

    it('should ignore inherited properties', () => {
      expect(get.invoke('fallback', { key: 'toString' }, makeScope())).toBe('fallback');
    });

    it('should return a stored falsy value', () => {
      expect(get.invoke('fallback', { key: 'count' }, makeScope({ count: 0 }))).toBe(0);
    });
  });

  describe('set', () => {
    it('should write the input into the context and pass it on', () => {
      const variables: Record<string, unknown> = {};
      expect(set.invoke(42, { key: 'answer' }, makeScope(variables))).toBe(42);
      expect(variables).toEqual({ answer: 42 });
    });
  });

  describe('merge', () => {
    it('should merge objects left to right, skipping non-objects', () => {
      expect(merge.invoke([{ a: 1 }, { b: 2 }, 'x', { a: 3 }], {}, makeScope())).toEqual({ a: 3, b: 2 });
    });

    it('should wrap a scalar', () => {
      expect(merge.invoke(5, {}, makeScope())).toEqual({ value: 5 });
    });

    it('should return an object input unchanged', () => {
      const input = { k: 'v' };
      expect(merge.invoke(input, {}, makeScope())).toBe(input);
    });
  });

  describe('filter', () => {
    it('should keep items at or above a threshold, treating a missing field as 0', () => {
      const items = [{ score: 0.9 }, { score: 0.3 }, {}];
      expect(filter.invoke(items, { key: 'score', threshold: 0.5 }, makeScope())).toEqual([{ score: 0.9 }]);
      expect(filter.invoke(items, { key: 'score', threshold: 0 }, makeScope())).toEqual(items);
    });

    it('should match a field value structurally', () => {
      const items = [{ tag: ['a'] }, { tag: ['b'] }];
      expect(filter.invoke(items, { key: 'tag', value: ['a'] }, makeScope())).toEqual([{ tag: ['a'] }]);
    });

    it('should fall back to truthiness', () => {
      expect(filter.invoke([0, '', [], {}, 'x', 1], {}, makeScope())).toEqual(['x', 1]);
    });

    it('should wrap a truthy non-list and drop a falsy one', () => {
      expect(filter.invoke('x', {}, makeScope())).toEqual(['x']);
      expect(filter.invoke('', {}, makeScope())).toEqual([]);
    });
  });

  describe('map', () => {
    it('should pluck a key, passing non-objects through', () => {
      expect(map.invoke([{ name: 'a' }, { name: 'b' }, 'raw'], { key: 'name' }, makeScope())).toEqual([
        'a',
        'b',
        'raw',
      ]);
    });

    it('should wrap a single value', () => {
      expect(map.invoke({ name: 'solo' }, { key: 'name' }, makeScope())).toEqual(['solo']);
    });
  });

  describe('first', () => {
    it('should take the head of a list', () => {
      expect(first.invoke([3, 4], {}, makeScope())).toBe(3);
    });

    it('should return an empty list or a scalar unchanged', () => {
      expect(first.invoke([], {}, makeScope())).toEqual([]);
      expect(first.invoke('one', {}, makeScope())).toBe('one');
    });
  });

  describe('sort', () => {
    it('should sort numbers numerically', () => {
      expect(sort.invoke([10, 9, 100], {}, makeScope())).toEqual([9, 10, 100]);
    });

    it('should sort strings lexically', () => {
      expect(sort.invoke(['pear', 'apple', 'fig'], {}, makeScope())).toEqual(['apple', 'fig', 'pear']);
    });

    it('should sort by key, descending, with a missing key as 0', () => {
      const items = [{ n: 'a', score: 2 }, { n: 'b', score: 5 }, { n: 'c' }];
      expect(sort.invoke(items, { by: 'score', order: 'desc' }, makeScope())).toEqual([
        { n: 'b', score: 5 },
        { n: 'a', score: 2 },
        { n: 'c' },
      ]);
    });

    it('should not reorder its input', () => {
      const items = [2, 1];
      sort.invoke(items, {}, makeScope());
      expect(items).toEqual([2, 1]);
    });
  });

  describe('diff', () => {
    it('should report changed, added and removed keys', () => {
      expect(diff.invoke([{ a: 1, b: 2, gone: true }, { a: 1, b: 3, c: 4 }], {}, makeScope())).toEqual({
        changes: [{ key: 'b', old: 2, new: 3 }],
        added: ['c'],
        removed: ['gone'],
      });
    });

    it('should return an empty diff for a malformed input', () => {
      expect(diff.invoke([{ a: 1 }], {}, makeScope())).toEqual({ changes: [], added: [], removed: [] });
    });
  });
});
