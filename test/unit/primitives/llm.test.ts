import { describe, it, expect } from 'vitest';
import { callLlm, parseResponse, validateJson } from '../../../src/primitives/llm.js';
import { makeScope } from '../../helpers/fixtures.js';
import { MockGenerator } from '../../helpers/mock-generator.js';

describe('llm primitives', () => {
  describe('call_llm', () => {
    it('should fill the prompt with a scalar input', async () => {
      const generator = new MockGenerator([], 'generated');
      const result = await callLlm.invoke('some text', { prompt: 'Summarize: {input}' }, makeScope({}, { generator }));
      expect(result).toBe('generated');
      expect(generator.prompts).toEqual(['Summarize: some text']);
    });

    it('should fill both placeholder forms from an object input', async () => {
      const generator = new MockGenerator();
      await callLlm.invoke({ topic: 'cats' }, { prompt: 'About {topic} and {$topic}. {input}' }, makeScope({}, { generator }));
      expect(generator.prompts).toEqual(['About cats and cats. ']);
    });

    it('should send the bare input without a prompt', async () => {
      const generator = new MockGenerator();
      await callLlm.invoke('hi', {}, makeScope({}, { generator }));
      expect(generator.prompts).toEqual(['hi']);
    });

    it('should let generator errors propagate', async () => {
      const generator = new MockGenerator([new Error('offline')]);
      await expect(callLlm.invoke('hi', {}, makeScope({}, { generator }))).rejects.toThrow('offline');
    });
  });

  describe('parse_response', () => {
    it('should extract an embedded JSON object', () => {
      expect(parseResponse.invoke('Sure: {"a": 1} done', { format: 'json' }, makeScope())).toEqual({ a: 1 });
    });

    it('should return text without an object unchanged', () => {
      expect(parseResponse.invoke('no json here', { format: 'json' }, makeScope())).toBe('no json here');
    });

    it('should report an unparseable object', () => {
      expect(parseResponse.invoke('{bad json}', { format: 'json' }, makeScope())).toEqual({
        error: 'Failed to parse JSON',
        raw: '{bad json}',
      });
    });

    it('should pass through without the json format', () => {
      expect(parseResponse.invoke('{"a": 1}', {}, makeScope())).toBe('{"a": 1}');
    });
  });

  describe('validate_json', () => {
    const args = { schema: { required: ['name', 'age'] } };

    it('should list missing required keys', () => {
      expect(validateJson.invoke({ name: 'x' }, args, makeScope())).toEqual({
        valid: false,
        data: { name: 'x' },
        missing: ['age'],
      });
    });

    it('should accept a complete object', () => {
      expect(validateJson.invoke({ name: 'x', age: 3 }, args, makeScope())).toMatchObject({ valid: true, missing: [] });
    });

    it('should reject a non-object', () => {
      expect(validateJson.invoke('text', args, makeScope())).toEqual({ valid: false, error: 'Not a valid object' });
    });
  });
});
