import type { Primitive } from './types.js';
import { fillTemplate } from '../generation/template.js';
import { extractJsonObject } from '../generation/json.js';
import { isRecord } from '../utils/guards.js';

export const callLlm: Primitive = {
  name: 'call_llm',
  description: 'Fill the prompt template with the input and generate text',
  async invoke(input, args, { services }) {
    const template = typeof args.prompt === 'string' ? args.prompt : '{input}';
    return services.generator.generate(fillTemplate(template, input));
  },
};

export const parseResponse: Primitive = {
  name: 'parse_response',
  description: 'Extract a JSON object from generated text',
  invoke(input, args) {
    if (args.format !== 'json' || typeof input !== 'string') return input;

    const extracted = extractJsonObject(input);
    if (extracted.ok) return extracted.value;
    if (extracted.reason === 'invalid-json') {
      return { error: 'Failed to parse JSON', raw: input };
    }
    return input;
  },
};

export const validateJson: Primitive = {
  name: 'validate_json',
  description: 'Check an object for required keys',
  invoke(input, args) {
    if (!isRecord(input)) {
      return { valid: false, error: 'Not a valid object' };
    }
    const schema = isRecord(args.schema) ? args.schema : {};
    const required = Array.isArray(schema.required)
      ? schema.required.filter((key): key is string => typeof key === 'string')
      : [];
    const missing = required.filter(key => !(key in input));
    return { valid: missing.length === 0, data: input, missing };
  },
};

export const LLM_PRIMITIVES: Primitive[] = [callLlm, parseResponse, validateJson];
