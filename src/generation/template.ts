import { isRecord } from '../utils/guards.js';

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Substitute an input into a prompt template.
 *
 * Scalars replace `{input}`. For an object, every key fills both `{$key}` and
 * `{key}`. Leftover `{input}` and `{$input}` placeholders are removed.
 */
export function fillTemplate(template: string, input: unknown): string {
  let prompt: string;

  if (isRecord(input)) {
    prompt = template;
    for (const [key, value] of Object.entries(input)) {
      const text = stringify(value);
      prompt = prompt.split(`{$${key}}`).join(text).split(`{${key}}`).join(text);
    }
  } else {
    prompt = template.split('{input}').join(stringify(input));
  }

  return prompt.split('{input}').join('').split('{$input}').join('');
}
