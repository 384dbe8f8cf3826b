import { isRecord } from '../utils/guards.js';

export type JsonExtraction =
  | { ok: true; value: unknown }
  | { ok: false; reason: 'no-object' | 'invalid-json'; raw: string };

/**
 * Pull the JSON object embedded in free text: the span from the first `{`
 * to the last `}`.
 */
export function extractJsonObject(raw: string): JsonExtraction {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return { ok: false, reason: 'no-object', raw };
  }
  try {
    return { ok: true, value: JSON.parse(raw.slice(start, end + 1)) };
  } catch {
    return { ok: false, reason: 'invalid-json', raw };
  }
}

/**
 * Like `extractJsonObject`, narrowed to a plain object. Null otherwise.
 */
export function extractJsonRecord(raw: string): Record<string, unknown> | null {
  const extracted = extractJsonObject(raw);
  return extracted.ok && isRecord(extracted.value) ? extracted.value : null;
}
