import type { InputRef } from './types.js';

const VAR_PREFIX = '$';

export function varRef(name: string): InputRef {
  return { kind: 'var', name: stripVarPrefix(name) };
}

export function literal(value: unknown): InputRef {
  return { kind: 'literal', value };
}

export function listRef(items: InputRef[]): InputRef {
  return { kind: 'list', items };
}

export function stripVarPrefix(name: string): string {
  return name.startsWith(VAR_PREFIX) ? name.slice(VAR_PREFIX.length) : name;
}

/**
 * Read the stored form of a node input: `"$name"` is a variable, an array is
 * a list of inputs, anything else is a literal. Absent input stays absent.
 */
export function parseInputRef(raw: unknown): InputRef | undefined {
  if (raw === undefined || raw === null) return undefined;
  return parseItem(raw);
}

function parseItem(raw: unknown): InputRef {
  if (typeof raw === 'string' && raw.startsWith(VAR_PREFIX)) {
    return varRef(raw);
  }
  if (Array.isArray(raw)) {
    return listRef(raw.map(parseItem));
  }
  return literal(raw);
}

/**
 * Inverse of `parseInputRef`.
 */
export function serializeInputRef(ref: InputRef | undefined): unknown {
  if (!ref) return null;
  switch (ref.kind) {
    case 'var':
      return `${VAR_PREFIX}${ref.name}`;
    case 'list':
      return ref.items.map(item => serializeInputRef(item));
    case 'literal':
      return ref.value;
  }
}

/**
 * Resolve a reference against an explicit scope.
 */
export function resolveInputRef(ref: InputRef | undefined, scope: Readonly<Record<string, unknown>>): unknown {
  if (!ref) return undefined;
  switch (ref.kind) {
    case 'var':
      return Object.prototype.hasOwnProperty.call(scope, ref.name) ? scope[ref.name] : undefined;
    case 'list':
      return ref.items.map(item => resolveInputRef(item, scope));
    case 'literal':
      return ref.value;
  }
}

/**
 * Names of every variable a reference reads.
 */
export function referencedVariables(ref: InputRef | undefined): string[] {
  if (!ref) return [];
  switch (ref.kind) {
    case 'var':
      return [ref.name];
    case 'list':
      return ref.items.flatMap(referencedVariables);
    case 'literal':
      return [];
  }
}
