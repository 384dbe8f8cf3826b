import { isRecord } from '../utils/guards.js';
import { NODE_TYPES, PHASES, UNIT_TYPES } from './types.js';

export interface ValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const REQUIRED_UNIT_FIELDS = ['id', 'type', 'intent', 'nodes', 'edges'] as const;
const REQUIRED_NODE_FIELDS = ['id', 'type', 'phase', 'description'] as const;

function includes(list: readonly string[], value: unknown): boolean {
  return typeof value === 'string' && list.includes(value);
}

/**
 * Non-throwing check of a raw unit record, for generated or hand-written JSON.
 * Out-of-range scalars and unusual node types only warn here; `Unit.fromRecord`
 * still rejects them.
 */
export function validateRecord(raw: unknown): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    return { valid: false, errors: ['Record must be an object'], warnings };
  }

  for (const field of REQUIRED_UNIT_FIELDS) {
    if (!(field in raw)) errors.push(`Missing required field: ${field}`);
  }

  if ('type' in raw && !includes(UNIT_TYPES, raw.type)) {
    errors.push(`Invalid type: ${String(raw.type)}`);
  }

  const phases = Array.isArray(raw.phases) ? raw.phases : [];
  for (const phase of phases) {
    if (!includes(PHASES, phase)) errors.push(`Invalid phase: ${String(phase)}`);
  }

  for (const field of ['tension', 'importance'] as const) {
    const value = raw[field];
    if (typeof value === 'number' && (value < 0 || value > 1)) {
      warnings.push(`${field} ${value} outside 0-1 range`);
    }
  }

  const nodes = Array.isArray(raw.nodes) ? raw.nodes : [];
  if ('nodes' in raw && nodes.length === 0) errors.push('Unit has no nodes');

  const nodeIds = new Set<unknown>();
  nodes.forEach((node: unknown, i: number) => {
    if (!isRecord(node)) {
      errors.push(`Node ${i} is not an object`);
      return;
    }
    for (const field of REQUIRED_NODE_FIELDS) {
      if (!(field in node)) errors.push(`Node ${i} missing field: ${field}`);
    }

    const id = node.id;
    if (nodeIds.has(id)) errors.push(`Duplicate node id: ${String(id)}`);
    nodeIds.add(id);

    if (!includes(NODE_TYPES, node.type)) {
      warnings.push(`Node ${String(id)} has unusual type: ${String(node.type)}`);
    }
    if (!includes(PHASES, node.phase)) {
      errors.push(`Node ${String(id)} has invalid phase: ${String(node.phase)}`);
    }
    if (Boolean(node.primitive) === Boolean(node.unit_ref)) {
      errors.push(`Node ${String(id)} must set exactly one of primitive or unit_ref`);
    }
  });

  const edges = Array.isArray(raw.edges) ? raw.edges : [];
  for (const edge of edges) {
    if (!isRecord(edge)) {
      errors.push('Edge is not an object');
      continue;
    }
    if (!nodeIds.has(edge.from)) errors.push(`Edge references unknown node: ${String(edge.from)}`);
    if (!nodeIds.has(edge.to)) errors.push(`Edge references unknown node: ${String(edge.to)}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}
