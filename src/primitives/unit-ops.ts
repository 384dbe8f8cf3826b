import type { Primitive } from './types.js';
import { Unit } from '../graph/unit.js';
import { validateRecord } from '../graph/validate.js';
import { isRecord } from '../utils/guards.js';
import { toError } from '../core/errors.js';

const DEFAULT_QUERY_LIMIT = 100;

function unitId(input: unknown, args: Readonly<Record<string, unknown>>): string | undefined {
  if (typeof args.id === 'string' && args.id) return args.id;
  if (typeof input === 'string' && input) return input;
  return undefined;
}

export const loadUnit: Primitive = {
  name: 'load_unit',
  description: 'Load a stored unit record by id',
  async invoke(input, args, { services }) {
    const id = unitId(input, args);
    if (!services.units) return { error: 'Unit store not configured' };
    if (!id) return { error: 'Unit not found: (no id)' };

    const unit = await services.units.load(id);
    return unit ? unit.toRecord() : { error: `Unit not found: ${id}` };
  },
};

export const saveUnit: Primitive = {
  name: 'save_unit',
  description: 'Validate and persist a unit record',
  async invoke(input, _args, { services }) {
    if (!services.units) return { saved: false, error: 'Unit store not configured' };

    const report = validateRecord(input);
    if (!report.valid) {
      return { saved: false, error: 'Invalid unit data', errors: report.errors };
    }
    try {
      const path = await services.units.save(Unit.fromRecord(input));
      return { saved: true, path };
    } catch (err) {
      return { saved: false, error: toError(err).message, errors: [] };
    }
  },
};

export const queryUnits: Primitive = {
  name: 'query_units',
  description: 'List stored unit records, filtered by type or intent keyword',
  async invoke(_input, args, { services }) {
    if (!services.units) return [];
    const type = typeof args.type === 'string' ? args.type : undefined;
    const intent = typeof args.intent === 'string' ? args.intent.toLowerCase() : undefined;
    const limit = typeof args.limit === 'number' ? args.limit : DEFAULT_QUERY_LIMIT;

    return (await services.units.records())
      .filter(record => !type || record.type === type)
      .filter(record => !intent || record.intent.toLowerCase().includes(intent))
      .slice(0, limit);
  },
};

export const createUnit: Primitive = {
  name: 'create_unit',
  description: 'Instantiate a blueprint as a new unit record',
  async invoke(input, args, { services }) {
    if (!services.blueprints) return { error: 'Blueprint library not configured' };

    const blueprint = typeof args.blueprint === 'string' ? args.blueprint : 'act';
    const intent =
      (typeof args.intent === 'string' && args.intent) || (typeof input === 'string' && input) || 'new_unit';

    const unit = await services.blueprints.instantiate(blueprint, { intent, customize: { tension: 0.8 } });
    return unit ? unit.toRecord() : { error: `Blueprint not found: ${blueprint}` };
  },
};

export const updateUnit: Primitive = {
  name: 'update_unit',
  description: 'Shallow-merge updates into a unit record',
  invoke(input, args) {
    if (!isRecord(input)) return { error: 'Invalid input for update' };
    const updates = isRecord(args.updates) ? args.updates : {};
    return { ...input, ...updates };
  },
};

/**
 * Nested run of a stored unit. Failures of the child are reported in the
 * value, not thrown; recursion-limit violations are thrown by the scope.
 */
export const runUnit: Primitive = {
  name: 'run_unit',
  description: 'Run a stored unit with the input bound to `input`',
  async invoke(input, args, scope) {
    const id = unitId(undefined, args);
    if (!id) return { error: 'run_unit needs an id argument' };

    const run = await scope.runUnit(id, input);
    return run.success ? run.result : { error: run.errors.join('; '), result: run.result };
  },
};

export const UNIT_PRIMITIVES: Primitive[] = [loadUnit, saveUnit, queryUnits, createUnit, updateUnit, runUnit];
