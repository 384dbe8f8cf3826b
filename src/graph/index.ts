export * from './types.js';
export * from './reference.js';
export * from './schema.js';
export { Unit } from './unit.js';
export { validateRecord, type ValidationReport } from './validate.js';
export {
  generateUnitId,
  createNode,
  createUnit,
  createUnitRecord,
  quickLlmUnit,
  quickMemoryUnit,
  type NodeOptions,
  type UnitOptions,
} from './builder.js';
