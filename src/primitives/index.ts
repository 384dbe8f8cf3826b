export type { Primitive, PrimitiveArgs, PrimitiveScope, PrimitiveServices } from './types.js';
export { PrimitiveRegistry } from './registry.js';
export { DATA_PRIMITIVES, type StateDiff } from './data.js';
export { CONTROL_PRIMITIVES } from './control.js';
export { UNIT_PRIMITIVES } from './unit-ops.js';
export { LLM_PRIMITIVES } from './llm.js';
export { IO_PRIMITIVES } from './io.js';
export { TENSION_PRIMITIVES } from './tension.js';
export { MEMORY_PRIMITIVES } from './memory.js';
