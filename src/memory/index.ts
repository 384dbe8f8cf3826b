export { LivingMemory } from './living-memory.js';
export { MemoryUnit, generateMemoryId } from './memory-unit.js';
export {
  MemoryRecordSchema,
  type MemoryRecord,
  type LessonContent,
  type MemoryStats,
  type LivingMemoryOptions,
} from './types.js';
