export { UnitStore } from './unit-store.js';
export { PoolStore } from './pool-store.js';
export {
  MetricsStore,
  UNKNOWN_SUCCESS_RATE,
  type UnitMetrics,
  type HistoryEntry as MetricsHistoryEntry,
  type MetricsFile,
} from './metrics-store.js';
export { MemoryStore } from './memory-store.js';
