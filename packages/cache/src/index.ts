export { AdaptiveCache, DEFAULT_CACHE_OPTIONS, MEDIUM_PRESSURE_EVICTIONS } from './adaptive-cache.js';
export type {
  AdaptiveCacheOptions,
  AdaptiveCacheStats,
  CacheClassSettings,
  OptimizationReport,
} from './adaptive-cache.js';
export { CacheClass, estimateEntrySize } from './cache-class.js';
export type {
  CacheClassOptions,
  CacheClassStats,
  CacheEntry,
  CachePutResult,
  EvictionCandidate,
} from './cache-class.js';
export { MemoryBudget } from './memory-budget.js';
export {
  DEFAULT_PRESSURE_THRESHOLDS,
  PRESSURE_LEVELS,
  classifyPressure,
  hostMemoryProbe,
  processMemoryProbe,
} from './memory-pressure.js';
export type { MemoryPressure, MemoryProbe, PressureThresholds } from './memory-pressure.js';
export { createCacheMetrics } from './metrics.js';
export type { CacheMetrics, EvictionReason } from './metrics.js';
export { normalizeSearchKey, searchCacheKey } from './normalize.js';
