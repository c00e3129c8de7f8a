import { Counter, Gauge, Registry } from 'prom-client';

export type EvictionReason = 'expired' | 'capacity' | 'pressure' | 'invalidated';

export interface CacheMetrics {
  readonly registry: Registry;
  hits: Counter<'class'>;
  misses: Counter<'class'>;
  evictions: Counter<'class' | 'reason'>;
  entries: Gauge<'class'>;
  memoryBytes: Gauge;
  pressureLevel: Gauge;
}

/**
 * Cache counters live on the registry handed in, so two caches in one process
 * (tests, mostly) never collide on metric names in the global registry.
 */
export function createCacheMetrics(registry: Registry = new Registry()): CacheMetrics {
  return {
    registry,
    hits: new Counter({
      name: 'strata_cache_hits_total',
      help: 'Cache lookups answered from a live entry',
      labelNames: ['class'],
      registers: [registry],
    }),
    misses: new Counter({
      name: 'strata_cache_misses_total',
      help: 'Cache lookups that found nothing or an expired entry',
      labelNames: ['class'],
      registers: [registry],
    }),
    evictions: new Counter({
      name: 'strata_cache_evictions_total',
      help: 'Entries removed from the cache, by reason',
      labelNames: ['class', 'reason'],
      registers: [registry],
    }),
    entries: new Gauge({
      name: 'strata_cache_entries',
      help: 'Live entries per cache class',
      labelNames: ['class'],
      registers: [registry],
    }),
    memoryBytes: new Gauge({
      name: 'strata_cache_memory_bytes',
      help: 'Estimated bytes held by all cache classes',
      registers: [registry],
    }),
    pressureLevel: new Gauge({
      name: 'strata_cache_memory_pressure_level',
      help: 'Last observed memory pressure (0 low, 1 medium, 2 high, 3 critical)',
      registers: [registry],
    }),
  };
}
