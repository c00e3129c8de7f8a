import { componentLogger } from '@strata/logger';
import type { Registry } from 'prom-client';
import { CacheClass } from './cache-class.js';
import type { CacheClassStats, CachePutResult, EvictionCandidate } from './cache-class.js';
import { MemoryBudget } from './memory-budget.js';
import {
  DEFAULT_PRESSURE_THRESHOLDS,
  PRESSURE_LEVELS,
  classifyPressure,
  hostMemoryProbe,
} from './memory-pressure.js';
import type { MemoryPressure, MemoryProbe, PressureThresholds } from './memory-pressure.js';
import { createCacheMetrics } from './metrics.js';
import type { CacheMetrics } from './metrics.js';
import { searchCacheKey } from './normalize.js';

const logger = componentLogger('adaptive-cache');

export interface CacheClassSettings {
  ttlMs: number;
  maxEntries: number;
}

export interface AdaptiveCacheOptions {
  streams: CacheClassSettings;
  metadata: CacheClassSettings;
  searches: CacheClassSettings;
  maxMemoryBytes: number;
  optimizeIntervalMs?: number;
  pressure?: PressureThresholds;
  probe?: MemoryProbe;
  now?: () => number;
  registry?: Registry;
}

export const DEFAULT_CACHE_OPTIONS: AdaptiveCacheOptions = {
  streams: { ttlMs: 3_600_000, maxEntries: 1000 },
  metadata: { ttlMs: 7_200_000, maxEntries: 5000 },
  searches: { ttlMs: 1_800_000, maxEntries: 500 },
  maxMemoryBytes: 256 * 1024 * 1024,
  optimizeIntervalMs: 300_000,
};

/** Entries removed at Medium pressure, across all classes. */
export const MEDIUM_PRESSURE_EVICTIONS = 10;

const PRESSURE_FRACTIONS: Record<Exclude<MemoryPressure, 'low' | 'medium'>, number> = {
  high: 0.25,
  critical: 0.5,
};

export interface OptimizationReport {
  expired: number;
  pressure: MemoryPressure;
  ratio: number;
  evicted: number;
}

export interface AdaptiveCacheStats {
  hits: number;
  misses: number;
  hitRatio: number;
  evictions: number;
  memoryBytes: number;
  peakMemoryBytes: number;
  maxMemoryBytes: number;
  lastPressure: MemoryPressure;
  classes: {
    streams: CacheClassStats;
    metadata: CacheClassStats;
    searches: CacheClassStats;
  };
}

/**
 * Memoizes stream URLs, metadata and search result sets. Each class keeps
 * its own TTL and ceiling; all three share one memory budget, and a periodic
 * pass trims them harder as memory pressure rises.
 *
 * `TMeta` is the metadata record the resolver stores; search results are
 * lists of the same record.
 */
export class AdaptiveCache<TMeta> {
  readonly streams: CacheClass<string>;
  readonly metadata: CacheClass<TMeta>;
  readonly searches: CacheClass<TMeta[]>;
  readonly metrics: CacheMetrics;

  private readonly budget: MemoryBudget;
  private readonly probe: MemoryProbe;
  private readonly thresholds: PressureThresholds;
  private readonly optimizeIntervalMs: number;
  private timer?: NodeJS.Timeout;
  private lastPressure: MemoryPressure = 'low';

  constructor(options: AdaptiveCacheOptions = DEFAULT_CACHE_OPTIONS) {
    const now = options.now ?? Date.now;
    this.metrics = createCacheMetrics(options.registry);
    this.budget = new MemoryBudget(options.maxMemoryBytes);
    this.probe = options.probe ?? hostMemoryProbe();
    this.thresholds = options.pressure ?? DEFAULT_PRESSURE_THRESHOLDS;
    this.optimizeIntervalMs = options.optimizeIntervalMs ?? 300_000;

    const shared = { budget: this.budget, now, metrics: this.metrics };
    this.streams = new CacheClass<string>({ name: 'streams', ...options.streams, ...shared });
    this.metadata = new CacheClass<TMeta>({ name: 'metadata', ...options.metadata, ...shared });
    this.searches = new CacheClass<TMeta[]>({ name: 'searches', ...options.searches, ...shared });
  }

  getStreamUrl(sourceUrl: string): string | undefined {
    return this.streams.get(sourceUrl);
  }

  putStreamUrl(sourceUrl: string, streamUrl: string): CachePutResult {
    return this.track(this.streams.put(sourceUrl, streamUrl));
  }

  invalidateStreamUrl(sourceUrl: string): boolean {
    const removed = this.streams.delete(sourceUrl, 'invalidated');
    this.metrics.memoryBytes.set(this.budget.used);
    return removed;
  }

  getMetadata(id: string): TMeta | undefined {
    return this.metadata.get(id);
  }

  putMetadata(id: string, value: TMeta): CachePutResult {
    return this.track(this.metadata.put(id, value));
  }

  getSearchResults(query: string, limit: number): TMeta[] | undefined {
    return this.searches.get(searchCacheKey(query, limit));
  }

  putSearchResults(query: string, limit: number, results: TMeta[]): CachePutResult {
    return this.track(this.searches.put(searchCacheKey(query, limit), results));
  }

  purgeExpired(): number {
    const removed = this.classes().reduce((total, cacheClass) => total + cacheClass.purgeExpired(), 0);
    this.metrics.memoryBytes.set(this.budget.used);
    return removed;
  }

  /**
   * One optimization pass: TTL purge, then eviction graded by the memory
   * pressure the probe reports.
   */
  optimize(): OptimizationReport {
    const expired = this.purgeExpired();
    const ratio = this.probe.sample();
    const pressure = classifyPressure(ratio, this.thresholds);
    this.lastPressure = pressure;
    this.metrics.pressureLevel.set(PRESSURE_LEVELS[pressure]);

    let evicted = 0;
    switch (pressure) {
      case 'low':
        break;
      case 'medium':
        evicted = this.evictLeastFrequentlyUsed(MEDIUM_PRESSURE_EVICTIONS);
        break;
      case 'high':
      case 'critical':
        evicted = this.classes().reduce(
          (total, cacheClass) => total + cacheClass.evictFraction(PRESSURE_FRACTIONS[pressure], 'pressure'),
          0,
        );
        break;
    }
    this.metrics.memoryBytes.set(this.budget.used);

    const report: OptimizationReport = { expired, pressure, ratio, evicted };
    if (pressure === 'low') {
      logger.debug({ ...report, probe: this.probe.source }, 'Cache optimization pass completed');
    } else {
      logger.info({ ...report, probe: this.probe.source, memoryBytes: this.budget.used }, 'Cache trimmed under memory pressure');
    }
    return report;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.runScheduledPass(), this.optimizeIntervalMs);
    this.timer.unref();
    logger.info({ intervalMs: this.optimizeIntervalMs }, 'Cache optimization scheduled');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  clear(): void {
    for (const cacheClass of this.classes()) {
      cacheClass.clear();
    }
    this.metrics.memoryBytes.set(this.budget.used);
  }

  stats(): AdaptiveCacheStats {
    const classes = {
      streams: this.streams.stats(),
      metadata: this.metadata.stats(),
      searches: this.searches.stats(),
    };
    const all = Object.values(classes);
    const hits = all.reduce((total, entry) => total + entry.hits, 0);
    const misses = all.reduce((total, entry) => total + entry.misses, 0);

    return {
      hits,
      misses,
      hitRatio: hits + misses > 0 ? hits / (hits + misses) : 0,
      evictions: all.reduce((total, entry) => total + entry.evictions, 0),
      memoryBytes: this.budget.used,
      peakMemoryBytes: this.budget.peak,
      maxMemoryBytes: this.budget.limitBytes,
      lastPressure: this.lastPressure,
      classes,
    };
  }

  /**
   * Across all classes: fewest accesses first, older `lastAccessed` breaking
   * ties.
   */
  private evictLeastFrequentlyUsed(count: number): number {
    const pool: Array<EvictionCandidate & { owner: CacheClass<unknown> }> = [];
    for (const cacheClass of this.classes()) {
      for (const candidate of cacheClass.candidates()) {
        pool.push({ ...candidate, owner: cacheClass });
      }
    }

    pool.sort(
      (a, b) => a.accessCount - b.accessCount || a.lastAccessed - b.lastAccessed || a.sequence - b.sequence,
    );

    let evicted = 0;
    for (const victim of pool.slice(0, count)) {
      if (victim.owner.delete(victim.key, 'pressure')) evicted += 1;
    }
    return evicted;
  }

  private classes(): Array<CacheClass<unknown>> {
    return [this.streams, this.metadata, this.searches];
  }

  private track(result: CachePutResult): CachePutResult {
    this.metrics.memoryBytes.set(this.budget.used);
    return result;
  }

  private runScheduledPass(): void {
    try {
      this.optimize();
    } catch (error) {
      logger.error({ error }, 'Cache optimization pass failed');
    }
  }
}
