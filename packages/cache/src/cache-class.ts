import { componentLogger } from '@strata/logger';
import type { Logger } from '@strata/logger';
import { CacheCapacityExceededError } from './errors.js';
import type { MemoryBudget } from './memory-budget.js';
import type { CacheMetrics, EvictionReason } from './metrics.js';

export interface CacheEntry<T> {
  value: T;
  createdAt: number;
  lastAccessed: number;
  accessCount: number;
  estimatedSize: number;
}

export interface CacheClassOptions {
  name: string;
  ttlMs: number;
  maxEntries: number;
  budget: MemoryBudget;
  now?: () => number;
  metrics?: CacheMetrics;
}

export interface CachePutResult {
  stored: boolean;
  evicted: number;
  estimatedSize: number;
}

export interface CacheClassStats {
  name: string;
  size: number;
  maxEntries: number;
  ttlMs: number;
  hits: number;
  misses: number;
  evictions: number;
  memoryBytes: number;
}

/** Entry reference handed to cross-class eviction. */
export interface EvictionCandidate {
  key: string;
  accessCount: number;
  lastAccessed: number;
  sequence: number;
}

interface StoredEntry<T> extends CacheEntry<T> {
  // tie-breaker for entries touched within the same clock tick
  sequence: number;
}

const ENTRY_OVERHEAD_BYTES = 64;

export function estimateEntrySize(key: string, value: unknown): number {
  const serialized = JSON.stringify(value) ?? '';
  return Buffer.byteLength(key) + Buffer.byteLength(serialized) + ENTRY_OVERHEAD_BYTES;
}

const byRecency = (a: EvictionCandidate, b: EvictionCandidate): number =>
  a.lastAccessed - b.lastAccessed || a.sequence - b.sequence;

/**
 * One cache class: a keyed store with its own TTL and entry ceiling, drawing
 * on a memory budget shared with its sibling classes. Every method runs to
 * completion synchronously.
 */
export class CacheClass<T> {
  readonly name: string;
  readonly ttlMs: number;
  readonly maxEntries: number;

  private readonly entries = new Map<string, StoredEntry<T>>();
  private readonly budget: MemoryBudget;
  private readonly now: () => number;
  private readonly metrics?: CacheMetrics;
  private readonly log: Logger;
  private sequence = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private memoryBytes = 0;

  constructor(options: CacheClassOptions) {
    if (options.maxEntries < 1) {
      throw new RangeError(`Cache class "${options.name}" needs room for at least one entry`);
    }
    this.name = options.name;
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.budget = options.budget;
    this.now = options.now ?? Date.now;
    this.metrics = options.metrics;
    this.log = componentLogger('cache', { cacheClass: options.name });
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.recordMiss();
      return undefined;
    }

    const now = this.now();
    if (this.isExpired(entry, now)) {
      this.removeEntry(key, entry, 'expired');
      this.recordMiss();
      return undefined;
    }

    entry.lastAccessed = now;
    entry.accessCount += 1;
    entry.sequence = ++this.sequence;
    this.hits += 1;
    this.metrics?.hits.inc({ class: this.name });
    return entry.value;
  }

  /** Entry metadata without touching recency, frequency or hit counters. */
  peek(key: string): Readonly<CacheEntry<T>> | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry, this.now())) return undefined;
    return entry;
  }

  has(key: string): boolean {
    return this.peek(key) !== undefined;
  }

  put(key: string, value: T): CachePutResult {
    const estimatedSize = estimateEntrySize(key, value);
    const existing = this.entries.get(key);
    if (existing) {
      // replacement is not an eviction
      this.removeEntry(key, existing);
    }

    const evictionsBefore = this.evictions;
    try {
      this.makeRoom(estimatedSize);
    } catch (error) {
      if (error instanceof CacheCapacityExceededError) {
        this.log.warn(
          { key, requestedBytes: error.requestedBytes, availableBytes: error.availableBytes },
          'Cache entry does not fit, not stored',
        );
        return { stored: false, evicted: this.evictions - evictionsBefore, estimatedSize };
      }
      throw error;
    }

    const now = this.now();
    this.entries.set(key, {
      value,
      createdAt: now,
      lastAccessed: now,
      accessCount: 0,
      estimatedSize,
      sequence: ++this.sequence,
    });
    this.memoryBytes += estimatedSize;
    this.budget.reserve(estimatedSize);
    this.syncGauge();

    return { stored: true, evicted: this.evictions - evictionsBefore, estimatedSize };
  }

  delete(key: string, reason: EvictionReason = 'invalidated'): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.removeEntry(key, entry, reason);
    return true;
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.removeEntry(key, entry, 'expired');
        removed += 1;
      }
    }

    if (removed > 0) {
      this.log.debug({ removed, remaining: this.entries.size, maxEntries: this.maxEntries }, 'Expired entries purged');
    }
    return removed;
  }

  /** Evict `floor(size * fraction)` entries, least recently used first. */
  evictFraction(fraction: number, reason: EvictionReason = 'pressure'): number {
    const count = Math.floor(this.entries.size * fraction);
    return this.evictLeastRecentlyUsed(count, reason);
  }

  evictLeastRecentlyUsed(count: number, reason: EvictionReason = 'pressure'): number {
    if (count <= 0) return 0;
    const victims = this.candidates().sort(byRecency).slice(0, count);
    for (const victim of victims) {
      this.delete(victim.key, reason);
    }
    return victims.length;
  }

  candidates(): EvictionCandidate[] {
    return Array.from(this.entries, ([key, entry]) => ({
      key,
      accessCount: entry.accessCount,
      lastAccessed: entry.lastAccessed,
      sequence: entry.sequence,
    }));
  }

  clear(): void {
    for (const [key, entry] of this.entries) {
      this.removeEntry(key, entry);
    }
  }

  stats(): CacheClassStats {
    return {
      name: this.name,
      size: this.entries.size,
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      memoryBytes: this.memoryBytes,
    };
  }

  /**
   * Expired entries go first, then least recently used ones, until the class
   * is under its ceiling and the shared budget can take `bytes` more.
   */
  private makeRoom(bytes: number): void {
    if (bytes > this.budget.limitBytes) {
      throw new CacheCapacityExceededError(this.name, bytes, this.budget.available);
    }

    const mustEvict = () => this.entries.size >= this.maxEntries || this.budget.wouldExceed(bytes);
    if (!mustEvict()) return;

    this.purgeExpired();
    while (mustEvict() && this.entries.size > 0) {
      this.evictLeastRecentlyUsed(1, 'capacity');
    }

    // the rest of the budget is held by other classes
    if (this.budget.wouldExceed(bytes)) {
      throw new CacheCapacityExceededError(this.name, bytes, this.budget.available);
    }
  }

  private isExpired(entry: StoredEntry<T>, now: number): boolean {
    return now - entry.createdAt > this.ttlMs;
  }

  private removeEntry(key: string, entry: StoredEntry<T>, reason?: EvictionReason): void {
    this.entries.delete(key);
    this.memoryBytes -= entry.estimatedSize;
    this.budget.release(entry.estimatedSize);
    if (reason) {
      this.evictions += 1;
      this.metrics?.evictions.inc({ class: this.name, reason });
    }
    this.syncGauge();
  }

  private recordMiss(): void {
    this.misses += 1;
    this.metrics?.misses.inc({ class: this.name });
  }

  private syncGauge(): void {
    this.metrics?.entries.set({ class: this.name }, this.entries.size);
  }
}
