import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Registry } from 'prom-client';
import { AdaptiveCache } from '../src/adaptive-cache.js';
import type { AdaptiveCacheOptions } from '../src/adaptive-cache.js';
import type { MemoryProbe } from '../src/memory-pressure.js';

interface Meta {
  title: string;
}

const fixedProbe = (ratio: number): MemoryProbe => ({ source: 'fixed', sample: () => ratio });

describe('AdaptiveCache', () => {
  let clock: number;

  beforeEach(() => {
    clock = 0;
  });

  const createCache = (overrides: Partial<AdaptiveCacheOptions> = {}) =>
    new AdaptiveCache<Meta>({
      streams: { ttlMs: 1000, maxEntries: 100 },
      metadata: { ttlMs: 2000, maxEntries: 100 },
      searches: { ttlMs: 500, maxEntries: 100 },
      maxMemoryBytes: 1024 * 1024,
      probe: fixedProbe(0.1),
      now: () => clock,
      registry: new Registry(),
      ...overrides,
    });

  describe('cache classes', () => {
    it('keys search results by normalized query and limit', () => {
      const cache = createCache();
      cache.putSearchResults('Daft Punk - Around the World!', 5, [{ title: 'Around the World' }]);

      expect(cache.getSearchResults('  daft punk  around the world', 5)).toEqual([{ title: 'Around the World' }]);
      expect(cache.getSearchResults('daft punk around the world', 10)).toBeUndefined();
    });

    it('applies each class its own TTL', () => {
      const cache = createCache();
      cache.putStreamUrl('https://www.youtube.com/watch?v=aaaaaaaaaaa', 'https://cdn.example/a');
      cache.putMetadata('aaaaaaaaaaa', { title: 'A' });

      clock = 1500;
      expect(cache.getStreamUrl('https://www.youtube.com/watch?v=aaaaaaaaaaa')).toBeUndefined();
      expect(cache.getMetadata('aaaaaaaaaaa')).toEqual({ title: 'A' });
    });

    it('invalidates a stream URL on demand', () => {
      const cache = createCache();
      cache.putStreamUrl('https://a.example/track', 'https://cdn.example/a');

      expect(cache.invalidateStreamUrl('https://a.example/track')).toBe(true);
      expect(cache.getStreamUrl('https://a.example/track')).toBeUndefined();
      expect(cache.invalidateStreamUrl('https://a.example/track')).toBe(false);
    });

    it('aggregates statistics across classes', () => {
      const cache = createCache();
      cache.putStreamUrl('s', 'u');
      cache.getStreamUrl('s');
      cache.getMetadata('missing');

      const stats = cache.stats();
      expect(stats.hits).toBe(1);
      expect(stats.misses).toBe(1);
      expect(stats.hitRatio).toBe(0.5);
      expect(stats.classes.streams.size).toBe(1);
      expect(stats.memoryBytes).toBe(stats.classes.streams.memoryBytes);
      expect(stats.lastPressure).toBe('low');
    });

    it('mirrors hits and misses into prom-client counters', async () => {
      const registry = new Registry();
      const cache = createCache({ registry });
      cache.putStreamUrl('s', 'u');
      cache.getStreamUrl('s');
      cache.getStreamUrl('other');

      const hits = await cache.metrics.hits.get();
      const misses = await cache.metrics.misses.get();
      expect(hits.values).toEqual([expect.objectContaining({ value: 1, labels: { class: 'streams' } })]);
      expect(misses.values).toEqual([expect.objectContaining({ value: 1, labels: { class: 'streams' } })]);
    });
  });

  describe('optimize', () => {
    it('purges expired entries and does nothing else under low pressure', () => {
      const cache = createCache();
      cache.putStreamUrl('s1', 'u1');
      cache.putMetadata('m1', { title: 'kept' });

      clock = 1500;
      const report = cache.optimize();

      expect(report).toEqual({ expired: 1, pressure: 'low', ratio: 0.1, evicted: 0 });
      expect(cache.metadata.size).toBe(1);
    });

    it('evicts the ten least frequently used entries under medium pressure', () => {
      const cache = createCache({ probe: fixedProbe(0.75) });
      for (let index = 1; index <= 6; index += 1) {
        cache.putStreamUrl(`s${index}`, `u${index}`);
        cache.putMetadata(`m${index}`, { title: `t${index}` });
      }
      cache.getStreamUrl('s1');
      cache.getMetadata('m1');
      cache.getMetadata('m1');

      const report = cache.optimize();

      expect(report.pressure).toBe('medium');
      expect(report.evicted).toBe(10);
      expect(cache.streams.candidates().map((candidate) => candidate.key)).toEqual(['s1']);
      expect(cache.metadata.candidates().map((candidate) => candidate.key)).toEqual(['m1']);
    });

    it('breaks frequency ties by older access under medium pressure', () => {
      const cache = createCache({ probe: fixedProbe(0.8) });
      for (let index = 1; index <= 11; index += 1) {
        clock = index;
        cache.putMetadata(`m${index}`, { title: `t${index}` });
      }

      cache.optimize();

      expect(cache.metadata.candidates().map((candidate) => candidate.key)).toEqual(['m11']);
    });

    it('evicts a quarter of every class under high pressure', () => {
      const cache = createCache({ probe: fixedProbe(0.9) });
      for (let index = 1; index <= 4; index += 1) {
        cache.putStreamUrl(`s${index}`, `u${index}`);
        cache.putMetadata(`m${index}`, { title: `t${index}` });
      }
      cache.putSearchResults('q', 5, []);

      const report = cache.optimize();

      expect(report).toMatchObject({ pressure: 'high', evicted: 2 });
      expect(cache.streams.size).toBe(3);
      expect(cache.metadata.size).toBe(3);
      expect(cache.searches.size).toBe(1);
    });

    it('evicts half of every class, least recently used first, under critical pressure', () => {
      const cache = createCache({ probe: fixedProbe(0.97) });
      for (let index = 1; index <= 4; index += 1) {
        clock = index;
        cache.putStreamUrl(`s${index}`, `u${index}`);
      }
      for (let index = 1; index <= 6; index += 1) {
        cache.putMetadata(`m${index}`, { title: `t${index}` });
      }
      for (const query of ['one', 'two', 'three']) {
        cache.putSearchResults(query, 5, []);
      }
      clock = 10;
      cache.getStreamUrl('s1');

      const report = cache.optimize();

      expect(report).toMatchObject({ pressure: 'critical', evicted: 6 });
      expect(cache.streams.candidates().map((candidate) => candidate.key)).toEqual(['s1', 's4']);
      expect(cache.metadata.size).toBe(3);
      expect(cache.searches.size).toBe(2);
      expect(cache.stats().lastPressure).toBe('critical');
    });
  });

  describe('background pass', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('runs on its interval until stopped', () => {
      const sample = vi.fn(() => 0.1);
      const cache = createCache({ probe: { source: 'fixed', sample }, optimizeIntervalMs: 1000 });

      cache.start();
      cache.start();
      vi.advanceTimersByTime(3000);
      expect(sample).toHaveBeenCalledTimes(3);

      cache.stop();
      vi.advanceTimersByTime(3000);
      expect(sample).toHaveBeenCalledTimes(3);
    });

    it('keeps running when a pass fails', () => {
      const sample = vi.fn(() => {
        throw new Error('probe unavailable');
      });
      const cache = createCache({ probe: { source: 'fixed', sample }, optimizeIntervalMs: 1000 });

      cache.start();
      expect(() => vi.advanceTimersByTime(2000)).not.toThrow();
      expect(sample).toHaveBeenCalledTimes(2);
      cache.stop();
    });
  });
});
