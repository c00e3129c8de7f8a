import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from 'prom-client';
import { AdaptiveCache, DEFAULT_CACHE_OPTIONS } from '@strata/cache';
import {
  BackendProtocolError,
  BackendTimeoutError,
  BackendUnavailableError,
  HttpStatusError,
  NoResultsError,
} from '../src/errors.js';
import { createAudioMetrics } from '../src/metrics.js';
import { BackendRegistry } from '../src/resolver/backend-registry.js';
import type { BackendConfig } from '../src/resolver/backend-registry.js';
import { HierarchicalResolver } from '../src/resolver/hierarchical-resolver.js';
import type { ResolutionAttempt } from '../src/resolver/hierarchical-resolver.js';
import type { Item } from '../src/types.js';
import { FakeAdapter, hang, idleProbe, track } from './support.js';

interface BackendSetup {
  adapter: FakeAdapter;
  timeoutMs?: number;
  maxRetries?: number;
  enabled?: boolean;
}

describe('HierarchicalResolver', () => {
  let clock: number;
  let cache: AdaptiveCache<Item>;
  let attempts: ResolutionAttempt[];

  beforeEach(() => {
    clock = 0;
    attempts = [];
    cache = new AdaptiveCache<Item>({
      ...DEFAULT_CACHE_OPTIONS,
      probe: idleProbe,
      now: () => clock,
      registry: new Registry(),
    });
  });

  const createResolver = (backends: BackendSetup[], fallbackBudgetMs = 20_000) => {
    const registry = new BackendRegistry(
      backends.map(({ adapter, timeoutMs, maxRetries, enabled }, index): { config: BackendConfig; adapter: FakeAdapter } => ({
        config: {
          name: adapter.name,
          kind: 'mirror',
          priority: index + 1,
          timeoutMs: timeoutMs ?? 1000,
          maxRetries: maxRetries ?? 1,
          enabled: enabled ?? true,
        },
        adapter,
      })),
    );
    const resolver = new HierarchicalResolver({
      backends: registry,
      cache,
      backoffBaseMs: 1,
      backoffMaxMs: 2,
      fallbackBudgetMs,
      metrics: createAudioMetrics(new Registry()),
    });
    resolver.on('attempt', (attempt: ResolutionAttempt) => attempts.push(attempt));
    return { resolver, registry };
  };

  const summary = () => attempts.map(({ backend, attempt, outcome }) => [backend, attempt, outcome]);

  it('retries a timing-out backend, then takes the next one', async () => {
    const song = track('song');
    const slow = new FakeAdapter('b1', { search: () => hang() });
    const steady = new FakeAdapter('b2', { search: () => [song] });
    const { resolver } = createResolver([{ adapter: slow, timeoutMs: 20, maxRetries: 2 }, { adapter: steady }]);

    const result = await resolver.resolveDetailed('some song');

    expect(result).toMatchObject({ items: [song], backend: 'b2', fromCache: false, corrected: false });
    expect(slow.searches).toEqual(['some song', 'some song']);
    expect(summary()).toEqual([
      ['b1', 1, 'timeout'],
      ['b1', 2, 'timeout'],
      ['b2', 1, 'success'],
    ]);

    const counted = await resolver.metrics.backendAttempts.get();
    expect(counted.values).toContainEqual(
      expect.objectContaining({ labels: { backend: 'b1', outcome: 'timeout' }, value: 2 }),
    );
  });

  it('reports no results when every backend is disabled', async () => {
    const adapter = new FakeAdapter('b1', { search: () => [track('a')] });
    const { resolver } = createResolver([{ adapter, enabled: false }]);

    const error = await resolver.resolve('anything').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NoResultsError);
    expect(error).toMatchObject({ query: 'anything', attemptedBackends: [] });
    expect(adapter.searches).toEqual([]);
  });

  it('serves repeats from the cache until the search TTL runs out', async () => {
    const adapter = new FakeAdapter('b1', { search: () => [track('a')] });
    const { resolver } = createResolver([{ adapter }]);

    const first = await resolver.resolveDetailed('Some Song', 5, 'alice');
    const second = await resolver.resolveDetailed('some   song!', 5, 'bob');

    expect(second.fromCache).toBe(true);
    expect(second.backend).toBeNull();
    expect(second.items).toEqual(first.items.map((item) => ({ ...item, requestedBy: 'bob' })));
    expect(adapter.searches).toHaveLength(1);

    clock = DEFAULT_CACHE_OPTIONS.searches.ttlMs + 1;
    await resolver.resolve('some song');
    expect(adapter.searches).toHaveLength(2);
  });

  it('ranks title matches and typical lengths first, then applies the limit', async () => {
    const remix = track('remix', { title: 'Halo (Extended Remix)', duration: 3600 });
    const original = track('halo', { title: 'Halo', duration: 240 });
    const unrelated = track('other', { title: 'Something else', duration: 240 });
    const adapter = new FakeAdapter('b1', { search: () => [unrelated, remix, original] });
    const { resolver } = createResolver([{ adapter }]);

    await expect(resolver.resolve('halo', 2)).resolves.toEqual([original, remix]);
  });

  it('retries once with a corrected query and caches under both', async () => {
    const halo = track('halo', { title: 'Halo' });
    const adapter = new FakeAdapter('b1', { search: (query) => (query === 'Beyonce Halo' ? [halo] : []) });
    const { resolver } = createResolver([{ adapter }]);

    const result = await resolver.resolveDetailed('Beyoncé - Halo');

    expect(result).toMatchObject({ items: [halo], query: 'Beyonce Halo', corrected: true, backend: 'b1' });
    expect(adapter.searches).toEqual(['Beyoncé - Halo', 'Beyonce Halo']);

    const again = await resolver.resolveDetailed('Beyoncé - Halo');
    expect(again).toMatchObject({ fromCache: true, corrected: false });
    expect(adapter.searches).toHaveLength(2);
  });

  it('keeps a backend that answered malformed out of the rest of the call', async () => {
    const broken = new FakeAdapter('b1', {
      search: () => Promise.reject(new BackendProtocolError('b1', 'unexpected payload')),
    });
    const empty = new FakeAdapter('b2', { search: () => [] });
    const { resolver } = createResolver([{ adapter: broken, maxRetries: 3 }, { adapter: empty }]);

    const error = await resolver.resolve('ABBA - Waterloo').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NoResultsError);
    expect(error).toMatchObject({ attemptedBackends: ['b1', 'b2'] });
    expect(broken.searches).toEqual(['ABBA - Waterloo']);
    expect(empty.searches).toEqual(['ABBA - Waterloo', 'ABBA Waterloo']);
  });

  it('surfaces the last failure, annotated with every backend tried', async () => {
    const down = (name: string) =>
      new FakeAdapter(name, { search: () => Promise.reject(new HttpStatusError(503, `https://${name}.example`)) });
    const { resolver } = createResolver([{ adapter: down('b1') }, { adapter: down('b2') }]);

    const error = await resolver.resolve('abba').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({
      backend: 'b2',
      attemptedBackends: ['b1', 'b2'],
      message: 'b2 is unavailable: HTTP 503 from https://b2.example',
    });
  });

  it('tries an unreachable backend again on the next call', async () => {
    let calls = 0;
    const hit = track('abba', { title: 'ABBA' });
    const flaky = new FakeAdapter('b1', {
      search: () => {
        calls += 1;
        if (calls === 1) {
          return Promise.reject(Object.assign(new Error('connect ECONNREFUSED 10.0.0.1:443'), { code: 'ECONNREFUSED' }));
        }
        return [hit];
      },
    });
    const { resolver } = createResolver([{ adapter: flaky }]);

    await expect(resolver.resolve('abba')).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(resolver.resolve('abba')).resolves.toEqual([hit]);
    expect(flaky.searches).toEqual(['abba', 'abba']);
  });

  it('hands out results the cache does not share', async () => {
    const hit = track('song', { title: 'Song' });
    const adapter = new FakeAdapter('b1', { search: () => [hit] });
    const { resolver } = createResolver([{ adapter }]);

    const first = await resolver.resolve('song');
    first.length = 0;

    await expect(resolver.resolve('song')).resolves.toEqual([hit]);
    expect(adapter.searches).toEqual(['song']);
  });

  it('bounds the corrected retry by the fallback budget', async () => {
    const slow = new FakeAdapter('b1', { search: () => hang() });
    const { resolver } = createResolver([{ adapter: slow, timeoutMs: 60 }], 10);

    await expect(resolver.resolve('Beyoncé - Halo')).rejects.toBeInstanceOf(BackendTimeoutError);

    expect(attempts.map(({ query, outcome }) => [query, outcome])).toEqual([
      ['Beyoncé - Halo', 'timeout'],
      ['Beyonce Halo', 'timeout'],
    ]);
    expect(attempts[1]?.durationMs).toBeLessThan(50);
  });

  describe('URLs', () => {
    const url = 'https://youtu.be/dQw4w9WgXcQ';
    const video = track('dQw4w9WgXcQ', { title: 'Never Gonna', requestedBy: 'alice' });

    it('resolves through URL-capable backends and caches the metadata', async () => {
      const adapter = new FakeAdapter('b1', { resolve: () => video });
      const { resolver } = createResolver([{ adapter }]);

      const first = await resolver.resolveDetailed(url, 5, 'alice');
      const second = await resolver.resolveDetailed(url, 5, 'bob');

      expect(first).toMatchObject({ items: [video], backend: 'b1', fromCache: false });
      expect(second).toMatchObject({ backend: null, fromCache: true, items: [{ title: 'Never Gonna', requestedBy: 'bob' }] });
      expect(adapter.resolves).toEqual([url]);
      expect(cache.getMetadata('https://www.youtube.com/watch?v=dQw4w9WgXcQ')).toBe(video);
    });

    it('falls back to searching when no backend resolves the URL', async () => {
      const adapter = new FakeAdapter('b1', { resolve: () => null, search: () => [video] });
      const { resolver } = createResolver([{ adapter }]);

      await expect(resolver.resolve(url)).resolves.toEqual([video]);
      expect(adapter.searches).toEqual([url]);
    });
  });

  describe('resolveStreamUrl', () => {
    it('caches stream URLs and asks again after invalidation', async () => {
      const item = track('a');
      const adapter = new FakeAdapter('b1', { stream: () => 'https://cdn.example/a' });
      const { resolver } = createResolver([{ adapter }]);

      await expect(resolver.resolveStreamUrl(item)).resolves.toBe('https://cdn.example/a');
      await expect(resolver.resolveStreamUrl(item)).resolves.toBe('https://cdn.example/a');
      expect(adapter.streams).toHaveLength(1);

      cache.invalidateStreamUrl(item.canonicalUrl);
      await resolver.resolveStreamUrl(item);
      expect(adapter.streams).toHaveLength(2);
    });

    it('moves on when a backend has no stream', async () => {
      const item = track('a');
      const empty = new FakeAdapter('b1', { stream: () => '' });
      const working = new FakeAdapter('b2', { stream: () => 'https://cdn.example/b2' });
      const { resolver } = createResolver([{ adapter: empty }, { adapter: working }]);

      await expect(resolver.resolveStreamUrl(item)).resolves.toBe('https://cdn.example/b2');
    });

    it('reports no results without a stream-capable backend', async () => {
      const { resolver } = createResolver([{ adapter: new FakeAdapter('b1', { search: () => [] }) }]);
      await expect(resolver.resolveStreamUrl(track('a'))).rejects.toBeInstanceOf(NoResultsError);
    });
  });

  it('backs off exponentially up to the ceiling', () => {
    const resolver = new HierarchicalResolver({ backends: new BackendRegistry(), cache });

    expect([1, 2, 3, 4, 5].map((attempt) => resolver.backoffDelay(attempt))).toEqual([500, 1000, 2000, 4000, 4000]);
  });
});
