import { describe, it, expect, vi } from 'vitest';
import { Registry } from 'prom-client';
import { buildAppConfig, parseEnv } from '@strata/config';
import { createStrata, selectMemoryProbe } from '@strata/audio';
import type { CommandRunner, FetchLike } from '@strata/audio';

const json = (body: unknown) => new Response(JSON.stringify(body), { headers: { 'Content-Type': 'application/json' } });

const missingBinary = vi.fn<CommandRunner>(async () => {
  throw Object.assign(new Error('spawn yt-dlp ENOENT'), { code: 'ENOENT' });
});

const mirror = vi.fn<FetchLike>(async (input) => {
  const url = new URL(input);
  if (url.pathname === '/api/v1/search') {
    return json([{ type: 'video', videoId: 'bbbbbbbbbbb', title: 'Song B', author: 'Band', lengthSeconds: 200 }]);
  }
  return json({
    videoId: 'bbbbbbbbbbb',
    title: 'Song B',
    adaptiveFormats: [{ url: 'https://cdn.example/b.m4a', type: 'audio/mp4' }],
  });
});

describe('strata end to end', () => {
  it('falls past a missing extractor to the mirror for both search and stream', async () => {
    const config = buildAppConfig(
      parseEnv({
        PUBLIC_API_ENABLED: 'false',
        FEED_ENABLED: 'false',
        MIRROR_INSTANCES: 'https://m1.example',
        RESOLVER_BACKOFF_BASE_MS: '0',
      }),
    );
    const strata = createStrata(config, {
      runner: missingBinary,
      fetchImpl: mirror,
      probe: { source: 'test', sample: () => 0.1 },
      registry: new Registry(),
    });
    strata.start();

    const session = strata.sessions.getOrCreate('session-1');
    const { item, position } = await session.request('song b', 'alice');
    const next = await session.next();

    expect(position).toBe(1);
    expect(item).toEqual({
      title: 'Song B',
      artist: 'Band',
      duration: 200,
      canonicalUrl: 'https://www.youtube.com/watch?v=bbbbbbbbbbb',
      sourceKind: 'Mirror',
      requestedBy: 'alice',
    });
    expect(next).toEqual({ item, streamUrl: 'https://cdn.example/b.m4a' });
    expect(missingBinary).toHaveBeenCalledTimes(2);

    const exposition = await strata.registry.metrics();
    expect(exposition).toContain('strata_backend_attempts_total{backend="extractor",outcome="unavailable"} 2');
    expect(exposition).toContain('strata_resolutions_total{outcome="resolved"} 1');

    await strata.stop();
    expect(strata.sessions.size).toBe(0);
  });

  it('picks the memory probe the configuration names', () => {
    expect(selectMemoryProbe({ source: 'host', processLimitBytes: 1 }).source).toBe('host');
    expect(selectMemoryProbe({ source: 'process', processLimitBytes: 512 * 1024 * 1024 }).source).toBe('process');
  });
});
