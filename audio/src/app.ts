import { AdaptiveCache, hostMemoryProbe, processMemoryProbe } from '@strata/cache';
import type { MemoryProbe } from '@strata/cache';
import type { AppConfig } from '@strata/config';
import { componentLogger } from '@strata/logger';
import { Registry } from 'prom-client';
import { createAudioMetrics } from './metrics.js';
import type { AudioMetrics } from './metrics.js';
import { BackendRegistry } from './resolver/backend-registry.js';
import { HierarchicalResolver } from './resolver/hierarchical-resolver.js';
import { SessionRegistry } from './sessions/session-registry.js';
import { createSourceAdapter } from './sources/index.js';
import type { AdapterDependencies } from './sources/index.js';
import type { Item } from './types.js';

const logger = componentLogger('app');

export interface Strata {
  readonly registry: Registry;
  readonly metrics: AudioMetrics;
  readonly cache: AdaptiveCache<Item>;
  readonly backends: BackendRegistry;
  readonly resolver: HierarchicalResolver;
  readonly sessions: SessionRegistry;
  start(): void;
  stop(): Promise<void>;
}

export interface StrataDependencies extends AdapterDependencies {
  registry?: Registry;
  probe?: MemoryProbe;
  now?: () => number;
  random?: () => number;
}

export function selectMemoryProbe(settings: AppConfig['cache']['probe']): MemoryProbe {
  return settings.source === 'process' ? processMemoryProbe(settings.processLimitBytes) : hostMemoryProbe();
}

/** Wires cache, backends, resolver and sessions from one configuration. */
export function createStrata(config: AppConfig, deps: StrataDependencies = {}): Strata {
  const registry = deps.registry ?? new Registry();
  const metrics = createAudioMetrics(registry);

  const cache = new AdaptiveCache<Item>({
    streams: config.cache.streams,
    metadata: config.cache.metadata,
    searches: config.cache.searches,
    maxMemoryBytes: config.cache.maxMemoryBytes,
    optimizeIntervalMs: config.cache.optimizeIntervalMs,
    pressure: config.cache.pressure,
    probe: deps.probe ?? selectMemoryProbe(config.cache.probe),
    now: deps.now,
    registry,
  });

  const backends = new BackendRegistry(
    config.backends.map((policy) => ({ config: policy, adapter: createSourceAdapter(policy, config, deps) })),
  );

  const resolver = new HierarchicalResolver({
    backends,
    cache,
    ...config.resolver,
    now: deps.now,
    metrics,
  });

  const sessions = new SessionRegistry({
    resolver,
    cache,
    policy: config.queue,
    metrics,
    now: deps.now,
    random: deps.random,
  });

  return {
    registry,
    metrics,
    cache,
    backends,
    resolver,
    sessions,
    start() {
      cache.start();
      logger.info(
        {
          backends: backends.snapshot().map(({ config: backend }) => ({
            name: backend.name,
            priority: backend.priority,
            enabled: backend.enabled,
          })),
          cacheMemoryBytes: config.cache.maxMemoryBytes,
        },
        'Strata started',
      );
    },
    async stop() {
      cache.stop();
      await sessions.shutdown();
      cache.clear();
      logger.info('Strata stopped');
    },
  };
}
