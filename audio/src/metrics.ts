import { Counter, Histogram, Registry } from 'prom-client';

export interface AudioMetrics {
  readonly registry: Registry;
  backendAttempts: Counter<'backend' | 'outcome'>;
  backendLatency: Histogram<'backend'>;
  resolutions: Counter<'outcome'>;
  queueFailures: Counter;
  quarantines: Counter;
  readmissions: Counter;
}

export function createAudioMetrics(registry: Registry = new Registry()): AudioMetrics {
  return {
    registry,
    backendAttempts: new Counter({
      name: 'strata_backend_attempts_total',
      help: 'Backend calls made by the resolver, by outcome',
      labelNames: ['backend', 'outcome'],
      registers: [registry],
    }),
    backendLatency: new Histogram({
      name: 'strata_backend_latency_seconds',
      help: 'Backend call duration',
      labelNames: ['backend'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 20],
      registers: [registry],
    }),
    resolutions: new Counter({
      name: 'strata_resolutions_total',
      help: 'Resolver calls, by how they ended',
      labelNames: ['outcome'],
      registers: [registry],
    }),
    queueFailures: new Counter({
      name: 'strata_queue_failures_total',
      help: 'Playback failures reported to session queues',
      registers: [registry],
    }),
    quarantines: new Counter({
      name: 'strata_queue_quarantines_total',
      help: 'Items diverted to the failed list',
      registers: [registry],
    }),
    readmissions: new Counter({
      name: 'strata_queue_readmissions_total',
      help: 'Failed items returned to a queue by recovery',
      registers: [registry],
    }),
  };
}
