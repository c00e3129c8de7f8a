import { z } from 'zod';

// z.coerce.boolean() turns the string "false" into true, so parse the usual spellings by hand
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      if (typeof value === 'boolean') return value;
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, received "${value}"` });
      return z.NEVER;
    });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const ratio = (fallback: number) => z.coerce.number().gt(0).lte(1).default(fallback);

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

export const DEFAULT_MIRROR_INSTANCES = [
  'https://yewtu.be',
  'https://inv.nadeko.net',
  'https://invidious.nerdvpn.de',
];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Local extractor process (yt-dlp)
  EXTRACTOR_ENABLED: booleanFlag(true),
  EXTRACTOR_PRIORITY: nonNegativeInt(1),
  EXTRACTOR_TIMEOUT_MS: positiveInt(10000),
  EXTRACTOR_MAX_RETRIES: positiveInt(1),
  EXTRACTOR_BINARY: z.string().default('yt-dlp'),
  EXTRACTOR_SOCKET_TIMEOUT_S: positiveInt(15),
  EXTRACTOR_COOKIES_FILE: z.string().optional(),

  // Public search API (YouTube Data API v3)
  PUBLIC_API_ENABLED: booleanFlag(true),
  PUBLIC_API_PRIORITY: nonNegativeInt(2),
  PUBLIC_API_TIMEOUT_MS: positiveInt(3000),
  PUBLIC_API_MAX_RETRIES: positiveInt(1),
  PUBLIC_API_KEY: z.string().optional(),
  PUBLIC_API_BASE_URL: z.string().url().default('https://www.googleapis.com/youtube/v3'),

  // Mirror instances (Invidious API)
  MIRROR_ENABLED: booleanFlag(true),
  MIRROR_PRIORITY: nonNegativeInt(3),
  MIRROR_TIMEOUT_MS: positiveInt(5000),
  MIRROR_MAX_RETRIES: positiveInt(2),
  MIRROR_INSTANCES: commaList,
  MIRROR_AUTH_TOKEN: z.string().optional(),

  // Search-results page scraper
  FEED_ENABLED: booleanFlag(true),
  FEED_PRIORITY: nonNegativeInt(4),
  FEED_TIMEOUT_MS: positiveInt(8000),
  FEED_MAX_RETRIES: positiveInt(1),
  FEED_BASE_URL: z.string().url().default('https://www.youtube.com'),

  // Plain media URLs
  DIRECT_ENABLED: booleanFlag(true),
  DIRECT_PRIORITY: nonNegativeInt(5),
  DIRECT_TIMEOUT_MS: positiveInt(5000),
  DIRECT_MAX_RETRIES: positiveInt(1),

  // Resolver
  RESOLVER_BACKOFF_BASE_MS: nonNegativeInt(500),
  RESOLVER_BACKOFF_MAX_MS: nonNegativeInt(4000),
  RESOLVER_FALLBACK_BUDGET_MS: positiveInt(20000),
  RESOLVER_DEFAULT_LIMIT: positiveInt(5),

  // Adaptive cache
  CACHE_STREAM_TTL_MS: positiveInt(3_600_000),
  CACHE_METADATA_TTL_MS: positiveInt(7_200_000),
  CACHE_SEARCH_TTL_MS: positiveInt(1_800_000),
  CACHE_STREAM_MAX_ENTRIES: positiveInt(1000),
  CACHE_METADATA_MAX_ENTRIES: positiveInt(5000),
  CACHE_SEARCH_MAX_ENTRIES: positiveInt(500),
  CACHE_MAX_MEMORY_MB: positiveInt(256),
  CACHE_OPTIMIZE_INTERVAL_MS: positiveInt(300_000),
  CACHE_MEMORY_PROBE: z.enum(['host', 'process']).default('host'),
  CACHE_PROCESS_MEMORY_LIMIT_MB: positiveInt(512),
  MEMORY_PRESSURE_MEDIUM: ratio(0.7),
  MEMORY_PRESSURE_HIGH: ratio(0.85),
  MEMORY_PRESSURE_CRITICAL: ratio(0.95),

  // Resilient queue
  QUEUE_MAX_SIZE: positiveInt(1000),
  QUEUE_MAX_HISTORY: positiveInt(50),
  QUEUE_MAX_RETRIES: positiveInt(3),
  RECOVERY_COOLDOWN_MS: nonNegativeInt(300_000),
  RECOVERY_BATCH_SIZE: positiveInt(3),
  RECOVERY_CONSECUTIVE_THRESHOLD: positiveInt(3),
  RECOVERY_COOLDOWN_POLICY: z.enum(['flat', 'exponential']).default('flat'),
  RECOVERY_MAX_COOLDOWN_MS: positiveInt(3_600_000),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export const env: Env = parseEnv(process.env);

export type BackendKind = 'extractor' | 'public-api' | 'mirror' | 'feed' | 'direct';

export interface BackendPolicy {
  name: string;
  kind: BackendKind;
  priority: number;
  timeoutMs: number;
  maxRetries: number;
  enabled: boolean;
}

export interface CacheClassSettings {
  ttlMs: number;
  maxEntries: number;
}

export type MemoryPressureThresholds = {
  medium: number;
  high: number;
  critical: number;
};

export type RecoveryCooldownPolicy = 'flat' | 'exponential';

export interface AppConfig {
  logLevel: Env['LOG_LEVEL'];
  backends: BackendPolicy[];
  extractor: { binary: string; socketTimeoutSeconds: number; cookiesFile?: string };
  publicApi: { apiKey?: string; baseUrl: string };
  mirror: { instances: string[]; authToken?: string };
  feed: { baseUrl: string };
  resolver: { backoffBaseMs: number; backoffMaxMs: number; fallbackBudgetMs: number; defaultLimit: number };
  cache: {
    streams: CacheClassSettings;
    metadata: CacheClassSettings;
    searches: CacheClassSettings;
    maxMemoryBytes: number;
    optimizeIntervalMs: number;
    pressure: MemoryPressureThresholds;
    probe: { source: 'host' | 'process'; processLimitBytes: number };
  };
  queue: {
    maxSize: number;
    maxHistory: number;
    maxRetries: number;
    recovery: {
      cooldownMs: number;
      batchSize: number;
      consecutiveFailureThreshold: number;
      policy: RecoveryCooldownPolicy;
      maxCooldownMs: number;
    };
  };
}

/**
 * Turn the flat environment into the structured configuration the services
 * consume. Read once at startup; backend policies stay mutable afterwards
 * through the resolver's backend registry, not through this object.
 */
export function buildAppConfig(source: Env = env): AppConfig {
  const { MEMORY_PRESSURE_MEDIUM, MEMORY_PRESSURE_HIGH, MEMORY_PRESSURE_CRITICAL } = source;
  if (!(MEMORY_PRESSURE_MEDIUM < MEMORY_PRESSURE_HIGH && MEMORY_PRESSURE_HIGH < MEMORY_PRESSURE_CRITICAL)) {
    throw new Error('Memory pressure thresholds must satisfy MEDIUM < HIGH < CRITICAL');
  }

  const mirrorInstances = source.MIRROR_INSTANCES.length > 0 ? source.MIRROR_INSTANCES : DEFAULT_MIRROR_INSTANCES;

  const backends: BackendPolicy[] = [
    {
      name: 'extractor',
      kind: 'extractor',
      priority: source.EXTRACTOR_PRIORITY,
      timeoutMs: source.EXTRACTOR_TIMEOUT_MS,
      maxRetries: source.EXTRACTOR_MAX_RETRIES,
      enabled: source.EXTRACTOR_ENABLED,
    },
    {
      name: 'public-api',
      kind: 'public-api',
      priority: source.PUBLIC_API_PRIORITY,
      timeoutMs: source.PUBLIC_API_TIMEOUT_MS,
      maxRetries: source.PUBLIC_API_MAX_RETRIES,
      // no key, no backend
      enabled: source.PUBLIC_API_ENABLED && Boolean(source.PUBLIC_API_KEY),
    },
    {
      name: 'mirror',
      kind: 'mirror',
      priority: source.MIRROR_PRIORITY,
      timeoutMs: source.MIRROR_TIMEOUT_MS,
      maxRetries: source.MIRROR_MAX_RETRIES,
      enabled: source.MIRROR_ENABLED,
    },
    {
      name: 'feed',
      kind: 'feed',
      priority: source.FEED_PRIORITY,
      timeoutMs: source.FEED_TIMEOUT_MS,
      maxRetries: source.FEED_MAX_RETRIES,
      enabled: source.FEED_ENABLED,
    },
    {
      name: 'direct',
      kind: 'direct',
      priority: source.DIRECT_PRIORITY,
      timeoutMs: source.DIRECT_TIMEOUT_MS,
      maxRetries: source.DIRECT_MAX_RETRIES,
      enabled: source.DIRECT_ENABLED,
    },
  ];

  return {
    logLevel: source.LOG_LEVEL,
    backends,
    extractor: {
      binary: source.EXTRACTOR_BINARY,
      socketTimeoutSeconds: source.EXTRACTOR_SOCKET_TIMEOUT_S,
      cookiesFile: source.EXTRACTOR_COOKIES_FILE,
    },
    publicApi: { apiKey: source.PUBLIC_API_KEY, baseUrl: source.PUBLIC_API_BASE_URL },
    mirror: { instances: mirrorInstances, authToken: source.MIRROR_AUTH_TOKEN },
    feed: { baseUrl: source.FEED_BASE_URL },
    resolver: {
      backoffBaseMs: source.RESOLVER_BACKOFF_BASE_MS,
      backoffMaxMs: source.RESOLVER_BACKOFF_MAX_MS,
      fallbackBudgetMs: source.RESOLVER_FALLBACK_BUDGET_MS,
      defaultLimit: source.RESOLVER_DEFAULT_LIMIT,
    },
    cache: {
      streams: { ttlMs: source.CACHE_STREAM_TTL_MS, maxEntries: source.CACHE_STREAM_MAX_ENTRIES },
      metadata: { ttlMs: source.CACHE_METADATA_TTL_MS, maxEntries: source.CACHE_METADATA_MAX_ENTRIES },
      searches: { ttlMs: source.CACHE_SEARCH_TTL_MS, maxEntries: source.CACHE_SEARCH_MAX_ENTRIES },
      maxMemoryBytes: source.CACHE_MAX_MEMORY_MB * 1024 * 1024,
      optimizeIntervalMs: source.CACHE_OPTIMIZE_INTERVAL_MS,
      pressure: {
        medium: MEMORY_PRESSURE_MEDIUM,
        high: MEMORY_PRESSURE_HIGH,
        critical: MEMORY_PRESSURE_CRITICAL,
      },
      probe: {
        source: source.CACHE_MEMORY_PROBE,
        processLimitBytes: source.CACHE_PROCESS_MEMORY_LIMIT_MB * 1024 * 1024,
      },
    },
    queue: {
      maxSize: source.QUEUE_MAX_SIZE,
      maxHistory: source.QUEUE_MAX_HISTORY,
      maxRetries: source.QUEUE_MAX_RETRIES,
      recovery: {
        cooldownMs: source.RECOVERY_COOLDOWN_MS,
        batchSize: source.RECOVERY_BATCH_SIZE,
        consecutiveFailureThreshold: source.RECOVERY_CONSECUTIVE_THRESHOLD,
        policy: source.RECOVERY_COOLDOWN_POLICY,
        maxCooldownMs: source.RECOVERY_MAX_COOLDOWN_MS,
      },
    },
  };
}
