import { EventEmitter } from 'node:events';
import type { AdaptiveCache } from '@strata/cache';
import { componentLogger } from '@strata/logger';
import { NoResultsError, classifyBackendError } from '../errors.js';
import type { BackendError, BackendFailureKind } from '../errors.js';
import { createAudioMetrics } from '../metrics.js';
import type { AudioMetrics } from '../metrics.js';
import type { AdapterContext, SourceAdapter } from '../sources/source-adapter.js';
import { canonicalWatchUrl, extractVideoId, isHttpUrl } from '../sources/youtube-url.js';
import { withRequester } from '../types.js';
import type { Item } from '../types.js';
import type { BackendEntry, BackendRegistry } from './backend-registry.js';
import { sleep, withDeadline } from './deadline.js';
import { correctQuery } from './query-normalizer.js';
import { rankResults } from './ranking.js';

const logger = componentLogger('resolver');

export type AttemptOutcome = 'success' | 'empty' | BackendFailureKind;

export interface ResolutionAttempt {
  backend: string;
  /** 1-based, per backend and query. */
  attempt: number;
  outcome: AttemptOutcome;
  durationMs: number;
  query: string;
  error?: string;
}

export interface ResolutionResult {
  items: Item[];
  /** Backend that produced the items; null for a cache hit. */
  backend: string | null;
  fromCache: boolean;
  /** The query that produced the items, which differs from the input after correction. */
  query: string;
  corrected: boolean;
  attempts: ResolutionAttempt[];
}

export interface ResolverOptions {
  backends: BackendRegistry;
  cache: AdaptiveCache<Item>;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  fallbackBudgetMs?: number;
  defaultLimit?: number;
  now?: () => number;
  metrics?: AudioMetrics;
}

/** Bookkeeping for one resolve call. */
interface CallState {
  attempts: ResolutionAttempt[];
  attempted: string[];
  /** Protocol and unavailable failures sit out the rest of the call. */
  skipped: Set<string>;
  answeredEmpty: boolean;
  lastError?: BackendError;
}

type BackendOperation<T> = (adapter: SourceAdapter, ctx: AdapterContext) => Promise<T>;

/**
 * Turns a query or URL into playable items by walking the enabled backends
 * in priority order, each under its own deadline and retry budget, with the
 * adaptive cache in front.
 *
 * Emits `attempt` with a `ResolutionAttempt` for every backend call.
 */
export class HierarchicalResolver extends EventEmitter {
  readonly metrics: AudioMetrics;

  private readonly backends: BackendRegistry;
  private readonly cache: AdaptiveCache<Item>;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly fallbackBudgetMs: number;
  private readonly defaultLimit: number;
  private readonly now: () => number;

  constructor(options: ResolverOptions) {
    super();
    this.backends = options.backends;
    this.cache = options.cache;
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.backoffMaxMs = options.backoffMaxMs ?? 4000;
    this.fallbackBudgetMs = options.fallbackBudgetMs ?? 20_000;
    this.defaultLimit = options.defaultLimit ?? 5;
    this.now = options.now ?? Date.now;
    this.metrics = options.metrics ?? createAudioMetrics();
  }

  async resolve(input: string, limit?: number, requestedBy = ''): Promise<Item[]> {
    const result = await this.resolveDetailed(input, limit, requestedBy);
    return result.items;
  }

  async resolveDetailed(input: string, limit = this.defaultLimit, requestedBy = ''): Promise<ResolutionResult> {
    const query = input.trim();
    const enabled = this.backends.snapshot().filter((backend) => backend.config.enabled);

    if (enabled.length === 0 || query.length === 0) {
      this.metrics.resolutions.inc({ outcome: 'no_results' });
      logger.warn({ query, enabledBackends: enabled.length }, 'Nothing to resolve with');
      throw new NoResultsError(query, []);
    }

    const state: CallState = { attempts: [], attempted: [], skipped: new Set(), answeredEmpty: false };
    const finish = (
      items: Item[],
      backend: string | null,
      fromCache: boolean,
      usedQuery: string,
    ): ResolutionResult => {
      this.metrics.resolutions.inc({ outcome: fromCache ? 'cached' : 'resolved' });
      logger.debug(
        { query, usedQuery, backend, fromCache, results: items.length, attempts: state.attempts.length },
        'Query resolved',
      );
      return { items, backend, fromCache, query: usedQuery, corrected: usedQuery !== query, attempts: state.attempts };
    };

    if (isHttpUrl(query)) {
      const resolved = await this.resolveUrl(query, enabled, requestedBy, state);
      if (resolved) return finish([resolved.item], resolved.backend, resolved.fromCache, query);
    }

    const cached = this.cache.getSearchResults(query, limit);
    if (cached && cached.length > 0) {
      return finish(
        cached.map((item) => withRequester(item, requestedBy)),
        null,
        true,
        query,
      );
    }

    const searchers = enabled.filter((backend) => backend.adapter.capabilities.search);
    const found = await this.searchChain(query, limit, searchers, requestedBy, state);
    if (found) {
      this.cache.putSearchResults(query, limit, [...found.items]);
      return finish(found.items, found.backend, false, query);
    }

    const corrected = correctQuery(query);
    if (corrected) {
      logger.info({ query, corrected }, 'Retrying with corrected query');
      const cachedCorrected = this.cache.getSearchResults(corrected, limit);
      if (cachedCorrected && cachedCorrected.length > 0) {
        this.cache.putSearchResults(query, limit, [...cachedCorrected]);
        return finish(
          cachedCorrected.map((item) => withRequester(item, requestedBy)),
          null,
          true,
          corrected,
        );
      }

      const budgetDeadline = this.now() + this.fallbackBudgetMs;
      const retried = await this.searchChain(corrected, limit, searchers, requestedBy, state, budgetDeadline);
      if (retried) {
        this.cache.putSearchResults(query, limit, [...retried.items]);
        this.cache.putSearchResults(corrected, limit, [...retried.items]);
        return finish(retried.items, retried.backend, false, corrected);
      }
    }

    throw this.exhausted(query, state);
  }

  /**
   * Playable stream for an item: stream cache first, then every enabled
   * stream-capable backend that accepts the URL.
   */
  async resolveStreamUrl(item: Item): Promise<string> {
    const cached = this.cache.getStreamUrl(item.canonicalUrl);
    if (cached) return cached;

    const candidates = this.backends
      .snapshot()
      .filter(
        ({ config, adapter }) =>
          config.enabled && adapter.capabilities.stream && adapter.isValidUrl(item.canonicalUrl),
      );

    const state: CallState = { attempts: [], attempted: [], skipped: new Set(), answeredEmpty: false };
    for (const backend of candidates) {
      const streamUrl = await this.callBackend(
        backend,
        item.canonicalUrl,
        (adapter, ctx) =>
          adapter.streamUrl ? adapter.streamUrl(item.canonicalUrl, ctx) : Promise.resolve(''),
        (value) => value.length === 0,
        item.requestedBy,
        state,
      );
      if (streamUrl) {
        this.cache.putStreamUrl(item.canonicalUrl, streamUrl);
        return streamUrl;
      }
    }

    throw this.exhausted(item.canonicalUrl, state);
  }

  private async resolveUrl(
    url: string,
    enabled: BackendEntry[],
    requestedBy: string,
    state: CallState,
  ): Promise<{ item: Item; backend: string | null; fromCache: boolean } | null> {
    const videoId = extractVideoId(url);
    const key = videoId ? canonicalWatchUrl(videoId) : url;

    const cached = this.cache.getMetadata(key);
    if (cached) {
      return { item: withRequester(cached, requestedBy), backend: null, fromCache: true };
    }

    const resolvers = enabled.filter(
      ({ adapter }) => adapter.capabilities.resolve && adapter.isValidUrl(url),
    );
    for (const backend of resolvers) {
      const item = await this.callBackend(
        backend,
        url,
        (adapter, ctx) => adapter.resolve(url, ctx),
        (value) => value === null,
        requestedBy,
        state,
      );
      if (item) {
        this.cache.putMetadata(key, item);
        if (item.canonicalUrl !== key) this.cache.putMetadata(item.canonicalUrl, item);
        return { item, backend: backend.config.name, fromCache: false };
      }
    }

    logger.info(
      { url, tried: resolvers.map(({ config }) => config.name) },
      'No backend resolved the URL, searching instead',
    );
    return null;
  }

  private async searchChain(
    query: string,
    limit: number,
    searchers: BackendEntry[],
    requestedBy: string,
    state: CallState,
    budgetDeadline?: number,
  ): Promise<{ items: Item[]; backend: string } | null> {
    for (const backend of searchers) {
      if (state.skipped.has(backend.config.name)) continue;
      if (budgetDeadline !== undefined && budgetDeadline - this.now() <= 0) {
        logger.warn({ query, budgetMs: this.fallbackBudgetMs }, 'Fallback budget spent');
        break;
      }

      const items = await this.callBackend(
        backend,
        query,
        (adapter, ctx) => adapter.search(query, limit, ctx),
        (value) => value.length === 0,
        requestedBy,
        state,
        budgetDeadline,
      );
      if (items) {
        return { items: rankResults(items, query).slice(0, limit), backend: backend.config.name };
      }
    }
    return null;
  }

  /**
   * Up to `maxRetries` attempts against one backend. Returns the first
   * non-empty answer, or undefined once the backend is done for this query.
   */
  private async callBackend<T>(
    backend: BackendEntry,
    query: string,
    operation: BackendOperation<T>,
    isEmpty: (value: T) => boolean,
    requestedBy: string,
    state: CallState,
    budgetDeadline?: number,
  ): Promise<T | undefined> {
    const { config, adapter } = backend;
    if (!state.attempted.includes(config.name)) state.attempted.push(config.name);

    for (let attempt = 1; attempt <= config.maxRetries; attempt += 1) {
      let timeoutMs = config.timeoutMs;
      if (budgetDeadline !== undefined) {
        const remaining = budgetDeadline - this.now();
        if (remaining <= 0) return undefined;
        timeoutMs = Math.min(timeoutMs, remaining);
      }

      const startedAt = this.now();
      try {
        const value = await withDeadline(
          (signal) => operation(adapter, { signal, requestedBy }),
          timeoutMs,
          config.name,
        );
        const empty = isEmpty(value);
        this.record(state, {
          backend: config.name,
          attempt,
          outcome: empty ? 'empty' : 'success',
          durationMs: this.now() - startedAt,
          query,
        });
        if (empty) {
          state.answeredEmpty = true;
          return undefined;
        }
        return value;
      } catch (error) {
        const failure = classifyBackendError(error, config.name);
        state.lastError = failure;
        this.record(state, {
          backend: config.name,
          attempt,
          outcome: failure.kind,
          durationMs: this.now() - startedAt,
          query,
          error: failure.message,
        });

        if (failure.kind !== 'timeout') {
          state.skipped.add(config.name);
          logger.warn(
            { backend: config.name, kind: failure.kind, error: failure.message },
            'Backend skipped for this call',
          );
          return undefined;
        }
        if (attempt < config.maxRetries) {
          await sleep(this.backoffDelay(attempt));
        }
      }
    }

    logger.warn(
      { backend: config.name, attempts: config.maxRetries, timeoutMs: config.timeoutMs },
      'Backend timed out on every attempt',
    );
    return undefined;
  }

  backoffDelay(attempt: number): number {
    return Math.min(this.backoffBaseMs * 2 ** (attempt - 1), this.backoffMaxMs);
  }

  private record(state: CallState, attempt: ResolutionAttempt): void {
    state.attempts.push(attempt);
    this.metrics.backendAttempts.inc({ backend: attempt.backend, outcome: attempt.outcome });
    this.metrics.backendLatency.observe({ backend: attempt.backend }, attempt.durationMs / 1000);
    this.emit('attempt', attempt);
  }

  private exhausted(query: string, state: CallState): NoResultsError | BackendError {
    if (state.answeredEmpty || !state.lastError) {
      this.metrics.resolutions.inc({ outcome: 'no_results' });
      logger.info({ query, attemptedBackends: state.attempted }, 'No backend found anything');
      return new NoResultsError(query, [...state.attempted]);
    }

    this.metrics.resolutions.inc({ outcome: 'failed' });
    state.lastError.attemptedBackends = [...state.attempted];
    logger.error(
      { query, attemptedBackends: state.attempted, error: state.lastError.message },
      'Every backend failed',
    );
    return state.lastError;
  }
}
