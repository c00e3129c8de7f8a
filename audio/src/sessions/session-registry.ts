import type { AdaptiveCache } from '@strata/cache';
import { componentLogger } from '@strata/logger';
import type { AudioMetrics } from '../metrics.js';
import type { QueuePolicy } from '../queue/queue-state.js';
import type { HierarchicalResolver } from '../resolver/hierarchical-resolver.js';
import { SessionMutex } from '../session-mutex.js';
import type { Item } from '../types.js';
import { PlaybackSession } from './playback-session.js';

const logger = componentLogger('sessions');

export interface SessionRegistryOptions {
  resolver: HierarchicalResolver;
  cache: AdaptiveCache<Item>;
  policy?: QueuePolicy;
  metrics?: AudioMetrics;
  now?: () => number;
  random?: () => number;
}

/** Owns every live session; all of them share one resolver, cache and mutex. */
export class SessionRegistry {
  private readonly sessions = new Map<string, PlaybackSession>();
  private readonly mutex = new SessionMutex();
  private closed = false;

  constructor(private readonly options: SessionRegistryOptions) {}

  get(sessionId: string): PlaybackSession | undefined {
    return this.sessions.get(sessionId);
  }

  getOrCreate(sessionId: string): PlaybackSession {
    if (this.closed) {
      throw new Error('Session registry has been shut down');
    }
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const session = new PlaybackSession(sessionId, {
      resolver: this.options.resolver,
      cache: this.options.cache,
      policy: this.options.policy,
      metrics: this.options.metrics ?? this.options.resolver.metrics,
      now: this.options.now,
      random: this.options.random,
      mutex: this.mutex,
    });
    this.sessions.set(sessionId, session);
    logger.debug({ sessionId }, 'Session created');
    return session;
  }

  /** Clears the session's queue and forgets it. */
  async remove(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    await session.clear();
    this.sessions.delete(sessionId);
    logger.debug({ sessionId }, 'Session removed');
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    const ids = this.ids();
    await Promise.all(ids.map((id) => this.remove(id)));
    logger.info({ sessions: ids.length }, 'Session registry shut down');
  }
}
