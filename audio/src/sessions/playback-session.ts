import type { AdaptiveCache } from '@strata/cache';
import { componentLogger, describeError } from '@strata/logger';
import type { Logger } from '@strata/logger';
import { NoResultsError } from '../errors.js';
import { ResilientQueue } from '../queue/resilient-queue.js';
import type { ResilientQueueOptions } from '../queue/resilient-queue.js';
import type { QueuePage, QueueState, QueueStats } from '../queue/queue-state.js';
import type { HierarchicalResolver } from '../resolver/hierarchical-resolver.js';
import type { Item, LoopMode } from '../types.js';

export interface PlaybackSessionOptions extends ResilientQueueOptions {
  resolver: HierarchicalResolver;
  cache: AdaptiveCache<Item>;
  /** Items whose stream cannot be resolved before next() gives up. */
  maxStreamAttempts?: number;
}

export interface NextTrack {
  item: Item;
  streamUrl: string;
}

/**
 * A listening session: requests go through the shared resolver into this
 * session's queue, and playback reports flow back into it.
 */
export class PlaybackSession {
  readonly queue: ResilientQueue;

  private readonly resolver: HierarchicalResolver;
  private readonly cache: AdaptiveCache<Item>;
  private readonly maxStreamAttempts: number;
  private readonly log: Logger;

  constructor(
    readonly id: string,
    options: PlaybackSessionOptions,
  ) {
    const { resolver, cache, maxStreamAttempts, ...queueOptions } = options;
    this.resolver = resolver;
    this.cache = cache;
    this.maxStreamAttempts = maxStreamAttempts ?? 5;
    this.queue = new ResilientQueue(id, queueOptions);
    this.log = componentLogger('session', { sessionId: id });
  }

  /** Resolves `text` and queues the best match. */
  async request(text: string, requestedBy: string): Promise<{ item: Item; position: number }> {
    const [best] = await this.resolver.resolve(text, undefined, requestedBy);
    if (!best) {
      throw new NoResultsError(text, []);
    }
    const position = await this.queue.enqueue(best);
    this.log.info({ title: best.title, url: best.canonicalUrl, requestedBy, position }, 'Item queued');
    return { item: best, position };
  }

  /**
   * Advances the queue and resolves a stream for the new current item. Items
   * whose stream cannot be resolved are reported as failures and skipped.
   */
  async next(): Promise<NextTrack | null> {
    for (let attempt = 0; attempt < this.maxStreamAttempts; attempt++) {
      const item = await this.queue.dequeue();
      if (!item) return null;

      try {
        const streamUrl = await this.resolver.resolveStreamUrl(item);
        return { item, streamUrl };
      } catch (error) {
        this.log.warn({ url: item.canonicalUrl, error: describeError(error) }, 'Stream resolution failed');
        await this.reportFailure(item.canonicalUrl, describeError(error).message);
      }
    }

    this.log.error({ attempts: this.maxStreamAttempts }, 'No playable stream found');
    return null;
  }

  async reportSuccess(url: string): Promise<void> {
    await this.queue.reportSuccess(url);
  }

  /**
   * Records a failure. A current item that may still be retried gets a fresh
   * stream and goes back to the head of the queue.
   */
  async reportFailure(url: string, reason?: string): Promise<number> {
    this.cache.invalidateStreamUrl(url);
    return this.queue.reportFailure(url, reason, { requeue: true });
  }

  setLoopMode(mode: LoopMode): Promise<void> {
    return this.queue.setLoopMode(mode);
  }

  setShuffle(enabled: boolean): Promise<void> {
    return this.queue.setShuffle(enabled);
  }

  toggleShuffle(): Promise<boolean> {
    return this.queue.toggleShuffle();
  }

  skip(count = 1): Promise<Item[]> {
    return this.queue.skip(count);
  }

  clear(): Promise<number> {
    return this.queue.clear();
  }

  snapshot(): QueueState {
    return this.queue.snapshot();
  }

  stats(): QueueStats {
    return this.queue.stats();
  }

  page(page: number, size?: number): QueuePage {
    return this.queue.page(page, size);
  }
}
