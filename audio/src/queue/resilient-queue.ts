import { EventEmitter } from 'node:events';
import { componentLogger } from '@strata/logger';
import type { Logger } from '@strata/logger';
import { createAudioMetrics } from '../metrics.js';
import type { AudioMetrics } from '../metrics.js';
import { SessionMutex } from '../session-mutex.js';
import type { Item, LoopMode } from '../types.js';
import {
  DEFAULT_QUEUE_POLICY,
  createQueueState,
  pageOf,
  queueStats,
  quarantinedUrls,
  totalDuration,
  transition,
} from './queue-state.js';
import type {
  QueueAction,
  QueueEvent,
  QueueOutcome,
  QueuePage,
  QueuePolicy,
  QueueState,
  QueueStats,
  TransitionEnv,
} from './queue-state.js';

export interface ResilientQueueOptions {
  policy?: QueuePolicy;
  /** Shared across sessions; keyed by session id. */
  mutex?: SessionMutex;
  now?: () => number;
  random?: () => number;
  metrics?: AudioMetrics;
}

type OutcomeType = QueueOutcome['type'];

function isOutcome<K extends OutcomeType>(
  outcome: QueueOutcome,
  type: K,
): outcome is Extract<QueueOutcome, { type: K }> {
  return outcome.type === type;
}

/**
 * One session's queue. Every change goes through `transition` while the
 * session's mutex is held, so concurrent callers see each step in order.
 *
 * Events: `quarantined` (item, failures), `recoveryMode` (active,
 * consecutiveFailures), `readmitted` (items).
 */
export class ResilientQueue extends EventEmitter {
  readonly policy: QueuePolicy;
  readonly metrics: AudioMetrics;

  private state: QueueState = createQueueState();
  private readonly mutex: SessionMutex;
  private readonly env: TransitionEnv;
  private readonly log: Logger;

  constructor(
    readonly sessionId: string,
    options: ResilientQueueOptions = {},
  ) {
    super();
    this.policy = options.policy ?? DEFAULT_QUEUE_POLICY;
    this.mutex = options.mutex ?? new SessionMutex();
    this.metrics = options.metrics ?? createAudioMetrics();
    this.env = {
      sessionId,
      policy: this.policy,
      now: options.now ?? Date.now,
      random: options.random ?? Math.random,
    };
    this.log = componentLogger('queue', { sessionId });
  }

  /** 1-based position of the new item. */
  async enqueue(item: Item, position: 'head' | 'tail' = 'tail'): Promise<number> {
    const outcome = await this.dispatch({ type: 'enqueue', item, position }, 'enqueued');
    return outcome.position;
  }

  /** Advances to the next playable item, or null when nothing may play now. */
  async dequeue(): Promise<Item | null> {
    const outcome = await this.dispatch({ type: 'dequeue' }, 'dequeued');
    return outcome.item;
  }

  async reportSuccess(url: string): Promise<void> {
    await this.dispatch({ type: 'reportSuccess', url }, 'reported');
  }

  /**
   * Failures recorded for `url` so far, this one included. With `requeue`, a
   * current item matching `url` that may still be retried goes back to the head
   * under the same lock.
   */
  async reportFailure(url: string, reason?: string, options: { requeue?: boolean } = {}): Promise<number> {
    const outcome = await this.dispatch({ type: 'reportFailure', url, reason, requeue: options.requeue }, 'reported');
    this.metrics.queueFailures.inc();
    this.log.warn({ url, reason, failures: outcome.failures }, 'Playback failure reported');
    if (outcome.requeued) {
      this.log.info({ url, failures: outcome.failures }, 'Requeued for retry');
    }
    return outcome.failures;
  }

  /**
   * Puts the current item back at the head when it may still be retried.
   * Given a URL, does nothing unless that URL is still current.
   */
  async requeueCurrent(url?: string): Promise<Item | null> {
    const outcome = await this.dispatch({ type: 'requeueCurrent', url }, 'requeued');
    return outcome.item;
  }

  async setLoopMode(mode: LoopMode): Promise<void> {
    await this.dispatch({ type: 'setLoopMode', mode }, 'updated');
  }

  async setShuffle(enabled: boolean): Promise<void> {
    await this.dispatch({ type: 'setShuffle', enabled }, 'updated');
  }

  /** Flips shuffle and returns the new setting. */
  async toggleShuffle(): Promise<boolean> {
    return (await this.dispatch({ type: 'toggleShuffle' }, 'shuffled')).enabled;
  }

  async skip(count = 1): Promise<Item[]> {
    return (await this.dispatch({ type: 'skip', count }, 'removed')).items;
  }

  async clear(): Promise<number> {
    return (await this.dispatch({ type: 'clear' }, 'removed')).items.length;
  }

  async removeDuplicates(): Promise<number> {
    return (await this.dispatch({ type: 'removeDuplicates' }, 'removed')).items.length;
  }

  /** Removes the pending item at a 0-based index. */
  async remove(index: number): Promise<Item | null> {
    const [removed] = (await this.dispatch({ type: 'remove', index }, 'removed')).items;
    return removed ?? null;
  }

  snapshot(): QueueState {
    return this.state;
  }

  get current(): Item | null {
    return this.state.current;
  }

  get size(): number {
    return this.state.pending.length;
  }

  stats(): QueueStats {
    return queueStats(this.state, this.policy);
  }

  quarantined(): string[] {
    return quarantinedUrls(this.state, this.policy);
  }

  totalDuration(): number {
    return totalDuration(this.state);
  }

  page(page: number, size = 10): QueuePage {
    return pageOf(this.state, page, size);
  }

  private dispatch<K extends OutcomeType>(
    action: QueueAction,
    expected: K,
  ): Promise<Extract<QueueOutcome, { type: K }>> {
    return this.mutex.run(this.sessionId, () => {
      const result = transition(this.state, action, this.env);
      this.state = result.state;
      result.events.forEach((event) => this.publish(event));

      if (!isOutcome(result.outcome, expected)) {
        throw new Error(`Queue action ${action.type} produced ${result.outcome.type}, expected ${expected}`);
      }
      return result.outcome;
    });
  }

  private publish(event: QueueEvent): void {
    switch (event.type) {
      case 'quarantined':
        this.metrics.quarantines.inc();
        this.log.warn(
          { url: event.item.canonicalUrl, title: event.item.title, failures: event.failures },
          'Item quarantined',
        );
        this.emit('quarantined', event.item, event.failures);
        break;
      case 'recoveryMode':
        this.log.info({ active: event.active, consecutiveFailures: event.consecutiveFailures }, 'Recovery mode changed');
        this.emit('recoveryMode', event.active, event.consecutiveFailures);
        break;
      case 'readmitted':
        this.metrics.readmissions.inc(event.items.length);
        this.log.info({ urls: event.items.map((item) => item.canonicalUrl) }, 'Failed items readmitted');
        this.emit('readmitted', event.items);
        break;
    }
  }
}
