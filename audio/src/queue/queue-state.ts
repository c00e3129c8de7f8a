import type { RecoveryCooldownPolicy } from '@strata/config';
import { QuarantinedItemError, QueueFullError } from '../errors.js';
import type { Item, LoopMode } from '../types.js';

export interface RecoveryState {
  readonly consecutiveFailures: number;
  readonly lastFailureTime: number | null;
  readonly recoveryModeActive: boolean;
  /** canonicalUrl -> times recovery has re-admitted it */
  readonly readmissions: ReadonlyMap<string, number>;
}

export interface QueueState {
  readonly pending: readonly Item[];
  readonly current: Item | null;
  readonly history: readonly Item[];
  readonly loopMode: LoopMode;
  readonly shuffle: boolean;
  /** canonicalUrl -> failures since the last success */
  readonly failureCounts: ReadonlyMap<string, number>;
  readonly failedItems: readonly Item[];
  readonly recovery: RecoveryState;
}

export interface QueuePolicy {
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
}

export const DEFAULT_QUEUE_POLICY: QueuePolicy = {
  maxSize: 1000,
  maxHistory: 50,
  maxRetries: 3,
  recovery: {
    cooldownMs: 5 * 60 * 1000,
    batchSize: 3,
    consecutiveFailureThreshold: 3,
    policy: 'flat',
    maxCooldownMs: 60 * 60 * 1000,
  },
};

export interface TransitionEnv {
  sessionId: string;
  policy: QueuePolicy;
  now(): number;
  random(): number;
}

export type QueueAction =
  | { type: 'enqueue'; item: Item; position?: 'head' | 'tail' }
  | { type: 'dequeue' }
  | { type: 'reportSuccess'; url: string }
  | { type: 'reportFailure'; url: string; reason?: string; requeue?: boolean }
  | { type: 'requeueCurrent'; url?: string }
  | { type: 'setLoopMode'; mode: LoopMode }
  | { type: 'setShuffle'; enabled: boolean }
  | { type: 'toggleShuffle' }
  | { type: 'skip'; count: number }
  | { type: 'clear' }
  | { type: 'removeDuplicates' }
  | { type: 'remove'; index: number };

export type QueueOutcome =
  | { type: 'enqueued'; position: number; readmitted: boolean }
  | { type: 'dequeued'; item: Item | null; recovered: boolean }
  | { type: 'reported'; failures: number; quarantined: boolean; requeued: Item | null }
  | { type: 'requeued'; item: Item | null }
  | { type: 'updated' }
  | { type: 'shuffled'; enabled: boolean }
  | { type: 'removed'; items: Item[] };

export type QueueEvent =
  | { type: 'quarantined'; item: Item; failures: number }
  | { type: 'recoveryMode'; active: boolean; consecutiveFailures: number }
  | { type: 'readmitted'; items: Item[] };

export interface TransitionResult {
  state: QueueState;
  outcome: QueueOutcome;
  events: QueueEvent[];
}

export function createQueueState(): QueueState {
  return {
    pending: [],
    current: null,
    history: [],
    loopMode: 'off',
    shuffle: false,
    failureCounts: new Map(),
    failedItems: [],
    recovery: {
      consecutiveFailures: 0,
      lastFailureTime: null,
      recoveryModeActive: false,
      readmissions: new Map(),
    },
  };
}

export function failureCount(state: QueueState, url: string): number {
  return state.failureCounts.get(url) ?? 0;
}

export function isQuarantined(state: QueueState, url: string, policy: QueuePolicy): boolean {
  return failureCount(state, url) >= policy.maxRetries || state.failedItems.some((item) => item.canonicalUrl === url);
}

/** Every URL currently kept out of automatic selection. */
export function quarantinedUrls(state: QueueState, policy: QueuePolicy): string[] {
  const urls = new Set<string>();
  for (const [url, count] of state.failureCounts) {
    if (count >= policy.maxRetries) urls.add(url);
  }
  for (const item of state.failedItems) urls.add(item.canonicalUrl);
  return [...urls];
}

/** How long `url` waits after the last failure before recovery may re-admit it. */
export function recoveryCooldown(state: QueueState, url: string, policy: QueuePolicy): number {
  const { cooldownMs, maxCooldownMs } = policy.recovery;
  if (policy.recovery.policy === 'flat') return cooldownMs;
  const readmissions = state.recovery.readmissions.get(url) ?? 0;
  return Math.min(cooldownMs * 2 ** readmissions, maxCooldownMs);
}

function cooldownElapsed(state: QueueState, url: string, env: TransitionEnv): boolean {
  const { lastFailureTime } = state.recovery;
  if (lastFailureTime === null) return true;
  return env.now() - lastFailureTime >= recoveryCooldown(state, url, env.policy);
}

/**
 * Working copy for one transition. Collections are copied on creation so the
 * incoming state is never touched.
 */
class Draft {
  pending: Item[];
  current: Item | null;
  history: Item[];
  loopMode: LoopMode;
  shuffle: boolean;
  failureCounts: Map<string, number>;
  failedItems: Item[];
  consecutiveFailures: number;
  lastFailureTime: number | null;
  recoveryModeActive: boolean;
  readmissions: Map<string, number>;
  readonly events: QueueEvent[] = [];

  constructor(
    state: QueueState,
    private readonly env: TransitionEnv,
  ) {
    this.pending = [...state.pending];
    this.current = state.current;
    this.history = [...state.history];
    this.loopMode = state.loopMode;
    this.shuffle = state.shuffle;
    this.failureCounts = new Map(state.failureCounts);
    this.failedItems = [...state.failedItems];
    this.consecutiveFailures = state.recovery.consecutiveFailures;
    this.lastFailureTime = state.recovery.lastFailureTime;
    this.recoveryModeActive = state.recovery.recoveryModeActive;
    this.readmissions = new Map(state.recovery.readmissions);
  }

  get policy(): QueuePolicy {
    return this.env.policy;
  }

  count(url: string): number {
    return this.failureCounts.get(url) ?? 0;
  }

  pushHistory(item: Item): void {
    this.history.push(item);
    const overflow = this.history.length - this.policy.maxHistory;
    if (overflow > 0) this.history.splice(0, overflow);
  }

  divert(item: Item): void {
    this.failedItems.push(item);
    this.events.push({ type: 'quarantined', item, failures: this.count(item.canonicalUrl) });
  }

  setRecoveryMode(active: boolean): void {
    if (this.recoveryModeActive === active) return;
    this.recoveryModeActive = active;
    this.events.push({ type: 'recoveryMode', active, consecutiveFailures: this.consecutiveFailures });
  }

  readmit(items: Item[]): void {
    if (items.length === 0) return;
    const urls = new Set(items.map((item) => item.canonicalUrl));
    this.failedItems = this.failedItems.filter((item) => !items.includes(item));
    for (const url of urls) {
      this.failureCounts.delete(url);
      this.readmissions.set(url, (this.readmissions.get(url) ?? 0) + 1);
    }
    this.events.push({ type: 'readmitted', items });
  }

  /** Take the next playable item out of `pending`, diverting quarantined ones. */
  select(): Item | null {
    const scans = this.pending.length;
    for (let scanned = 0; scanned < scans && this.pending.length > 0; scanned += 1) {
      const index = this.shuffle ? Math.floor(this.env.random() * this.pending.length) : 0;
      const [candidate] = this.pending.splice(Math.min(index, this.pending.length - 1), 1);
      if (!candidate) break;

      if (this.count(candidate.canonicalUrl) >= this.policy.maxRetries) {
        this.divert(candidate);
        continue;
      }
      return candidate;
    }
    return null;
  }

  build(): QueueState {
    return {
      pending: this.pending,
      current: this.current,
      history: this.history,
      loopMode: this.loopMode,
      shuffle: this.shuffle,
      failureCounts: this.failureCounts,
      failedItems: this.failedItems,
      recovery: {
        consecutiveFailures: this.consecutiveFailures,
        lastFailureTime: this.lastFailureTime,
        recoveryModeActive: this.recoveryModeActive,
        readmissions: this.readmissions,
      },
    };
  }
}

function enqueue(draft: Draft, state: QueueState, item: Item, position: 'head' | 'tail', env: TransitionEnv) {
  if (draft.pending.length >= env.policy.maxSize) {
    throw new QueueFullError(env.sessionId, env.policy.maxSize);
  }

  const url = item.canonicalUrl;
  let readmitted = false;
  if (isQuarantined(state, url, env.policy)) {
    if (!(draft.recoveryModeActive && cooldownElapsed(state, url, env))) {
      throw new QuarantinedItemError(url, draft.count(url), env.sessionId);
    }
    // the new entry replaces any diverted copies of the same URL
    draft.readmit(draft.failedItems.filter((failed) => failed.canonicalUrl === url));
    draft.failureCounts.delete(url);
    readmitted = true;
  }

  if (position === 'head') {
    draft.pending.unshift(item);
  } else {
    draft.pending.push(item);
  }
  return { type: 'enqueued' as const, position: position === 'head' ? 1 : draft.pending.length, readmitted };
}

function dequeue(draft: Draft, state: QueueState, env: TransitionEnv): QueueOutcome {
  const previous = draft.current;
  if (previous) {
    const count = draft.count(previous.canonicalUrl);
    if (draft.loopMode === 'track' && count < env.policy.maxRetries) {
      return { type: 'dequeued', item: previous, recovered: false };
    }

    draft.current = null;
    if (count >= env.policy.maxRetries) {
      draft.divert(previous);
    } else if (draft.loopMode === 'queue') {
      draft.pending.push(previous);
    } else {
      draft.pushHistory(previous);
    }
  }

  const next = draft.select();
  if (next) {
    draft.current = next;
    return { type: 'dequeued', item: next, recovered: false };
  }

  if (draft.failedItems.length === 0) {
    return { type: 'dequeued', item: null, recovered: false };
  }

  // Recovery: nothing playable is left but some items failed earlier
  draft.setRecoveryMode(true);
  const eligible = draft.failedItems.filter((item) => cooldownElapsed(state, item.canonicalUrl, env));
  if (eligible.length === 0) {
    return { type: 'dequeued', item: null, recovered: false };
  }

  const batch = eligible.slice(0, env.policy.recovery.batchSize);
  draft.readmit(batch);
  draft.pending.push(...batch);

  const recovered = draft.select();
  draft.current = recovered;
  return { type: 'dequeued', item: recovered, recovered: recovered !== null };
}

function requeueCurrent(draft: Draft, env: TransitionEnv, url?: string): Item | null {
  const item = draft.current;
  if (!item || (url !== undefined && item.canonicalUrl !== url)) return null;
  if (draft.count(item.canonicalUrl) >= env.policy.maxRetries) return null;
  draft.pending.unshift(item);
  draft.current = null;
  return item;
}

/**
 * With `requeue`, a current item that may still be retried goes back to the
 * head in the same step, so no dequeue can slip in between.
 */
function reportFailure(draft: Draft, url: string, requeue: boolean, env: TransitionEnv): QueueOutcome {
  const failures = draft.count(url) + 1;
  draft.failureCounts.set(url, failures);
  draft.consecutiveFailures += 1;
  draft.lastFailureTime = env.now();

  if (draft.consecutiveFailures >= env.policy.recovery.consecutiveFailureThreshold) {
    draft.setRecoveryMode(true);
  }

  let quarantined = false;
  if (failures >= env.policy.maxRetries && draft.current?.canonicalUrl === url) {
    draft.divert(draft.current);
    draft.current = null;
    quarantined = true;
  }
  const requeued = requeue && !quarantined ? requeueCurrent(draft, env, url) : null;
  return { type: 'reported', failures, quarantined, requeued };
}

function reportSuccess(draft: Draft, url: string): QueueOutcome {
  draft.failureCounts.delete(url);
  draft.consecutiveFailures = 0;
  draft.setRecoveryMode(false);
  return { type: 'reported', failures: 0, quarantined: false, requeued: null };
}

/**
 * The only way queue state changes. Pure: the incoming state is left as it
 * was and the result carries the next state, the action's outcome and any
 * events it raised. Throws `QueueFullError` / `QuarantinedItemError` on a
 * refused enqueue.
 */
export function transition(state: QueueState, action: QueueAction, env: TransitionEnv): TransitionResult {
  const draft = new Draft(state, env);
  const outcome = apply(draft, state, action, env);
  return { state: draft.build(), outcome, events: draft.events };
}

function apply(draft: Draft, state: QueueState, action: QueueAction, env: TransitionEnv): QueueOutcome {
  switch (action.type) {
    case 'enqueue':
      return enqueue(draft, state, action.item, action.position ?? 'tail', env);
    case 'dequeue':
      return dequeue(draft, state, env);
    case 'reportSuccess':
      return reportSuccess(draft, action.url);
    case 'reportFailure':
      return reportFailure(draft, action.url, action.requeue ?? false, env);
    case 'requeueCurrent':
      return { type: 'requeued', item: requeueCurrent(draft, env, action.url) };
    case 'setLoopMode':
      draft.loopMode = action.mode;
      return { type: 'updated' };
    case 'setShuffle':
      draft.shuffle = action.enabled;
      return { type: 'updated' };
    case 'toggleShuffle':
      draft.shuffle = !draft.shuffle;
      return { type: 'shuffled', enabled: draft.shuffle };
    case 'skip': {
      const skipped = draft.pending.splice(0, Math.max(0, action.count));
      skipped.forEach((item) => draft.pushHistory(item));
      return { type: 'removed', items: skipped };
    }
    case 'clear': {
      const removed = [...draft.pending, ...draft.failedItems];
      draft.pending = [];
      draft.failedItems = [];
      draft.failureCounts.clear();
      draft.readmissions.clear();
      draft.consecutiveFailures = 0;
      draft.lastFailureTime = null;
      draft.setRecoveryMode(false);
      return { type: 'removed', items: removed };
    }
    case 'removeDuplicates': {
      const seen = new Set<string>();
      const removed: Item[] = [];
      draft.pending = draft.pending.filter((item) => {
        if (seen.has(item.canonicalUrl)) {
          removed.push(item);
          return false;
        }
        seen.add(item.canonicalUrl);
        return true;
      });
      return { type: 'removed', items: removed };
    }
    case 'remove': {
      if (!Number.isInteger(action.index) || action.index < 0 || action.index >= draft.pending.length) {
        return { type: 'removed', items: [] };
      }
      return { type: 'removed', items: draft.pending.splice(action.index, 1) };
    }
    default: {
      const unreachable: never = action;
      throw new Error(`Unknown queue action: ${JSON.stringify(unreachable)}`);
    }
  }
}

export interface QueueStats {
  pending: number;
  current: boolean;
  history: number;
  failed: number;
  trackedFailures: number;
  totalRetries: number;
  consecutiveFailures: number;
  recoveryModeActive: boolean;
  quarantined: number;
}

export function queueStats(state: QueueState, policy: QueuePolicy): QueueStats {
  let totalRetries = 0;
  for (const count of state.failureCounts.values()) totalRetries += count;
  return {
    pending: state.pending.length,
    current: state.current !== null,
    history: state.history.length,
    failed: state.failedItems.length,
    trackedFailures: state.failureCounts.size,
    totalRetries,
    consecutiveFailures: state.recovery.consecutiveFailures,
    recoveryModeActive: state.recovery.recoveryModeActive,
    quarantined: quarantinedUrls(state, policy).length,
  };
}

/** Seconds of known duration across `current` and `pending`. */
export function totalDuration(state: QueueState): number {
  const items = state.current ? [state.current, ...state.pending] : state.pending;
  return items.reduce((total, item) => total + (item.duration ?? 0), 0);
}

export interface QueuePage {
  items: Item[];
  page: number;
  totalPages: number;
  total: number;
}

/** 1-based page of `pending`, clamped into range. */
export function pageOf(state: QueueState, page: number, size: number): QueuePage {
  const pageSize = Math.max(1, Math.floor(size));
  const total = state.pending.length;
  const totalPages = Math.max(1, Math.ceil(total / pageSize));
  const current = Math.min(Math.max(1, Math.floor(page)), totalPages);
  const start = (current - 1) * pageSize;
  return { items: state.pending.slice(start, start + pageSize), page: current, totalPages, total };
}
