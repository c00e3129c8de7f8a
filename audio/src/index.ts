export { createStrata, selectMemoryProbe } from './app.js';
export type { Strata, StrataDependencies } from './app.js';
export {
  AudioError,
  BackendError,
  BackendProtocolError,
  BackendTimeoutError,
  BackendUnavailableError,
  DeadlineExceededError,
  HttpStatusError,
  NoResultsError,
  QuarantinedItemError,
  QueueFullError,
  classifyBackendError,
} from './errors.js';
export type { BackendFailureKind } from './errors.js';
export { createAudioMetrics } from './metrics.js';
export type { AudioMetrics } from './metrics.js';
export * from './queue/queue-state.js';
export { ResilientQueue } from './queue/resilient-queue.js';
export type { ResilientQueueOptions } from './queue/resilient-queue.js';
export { BackendRegistry } from './resolver/backend-registry.js';
export type { BackendConfig, BackendEntry } from './resolver/backend-registry.js';
export { sleep, withDeadline } from './resolver/deadline.js';
export { HierarchicalResolver } from './resolver/hierarchical-resolver.js';
export type {
  AttemptOutcome,
  ResolutionAttempt,
  ResolutionResult,
  ResolverOptions,
} from './resolver/hierarchical-resolver.js';
export { correctQuery, leadingKeywordGroup, normalizeQuery, simplifyQuery, stripDiacritics } from './resolver/query-normalizer.js';
export { durationScore, rankResults, titleMatches } from './resolver/ranking.js';
export { SessionMutex } from './session-mutex.js';
export { PlaybackSession } from './sessions/playback-session.js';
export type { NextTrack, PlaybackSessionOptions } from './sessions/playback-session.js';
export { SessionRegistry } from './sessions/session-registry.js';
export type { SessionRegistryOptions } from './sessions/session-registry.js';
export { GracefulShutdown } from './shutdown.js';
export type { CleanupFunction, GracefulShutdownOptions } from './shutdown.js';
export * from './sources/index.js';
export { createItem, withRequester } from './types.js';
export type { Item, ItemInit, LoopMode, SourceKind } from './types.js';
