import { ZodError } from 'zod';

export class AudioError extends Error {
  constructor(
    message: string,
    public code: string,
    public sessionId?: string,
    public isRetryable: boolean = false,
  ) {
    super(message);
    this.name = 'AudioError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export type BackendFailureKind = 'timeout' | 'protocol' | 'unavailable';

export abstract class BackendError extends AudioError {
  abstract readonly kind: BackendFailureKind;
  /** Every backend the resolution touched, filled in when the error leaves the resolver. */
  attemptedBackends: readonly string[] = [];

  constructor(
    message: string,
    code: string,
    public readonly backend: string,
    isRetryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, code, undefined, isRetryable);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class BackendTimeoutError extends BackendError {
  readonly kind = 'timeout';

  constructor(backend: string, public readonly timeoutMs?: number, options?: { cause?: unknown }) {
    super(
      timeoutMs === undefined ? `${backend} timed out` : `${backend} timed out after ${timeoutMs}ms`,
      'BACKEND_TIMEOUT',
      backend,
      true,
      options,
    );
    this.name = 'BackendTimeoutError';
  }
}

export class BackendProtocolError extends BackendError {
  readonly kind = 'protocol';

  constructor(backend: string, detail: string, options?: { cause?: unknown }) {
    super(`${backend} returned a malformed response: ${detail}`, 'BACKEND_PROTOCOL', backend, false, options);
    this.name = 'BackendProtocolError';
  }
}

export class BackendUnavailableError extends BackendError {
  readonly kind = 'unavailable';

  constructor(backend: string, detail: string, options?: { cause?: unknown }) {
    // unusable for this call, worth asking again on the next one
    super(`${backend} is unavailable: ${detail}`, 'BACKEND_UNAVAILABLE', backend, true, options);
    this.name = 'BackendUnavailableError';
  }
}

export class NoResultsError extends AudioError {
  constructor(
    public readonly query: string,
    public readonly attemptedBackends: readonly string[],
  ) {
    super(
      attemptedBackends.length > 0
        ? `No results for "${query}" (tried ${attemptedBackends.join(', ')})`
        : `No results for "${query}": no backend is enabled`,
      'NO_RESULTS',
    );
    this.name = 'NoResultsError';
  }
}

export class QueueFullError extends AudioError {
  constructor(sessionId: string, public readonly maxSize: number) {
    super(`Queue for session ${sessionId} is full (${maxSize} items)`, 'QUEUE_FULL', sessionId);
    this.name = 'QueueFullError';
  }
}

export class QuarantinedItemError extends AudioError {
  constructor(
    public readonly canonicalUrl: string,
    public readonly failures: number,
    sessionId?: string,
  ) {
    super(`${canonicalUrl} is quarantined after ${failures} failures`, 'ITEM_QUARANTINED', sessionId);
    this.name = 'QuarantinedItemError';
  }
}

/** Non-2xx answer from an HTTP backend. Raw adapter error, classified by the resolver. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

/** A backend call outlived its deadline; its late result is discarded. */
export class DeadlineExceededError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} exceeded its ${timeoutMs}ms deadline`);
    this.name = 'TimeoutError';
  }
}

const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'ENOENT',
  'EACCES',
]);

const readProperty = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null && key in value ? Reflect.get(value, key) : undefined;

/**
 * Map whatever an adapter threw onto the backend error taxonomy. Errors that
 * are already classified pass through untouched.
 */
export function classifyBackendError(error: unknown, backend: string): BackendError {
  if (error instanceof BackendError) return error;

  const options = { cause: error };
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';

  if (error instanceof DeadlineExceededError) {
    return new BackendTimeoutError(backend, error.timeoutMs, options);
  }
  if (name === 'AbortError' || name === 'TimeoutError' || readProperty(error, 'killed') === true) {
    return new BackendTimeoutError(backend, undefined, options);
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
    return new BackendProtocolError(backend, detail, options);
  }
  if (error instanceof SyntaxError) {
    return new BackendProtocolError(backend, message, options);
  }

  if (error instanceof HttpStatusError) {
    if (error.status === 408) return new BackendTimeoutError(backend, undefined, options);
    if (error.status === 429 || error.status >= 500) {
      return new BackendUnavailableError(backend, message, options);
    }
    return new BackendProtocolError(backend, message, options);
  }

  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  if (typeof code === 'string' && UNAVAILABLE_CODES.has(code)) {
    return new BackendUnavailableError(backend, `${code}: ${message}`, options);
  }

  if (/timed? ?out/i.test(message)) {
    return new BackendTimeoutError(backend, undefined, options);
  }

  return new BackendUnavailableError(backend, message || 'unknown failure', options);
}
