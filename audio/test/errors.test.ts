import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  BackendProtocolError,
  BackendTimeoutError,
  BackendUnavailableError,
  DeadlineExceededError,
  HttpStatusError,
  NoResultsError,
  QuarantinedItemError,
  QueueFullError,
  classifyBackendError,
} from '../src/errors.js';

const withCode = (message: string, code: string): Error => Object.assign(new Error(message), { code });

describe('classifyBackendError', () => {
  it('passes classified errors through', () => {
    const original = new BackendProtocolError('mirror', 'bad json');
    expect(classifyBackendError(original, 'other')).toBe(original);
  });

  it('maps our own deadline to a timeout carrying its limit', () => {
    const error = classifyBackendError(new DeadlineExceededError('extractor search', 800), 'extractor');

    expect(error).toBeInstanceOf(BackendTimeoutError);
    expect(error.message).toBe('extractor timed out after 800ms');
    expect(error.isRetryable).toBe(true);
  });

  it.each([
    ['abort', Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })],
    ['killed process', Object.assign(new Error('Command failed'), { killed: true })],
    ['timeout message', new Error('socket timed out while reading')],
    ['HTTP 408', new HttpStatusError(408, 'https://api.example/search')],
  ])('treats %s as a timeout', (_label, raw) => {
    expect(classifyBackendError(raw, 'b').kind).toBe('timeout');
  });

  it('treats schema and parse failures as protocol errors', () => {
    const parsed = z.object({ items: z.array(z.string()) }).safeParse({ items: 'nope' });
    const zodError = parsed.success ? new Error('unreachable') : parsed.error;

    const fromZod = classifyBackendError(zodError, 'public-api');
    expect(fromZod).toBeInstanceOf(BackendProtocolError);
    expect(fromZod.message).toBe('public-api returned a malformed response: items: Expected array, received string');

    expect(classifyBackendError(new SyntaxError('Unexpected token <'), 'mirror').kind).toBe('protocol');
  });

  it('splits HTTP statuses by what they say about the backend', () => {
    expect(classifyBackendError(new HttpStatusError(404, 'u'), 'b').kind).toBe('protocol');
    expect(classifyBackendError(new HttpStatusError(429, 'u'), 'b').kind).toBe('unavailable');
    expect(classifyBackendError(new HttpStatusError(503, 'u'), 'b').kind).toBe('unavailable');
  });

  it('treats network failures as unavailable, including wrapped causes', () => {
    const refused = classifyBackendError(withCode('connect ECONNREFUSED', 'ECONNREFUSED'), 'mirror');
    expect(refused).toBeInstanceOf(BackendUnavailableError);
    expect(refused.message).toBe('mirror is unavailable: ECONNREFUSED: connect ECONNREFUSED');

    const fetchFailed = new TypeError('fetch failed', { cause: withCode('getaddrinfo', 'ENOTFOUND') });
    expect(classifyBackendError(fetchFailed, 'feed').kind).toBe('unavailable');

    expect(classifyBackendError(withCode('spawn yt-dlp ENOENT', 'ENOENT'), 'extractor').kind).toBe('unavailable');
  });

  it('falls back to unavailable for anything else', () => {
    const error = classifyBackendError('boom', 'b');
    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error.cause).toBe('boom');
    expect(error.backend).toBe('b');
  });
});

describe('queue and resolution errors', () => {
  it('describe what was refused', () => {
    expect(new QueueFullError('s1', 2).message).toBe('Queue for session s1 is full (2 items)');
    expect(new QuarantinedItemError('https://x', 3, 's1')).toMatchObject({
      code: 'ITEM_QUARANTINED',
      sessionId: 's1',
      failures: 3,
    });
    expect(new NoResultsError('q', []).message).toBe('No results for "q": no backend is enabled');
    expect(new NoResultsError('q', ['a', 'b']).message).toBe('No results for "q" (tried a, b)');
  });
});
