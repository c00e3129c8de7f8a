import { describe, it, expect } from 'vitest';
import { componentLogger, describeError, logger } from '../src/index.js';

describe('logger', () => {
  it('honours LOG_LEVEL from the environment', () => {
    // tests/setup.ts silences logging for the whole run
    expect(logger.level).toBe('silent');
  });

  it('binds the component and extra context on child loggers', () => {
    const child = componentLogger('resolver', { sessionId: 'session-1' });
    expect(child.bindings()).toEqual({ component: 'resolver', sessionId: 'session-1' });
  });

  describe('describeError', () => {
    it('keeps name and message of real errors', () => {
      const error = new TypeError('bad input');
      expect(describeError(error)).toEqual({ name: 'TypeError', message: 'bad input' });
    });

    it('stringifies thrown non-errors', () => {
      expect(describeError('boom')).toEqual({ name: 'Unknown', message: 'boom' });
      expect(describeError(42)).toEqual({ name: 'Unknown', message: '42' });
    });
  });
});
