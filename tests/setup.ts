import { afterEach, vi } from 'vitest';

// Before any module reads it: @strata/logger and @strata/config read process.env on load.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
