/**
 * Raised inside a cache class when an entry cannot be made to fit. Internal to
 * this package: `CacheClass.put` catches it and reports `stored: false`.
 */
export class CacheCapacityExceededError extends Error {
  constructor(
    public readonly cacheClass: string,
    public readonly requestedBytes: number,
    public readonly availableBytes: number,
  ) {
    super(`Cache class "${cacheClass}" cannot fit ${requestedBytes} bytes (${availableBytes} available)`);
    this.name = 'CacheCapacityExceededError';
    Error.captureStackTrace(this, this.constructor);
  }
}
