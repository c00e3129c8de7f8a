/**
 * Aggregate memory accounting shared by every cache class of one cache.
 * Sizes are estimates of the serialized payload, not real heap usage.
 */
export class MemoryBudget {
  private usedBytes = 0;
  private peakBytes = 0;

  constructor(public readonly limitBytes: number) {
    if (!Number.isFinite(limitBytes) || limitBytes <= 0) {
      throw new RangeError(`Memory budget must be a positive number of bytes, got ${limitBytes}`);
    }
  }

  get used(): number {
    return this.usedBytes;
  }

  get peak(): number {
    return this.peakBytes;
  }

  get available(): number {
    return Math.max(0, this.limitBytes - this.usedBytes);
  }

  wouldExceed(additionalBytes: number): boolean {
    return this.usedBytes + additionalBytes > this.limitBytes;
  }

  reserve(bytes: number): void {
    this.usedBytes += bytes;
    if (this.usedBytes > this.peakBytes) {
      this.peakBytes = this.usedBytes;
    }
  }

  release(bytes: number): void {
    this.usedBytes = Math.max(0, this.usedBytes - bytes);
  }
}
