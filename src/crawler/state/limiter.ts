import pLimit, { type LimitFunction } from 'p-limit';

/**
 * Counting gate over the fetch-and-process section of each traversal branch. A branch
 * holds its permit for exactly the lifetime of the task passed to `run`.
 */
export class ConcurrencyLimiter {
  private readonly limit: LimitFunction;
  private peak = 0;

  constructor(readonly maxConcurrent: number) {
    this.limit = pLimit(maxConcurrent);
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(async () => {
      this.peak = Math.max(this.peak, this.limit.activeCount);
      return task();
    });
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  get peakActive(): number {
    return this.peak;
  }
}
