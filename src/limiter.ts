/**
 * Bounds how many page fetches run at the same time.
 */

import pLimit, { type LimitFunction } from "p-limit";

/** Default slot count when none is configured */
export const DEFAULT_MAX_CONCURRENCY = 50;

export class ConcurrencyLimiter {
  readonly capacity: number;
  private readonly limit: LimitFunction;
  private peak = 0;

  /**
   * @param capacity - Maximum number of tasks holding a slot at once
   * @throws {RangeError} If capacity is not a positive integer
   */
  constructor(capacity: number = DEFAULT_MAX_CONCURRENCY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.limit = pLimit(capacity);
  }

  /**
   * Run a task while holding one slot. Waits until a slot is free; the slot
   * is returned when the task settles, whether it resolved or rejected.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(() => {
      this.peak = Math.max(this.peak, this.limit.activeCount);
      return task();
    });
  }

  /** Tasks currently holding a slot */
  get active(): number {
    return this.limit.activeCount;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.limit.pendingCount;
  }

  /** Highest number of slots held at once since creation */
  get peakActive(): number {
    return this.peak;
  }
}
