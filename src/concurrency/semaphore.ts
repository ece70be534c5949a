/**
 * Counting semaphore with a FIFO wait queue.
 *
 * A release hands its permit straight to the oldest waiter instead of
 * returning it to the pool, so a newcomer can never overtake a waiter.
 */

import { UsageError } from '../utils/errors.js';

export class Semaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(public readonly max: number) {
    if (!Number.isInteger(max) || max <= 0) {
      throw new UsageError('Semaphore permits must be a positive integer', 'max', max);
    }
    this.permits = max;
  }

  /**
   * Take a permit, waiting in line if none is free
   */
  acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Take a permit only if one is free right now
   */
  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  /**
   * Give a permit back. Transfers it to the next waiter if any.
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot transferred, permit count unchanged
      next();
      return;
    }
    if (this.permits >= this.max) {
      throw new UsageError('Semaphore released more times than acquired');
    }
    this.permits++;
  }

  /**
   * Run fn while holding a permit
   */
  async use<R>(fn: () => R | Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Number of free permits. */
  get available(): number {
    return this.permits;
  }

  /** Number of callers currently waiting to acquire. */
  get waiting(): number {
    return this.queue.length;
  }

  /** Number of permits currently held. */
  get held(): number {
    return this.max - this.permits;
  }
}
