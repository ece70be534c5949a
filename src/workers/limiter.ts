/**
 * Concurrency Limiter
 *
 * Bounds how many tasks a launcher runs at once. Each task waits for a
 * semaphore permit before it is launched and gives it back however it
 * ends. Results land in index-addressed slots, so output order matches
 * input order whatever the completion order.
 */

import { Semaphore } from '../concurrency/semaphore.js';
import { UsageError } from '../utils/errors.js';
import type { Task, TaskLauncher } from './types.js';

export class ConcurrencyLimiter {
  constructor(private readonly launcher: TaskLauncher) {}

  /**
   * Run tasks with at most `concurrency` of them in flight.
   * Rejects with the first failure; the remaining tasks still run.
   */
  launchWithLimit<T>(tasks: Array<Task<T>>, concurrency: number): Promise<T[]> {
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new UsageError('Concurrency must be a positive integer', 'concurrency', concurrency);
    }

    const semaphore = new Semaphore(concurrency);
    const results: T[] = new Array<T>(tasks.length);

    const runs = tasks.map((task, index) =>
      semaphore.use(async () => {
        results[index] = await this.launcher.launch(task);
      })
    );

    return Promise.all(runs).then(() => results);
  }
}
