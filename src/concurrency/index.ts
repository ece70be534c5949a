/**
 * Concurrency Module
 *
 * Primitives for coordinating concurrent operations: single-assignment
 * results, counting semaphores, and the top-level async builders.
 */

export type { ResultState } from './result-promise.js';
export { ResultPromise } from './result-promise.js';
export { Semaphore } from './semaphore.js';

export type { RetryOptions } from './builders.js';
export {
  getDefaultDispatcher,
  resetDefaultDispatcher,
  launch,
  launchAll,
  race,
  concurrent,
  delay,
  withTimeout,
  retry,
  sequence,
} from './builders.js';

export { awaitAll, orElse, also, filter, takeIf } from './promise-ops.js';
