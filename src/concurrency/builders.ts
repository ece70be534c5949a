/**
 * Async Builders
 *
 * Top-level helpers over a shared default dispatcher, plus delay,
 * timeout, retry and sequencing for code running in the caller's context.
 */

import { loadWorkerConfig } from '../config/threadline-config.js';
import { TimeoutError } from '../utils/errors.js';
import { WorkerDispatcher } from '../workers/dispatcher.js';
import type { Task } from '../workers/types.js';

// ============================================================================
// Default dispatcher
// ============================================================================

let defaultDispatcher: WorkerDispatcher | null = null;

/**
 * Get the dispatcher used by the top-level helpers
 */
export function getDefaultDispatcher(): WorkerDispatcher {
  if (!defaultDispatcher) {
    defaultDispatcher = new WorkerDispatcher();
  }
  return defaultDispatcher;
}

/**
 * Kill the default dispatcher's workers and drop it
 */
export function resetDefaultDispatcher(): void {
  if (defaultDispatcher) {
    defaultDispatcher.killAll();
    defaultDispatcher = null;
  }
}

// ============================================================================
// Launching
// ============================================================================

export function launch<T>(task: Task<T>, name?: string): Promise<T> {
  return getDefaultDispatcher().launch(task, name);
}

export function launchAll<T>(tasks: Array<Task<T>>): Promise<T[]> {
  return getDefaultDispatcher().launchAll(tasks);
}

export function race<T>(tasks: Array<Task<T>>): Promise<T> {
  return getDefaultDispatcher().race(tasks);
}

/**
 * Run tasks with a concurrency limit (default: THREADLINE_DEFAULT_CONCURRENCY)
 */
export function concurrent<T>(tasks: Array<Task<T>>, limit?: number): Promise<T[]> {
  return getDefaultDispatcher().launchWithLimit(
    tasks,
    limit ?? loadWorkerConfig().defaultConcurrency
  );
}

// ============================================================================
// Timing
// ============================================================================

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Launch a task and give up waiting after `timeoutMs`. The worker is not
 * stopped; its late result is discarded.
 */
export async function withTimeout<T>(task: Task<T>, timeoutMs: number, name?: string): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(`Task timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([launch(task, name), timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Wait before the first retry; doubles after each (default: 1000) */
  backoffMs?: number;
  /** Return false to stop retrying on this error */
  retryIf?: (error: unknown) => boolean;
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, backoffMs = 1000, retryIf = () => true } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !retryIf(error)) {
        throw error;
      }
      await delay(backoffMs * 2 ** attempt);
    }
  }
}

/**
 * Run functions one after another, collecting results in order
 */
export async function sequence<T>(fns: Array<() => Promise<T>>): Promise<T[]> {
  const results: T[] = [];
  for (const fn of fns) {
    results.push(await fn());
  }
  return results;
}
