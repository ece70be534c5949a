/**
 * Promise helpers
 *
 * Small combinators over promises the caller already holds. None of them
 * spawn workers.
 */

import { FilterRejectedError } from '../utils/errors.js';

/**
 * Start every promise the builder returns and wait for all of them.
 * Results keep the builder's order; the first rejection wins.
 */
export function awaitAll<T>(builder: () => Array<PromiseLike<T>>): Promise<T[]> {
  return Promise.all(builder());
}

/**
 * Resolve with `fallback(error)` when `promise` rejects
 */
export function orElse<T, F = T>(
  promise: PromiseLike<T>,
  fallback: (error: unknown) => F | PromiseLike<F>
): Promise<T | F> {
  return Promise.resolve(promise).then((value) => value, fallback);
}

/**
 * Run `sideEffect` on the value, then resolve with the value itself.
 * A failing side effect rejects the result.
 */
export async function also<T>(
  promise: PromiseLike<T>,
  sideEffect: (value: T) => unknown
): Promise<T> {
  const value = await promise;
  await sideEffect(value);
  return value;
}

/**
 * Resolve with the value when it passes `predicate`, otherwise reject
 * with FilterRejectedError
 */
export async function filter<T>(
  promise: PromiseLike<T>,
  predicate: (value: T) => boolean | PromiseLike<boolean>
): Promise<T> {
  const value = await promise;
  if (!(await predicate(value))) {
    throw new FilterRejectedError(value);
  }
  return value;
}

/**
 * Like filter(), but a value that fails the predicate becomes undefined
 */
export async function takeIf<T>(
  promise: PromiseLike<T>,
  predicate: (value: T) => boolean | PromiseLike<boolean>
): Promise<T | undefined> {
  const value = await promise;
  return (await predicate(value)) ? value : undefined;
}
