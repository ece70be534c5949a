/**
 * Result Promise
 *
 * Single-assignment container that eventually holds a success value or a
 * failure. The first completion wins; later ones are ignored.
 */

export type ResultState<T> =
  | { status: 'pending' }
  | { status: 'fulfilled'; value: T }
  | { status: 'failed'; error: unknown };

export class ResultPromise<T> implements PromiseLike<T> {
  private current: ResultState<T> = { status: 'pending' };
  private readonly promise: Promise<T>;
  private resolvePromise!: (value: T) => void;
  private rejectPromise!: (reason: unknown) => void;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolvePromise = resolve;
      this.rejectPromise = reject;
    });
  }

  /**
   * Complete with a value. Returns false if already completed.
   */
  fulfill(value: T): boolean {
    if (this.current.status !== 'pending') {
      return false;
    }
    this.current = { status: 'fulfilled', value };
    this.resolvePromise(value);
    return true;
  }

  /**
   * Complete with a failure. Returns false if already completed.
   */
  fail(error: unknown): boolean {
    if (this.current.status !== 'pending') {
      return false;
    }
    this.current = { status: 'failed', error };
    this.rejectPromise(error);
    return true;
  }

  get state(): ResultState<T> {
    return this.current;
  }

  get isCompleted(): boolean {
    return this.current.status !== 'pending';
  }

  /**
   * Non-blocking view of the current state
   */
  poll(): ResultState<T> {
    return this.current;
  }

  /**
   * Wait for completion
   */
  wait(): Promise<T> {
    return this.promise;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }
}
