/**
 * Worker types shared by the dispatcher and its adapters
 */

/**
 * A zero-argument unit of work
 */
export type Task<T> = () => T | Promise<T>;

/**
 * The single message a worker reports back
 */
export type TaskOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'failure'; error: Error };

export interface SpawnOptions<T> {
  /** Worker name, unique among live workers of a dispatcher */
  name: string;
  /** Called with the worker's report. Adapters call it at most once. */
  onOutcome: (outcome: TaskOutcome<T>) => void;
}

/**
 * A live worker as seen by the dispatcher
 */
export interface WorkerHandle {
  readonly name: string;
  /** Stop the worker and release its messaging resources */
  terminate(): Promise<void>;
}

/**
 * Platform primitive: run one task in its own execution context and
 * report exactly one outcome.
 */
export interface WorkerAdapter {
  readonly kind: string;
  /** Throw UsageError if this adapter cannot run the task */
  check(task: Task<unknown>): void;
  spawn<T>(task: Task<T>, options: SpawnOptions<T>): WorkerHandle;
}

/**
 * Anything that can launch a task and hand back its result
 */
export interface TaskLauncher {
  launch<T>(task: Task<T>, name?: string): Promise<T>;
}
