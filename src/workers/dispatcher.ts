/**
 * Worker Dispatcher
 *
 * Spawns one worker per task and delivers its single result. Exceptions
 * inside a task come back as TaskFailure; they never reach the dispatcher
 * or sibling tasks.
 */

import { EventEmitter } from 'events';
import { ResultPromise } from '../concurrency/result-promise.js';
import { AggregateFailure, TaskFailure, UsageError } from '../utils/errors.js';
import { createLogger, Logger } from '../utils/logger.js';
import { createWorkerAdapter } from './adapter-factory.js';
import { ConcurrencyLimiter } from './limiter.js';
import { WorkerRegistry } from './registry.js';
import type { Task, TaskLauncher, TaskOutcome, WorkerAdapter } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface DispatcherOptions {
  /** Platform primitive used to run tasks (default: from configuration) */
  adapter?: WorkerAdapter;
  /** Registry of live workers (default: a new one) */
  registry?: WorkerRegistry;
  logger?: Logger;
}

export interface DispatcherStats {
  active: number;
  launched: number;
  succeeded: number;
  failed: number;
  killed: number;
}

// ============================================================================
// Dispatcher
// ============================================================================

export class WorkerDispatcher extends EventEmitter implements TaskLauncher {
  private readonly adapter: WorkerAdapter;
  private readonly registry: WorkerRegistry;
  private readonly logger: Logger;
  private launchedCount = 0;
  private succeededCount = 0;
  private failedCount = 0;
  private killedCount = 0;

  constructor(options: DispatcherOptions = {}) {
    super();
    this.adapter = options.adapter ?? createWorkerAdapter();
    this.registry = options.registry ?? new WorkerRegistry();
    this.logger = options.logger ?? createLogger({ source: 'WorkerDispatcher' });
  }

  /**
   * Run a task in a new worker and resolve with its result.
   * Throws UsageError synchronously for an invalid task or a taken name.
   */
  launch<T>(task: Task<T>, name?: string): Promise<T> {
    this.assertTasks([task]);
    const workerName = name ?? this.registry.nextName();
    this.registry.assertAvailable(workerName);

    const result = new ResultPromise<T>();
    const handle = this.adapter.spawn(task, {
      name: workerName,
      onOutcome: (outcome) => this.complete(workerName, result, outcome),
    });

    this.registry.add({
      name: workerName,
      handle,
      adapter: this.adapter.kind,
      startedAt: Date.now(),
    });
    this.launchedCount++;
    this.logger.debug(`Spawned worker ${workerName}`, { adapter: this.adapter.kind });
    this.emit('spawn', workerName);

    return result.wait();
  }

  /**
   * Run every task concurrently; results keep input order.
   * Rejects with the first failure. Other workers keep running.
   */
  launchAll<T>(tasks: Array<Task<T>>): Promise<T[]> {
    this.assertTasks(tasks);
    return Promise.all(tasks.map((task) => this.launch(task)));
  }

  /**
   * Run tasks with at most `concurrency` workers alive at once
   */
  launchWithLimit<T>(tasks: Array<Task<T>>, concurrency: number): Promise<T[]> {
    this.assertTasks(tasks);
    return new ConcurrencyLimiter(this).launchWithLimit(tasks, concurrency);
  }

  /**
   * Resolve with the first task to succeed. Fails with AggregateFailure
   * only once every task has failed. Losing workers are left running.
   */
  race<T>(tasks: Array<Task<T>>): Promise<T> {
    if (tasks.length === 0) {
      throw new UsageError('race() needs at least one task', 'tasks', tasks.length);
    }
    this.assertTasks(tasks);

    const result = new ResultPromise<T>();
    let failures = 0;

    for (const task of tasks) {
      void this.launch(task).then(
        (value) => {
          result.fulfill(value);
        },
        (error: unknown) => {
          failures++;
          if (failures === tasks.length) {
            result.fail(
              new AggregateFailure(`All ${tasks.length} racing tasks failed`, error, failures)
            );
          }
        }
      );
    }

    return result.wait();
  }

  /**
   * Terminate every live worker. Their launch() promises never settle.
   */
  killAll(): string[] {
    const records = this.registry.drain();
    const names = records.map((record) => record.name);

    for (const record of records) {
      record.handle.terminate().catch((err: unknown) => {
        this.logger.warn(`Failed to kill worker ${record.name}`, err);
      });
    }

    this.killedCount += records.length;
    if (names.length > 0) {
      this.logger.debug(`Killed ${names.length} worker(s)`, { names });
    }
    this.emit('killed', names);
    return names;
  }

  get activeWorkerCount(): number {
    return this.registry.size;
  }

  get activeWorkerNames(): string[] {
    return this.registry.names();
  }

  getStats(): DispatcherStats {
    return {
      active: this.registry.size,
      launched: this.launchedCount,
      succeeded: this.succeededCount,
      failed: this.failedCount,
      killed: this.killedCount,
    };
  }

  /**
   * Check every task before the first one is spawned
   */
  private assertTasks(tasks: Array<Task<unknown>>): void {
    tasks.forEach((task, index) => {
      if (typeof task !== 'function') {
        throw new UsageError(`Task at index ${index} is not a function`, 'tasks', index);
      }
      this.adapter.check(task);
    });
  }

  /**
   * First report from a worker: settle its promise, then tear it down
   */
  private complete<T>(name: string, result: ResultPromise<T>, outcome: TaskOutcome<T>): void {
    const record = this.registry.get(name);
    if (!record) {
      // Killed
      return;
    }
    this.registry.remove(name, record.handle);

    if (outcome.status === 'success') {
      this.succeededCount++;
      result.fulfill(outcome.value);
    } else {
      this.failedCount++;
      this.logger.debug(`Task in worker ${name} failed`, outcome.error);
      result.fail(
        new TaskFailure(`Task in worker ${name} failed: ${outcome.error.message}`, name, outcome.error)
      );
    }
    this.emit('settled', name, outcome.status);

    record.handle.terminate().catch((err: unknown) => {
      this.logger.warn(`Failed to tear down worker ${name}`, err);
    });
  }
}
