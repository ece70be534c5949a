/**
 * Thread Worker Adapter
 * Runs each task in its own Worker Thread.
 *
 * - The task's source text is evaluated in a fresh V8 isolate, so nothing
 *   is shared with the caller
 * - Results and errors come back as a single validated message
 * - Optional heap limits through Worker resourceLimits
 */

import { Worker } from 'worker_threads';
import { z } from 'zod';
import { deserializeError, getErrorMessage } from '../utils/errors.js';
import { createLogger, Logger } from '../utils/logger.js';
import { toTaskSource, WORKER_BOOTSTRAP } from './worker-bootstrap.js';
import type { SpawnOptions, Task, TaskOutcome, WorkerAdapter, WorkerHandle } from './types.js';

export interface ThreadWorkerAdapterOptions {
  /** Heap limit per worker in MB (default: no limit) */
  memoryLimitMb?: number;
}

const WorkerReportSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('success'), value: z.unknown() }),
  z.object({
    type: z.literal('failure'),
    error: z.object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    }),
  }),
]);

class ThreadWorkerHandle<T> implements WorkerHandle {
  private reported = false;
  private terminated = false;

  constructor(
    public readonly name: string,
    private readonly worker: Worker,
    private readonly onOutcome: (outcome: TaskOutcome<T>) => void,
    private readonly logger: Logger
  ) {
    worker.on('message', (message: unknown) => this.handleMessage(message));

    worker.on('error', (error) => {
      this.report({ status: 'failure', error });
    });

    worker.on('messageerror', (error) => {
      this.report({ status: 'failure', error });
    });

    worker.on('exit', (code) => {
      if (!this.reported && !this.terminated) {
        this.logger.warn(`Worker ${this.name} crashed with exit code ${code}`);
        this.report({
          status: 'failure',
          error: new Error(`Worker exited with code ${code} before reporting a result`),
        });
      }
      this.logger.debug(`Worker ${this.name} exited with code ${code}`);
    });
  }

  private handleMessage(message: unknown): void {
    const parsed = WorkerReportSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn(`Received invalid message from worker ${this.name}`);
      return;
    }

    const report = parsed.data;
    if (report.type === 'success') {
      // The worker ran a Task<T>; its value is T once cloned across
      this.report({ status: 'success', value: report.value as T });
    } else {
      this.report({ status: 'failure', error: deserializeError(report.error) });
    }
  }

  private report(outcome: TaskOutcome<T>): void {
    if (this.reported || this.terminated) {
      return;
    }
    this.reported = true;
    this.onOutcome(outcome);
  }

  async terminate(): Promise<void> {
    if (this.terminated) {
      return;
    }
    this.terminated = true;

    try {
      await this.worker.terminate();
    } catch (err) {
      this.logger.error(`Failed to terminate worker ${this.name}: ${getErrorMessage(err)}`);
    }
  }
}

export class ThreadWorkerAdapter implements WorkerAdapter {
  readonly kind = 'thread';
  private logger: Logger;

  constructor(private readonly options: ThreadWorkerAdapterOptions = {}) {
    this.logger = createLogger({ source: 'ThreadWorkerAdapter' });
  }

  check(task: Task<unknown>): void {
    toTaskSource(task);
  }

  spawn<T>(task: Task<T>, options: SpawnOptions<T>): WorkerHandle {
    const source = toTaskSource(task);
    const memoryLimitMb = this.options.memoryLimitMb;

    const worker = new Worker(WORKER_BOOTSTRAP, {
      eval: true,
      workerData: { source, name: options.name },
      resourceLimits: memoryLimitMb
        ? {
            maxOldGenerationSizeMb: memoryLimitMb,
            maxYoungGenerationSizeMb: Math.max(1, Math.min(32, Math.floor(memoryLimitMb / 4))),
          }
        : undefined,
    });

    return new ThreadWorkerHandle<T>(options.name, worker, options.onOutcome, this.logger);
  }
}
