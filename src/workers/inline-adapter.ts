/**
 * Inline Worker Adapter
 *
 * Runs each task as a separate job on the caller's event loop. Tasks may
 * close over caller state here, since nothing is serialized. The task
 * itself cannot be stopped: terminating only discards its result.
 */

import { createLogger, Logger } from '../utils/logger.js';
import type { SpawnOptions, Task, WorkerAdapter, WorkerHandle } from './types.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

class InlineWorkerHandle implements WorkerHandle {
  terminated = false;

  constructor(public readonly name: string) {}

  async terminate(): Promise<void> {
    this.terminated = true;
  }
}

export class InlineWorkerAdapter implements WorkerAdapter {
  readonly kind = 'inline';
  private logger: Logger;

  constructor() {
    this.logger = createLogger({ source: 'InlineWorkerAdapter' });
  }

  /** Any function runs inline */
  check(): void {}

  spawn<T>(task: Task<T>, options: SpawnOptions<T>): WorkerHandle {
    const handle = new InlineWorkerHandle(options.name);

    setImmediate(() => {
      if (handle.terminated) {
        return;
      }
      Promise.resolve()
        .then(task)
        .then(
          (value) => {
            if (!handle.terminated) {
              options.onOutcome({ status: 'success', value });
            }
          },
          (error: unknown) => {
            if (!handle.terminated) {
              options.onOutcome({ status: 'failure', error: toError(error) });
            }
          }
        )
        .catch((err: unknown) => {
          this.logger.error(`Outcome handler for ${options.name} threw`, err);
        });
    });

    return handle;
  }
}
