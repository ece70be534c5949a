/**
 * Concurrency Limiter Tests
 */

import { ConcurrencyLimiter } from '../../src/workers/limiter.js';
import { WorkerDispatcher } from '../../src/workers/dispatcher.js';
import { InlineWorkerAdapter } from '../../src/workers/inline-adapter.js';
import type { Task, TaskLauncher } from '../../src/workers/types.js';
import { UsageError } from '../../src/utils/errors.js';

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function sleepingTasks(count: number, ms: number): Array<Task<number>> {
  return Array.from({ length: count }, (_, index) => async () => {
    await sleep(ms);
    return index;
  });
}

describe('ConcurrencyLimiter', () => {
  let dispatcher: WorkerDispatcher;

  beforeEach(() => {
    dispatcher = new WorkerDispatcher({ adapter: new InlineWorkerAdapter() });
  });

  afterEach(() => {
    dispatcher.killAll();
  });

  it('should never run more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    const tasks = Array.from({ length: 6 }, () => async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(10);
      running--;
      return running;
    });

    await dispatcher.launchWithLimit(tasks, 2);

    expect(peak).toBe(2);
  });

  it('should keep input order whatever the completion order', async () => {
    const tasks = [30, 5, 15].map((ms) => async () => {
      await sleep(ms);
      return ms;
    });

    await expect(dispatcher.launchWithLimit(tasks, 3)).resolves.toEqual([30, 5, 15]);
  });

  it('should serialize work at concurrency 1', async () => {
    const start = Date.now();

    const results = await dispatcher.launchWithLimit(sleepingTasks(5, 50), 1);

    expect(results).toEqual([0, 1, 2, 3, 4]);
    expect(Date.now() - start).toBeGreaterThanOrEqual(200);
  });

  it('should overlap work when the limit allows', async () => {
    const start = Date.now();

    await dispatcher.launchWithLimit(sleepingTasks(5, 50), 5);

    expect(Date.now() - start).toBeLessThan(200);
  });

  it('should throw synchronously for an invalid limit', () => {
    expect(() => dispatcher.launchWithLimit(sleepingTasks(1, 1), 0)).toThrow(UsageError);
    expect(() => dispatcher.launchWithLimit(sleepingTasks(1, 1), 2.5)).toThrow(
      'Concurrency must be a positive integer'
    );
  });

  it('should reject with the first failure and still release permits', async () => {
    let finished = 0;
    const tasks: Array<Task<number>> = [
      () => {
        throw new Error('first task failed');
      },
      async () => {
        await sleep(10);
        finished++;
        return 1;
      },
      async () => {
        await sleep(10);
        finished++;
        return 2;
      },
    ];

    await expect(dispatcher.launchWithLimit(tasks, 1)).rejects.toThrow('first task failed');
    await sleep(50);
    expect(finished).toBe(2);
  });

  it('should work with any task launcher', async () => {
    const launcher: TaskLauncher = {
      launch: async <T>(task: Task<T>) => task(),
    };
    const limiter = new ConcurrencyLimiter(launcher);

    await expect(limiter.launchWithLimit([() => 'a', () => 'b'], 1)).resolves.toEqual(['a', 'b']);
  });
});
