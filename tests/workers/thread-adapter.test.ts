/**
 * Thread Worker Adapter Tests
 *
 * These spawn real worker threads. Tasks must be self-contained: only
 * their source text reaches the worker.
 */

import { WorkerDispatcher } from '../../src/workers/dispatcher.js';
import { ThreadWorkerAdapter } from '../../src/workers/thread-adapter.js';
import { TaskFailure, UsageError } from '../../src/utils/errors.js';

describe('ThreadWorkerAdapter', () => {
  let dispatcher: WorkerDispatcher;

  beforeEach(() => {
    dispatcher = new WorkerDispatcher({ adapter: new ThreadWorkerAdapter() });
  });

  afterEach(() => {
    dispatcher.killAll();
  });

  it('should run a task in a worker thread', async () => {
    await expect(dispatcher.launch(() => 21 * 2)).resolves.toBe(42);
  });

  it('should await async tasks', async () => {
    const value = await dispatcher.launch(async () => {
      await new Promise((r) => setTimeout(r, 5));
      return { ok: true, items: [1, 2] };
    });

    expect(value).toEqual({ ok: true, items: [1, 2] });
  });

  it('should carry the error message back', async () => {
    const pending = dispatcher.launch(() => {
      throw new Error('boom');
    }, 'thrower');

    await expect(pending).rejects.toThrow(TaskFailure);
    await expect(pending).rejects.toThrow('Task in worker thrower failed: boom');
  });

  it('should not share variables with the caller', async () => {
    const factor = 3;

    const failure = await dispatcher.launch(() => factor * 2, 'isolated').then(
      () => undefined,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(TaskFailure);
    const cause = failure instanceof TaskFailure ? failure.cause : undefined;
    expect(cause).toBeInstanceOf(Error);
    expect(cause).toMatchObject({ name: 'ReferenceError', message: 'factor is not defined' });
  });

  it('should fail when the result cannot be cloned', async () => {
    await expect(dispatcher.launch(() => () => 1)).rejects.toThrow(TaskFailure);
  });

  it('should run tasks in parallel workers', async () => {
    const results = await dispatcher.launchAll([() => 'a', () => 'b', () => 'c']);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(dispatcher.activeWorkerCount).toBe(0);
  });

  it('should fail a worker that exits without reporting', async () => {
    const pending = dispatcher.launch(() => process.exit(3), 'exiter');

    await expect(pending).rejects.toThrow(TaskFailure);
    await expect(pending).rejects.toThrow(
      'Task in worker exiter failed: Worker exited with code 3 before reporting a result'
    );
    expect(dispatcher.activeWorkerCount).toBe(0);
  });

  describe('task checks', () => {
    it('should reject a native task in launchAll before spawning any worker', () => {
      expect(() => dispatcher.launchAll([() => 1, Math.random])).toThrow(UsageError);
      expect(dispatcher.activeWorkerCount).toBe(0);
      expect(dispatcher.getStats().launched).toBe(0);
    });

    it('should reject a native task in race before spawning any worker', () => {
      expect(() => dispatcher.race([() => 1, Math.random])).toThrow(UsageError);
      expect(dispatcher.activeWorkerCount).toBe(0);
      expect(dispatcher.getStats().launched).toBe(0);
    });

    it('should reject a native task in launchWithLimit before spawning any worker', () => {
      expect(() => dispatcher.launchWithLimit([() => 1, () => 2, Math.random], 1)).toThrow(UsageError);
      expect(dispatcher.activeWorkerCount).toBe(0);
      expect(dispatcher.getStats().launched).toBe(0);
    });
  });

  it('should accept a memory limit', async () => {
    const limited = new WorkerDispatcher({ adapter: new ThreadWorkerAdapter({ memoryLimitMb: 64 }) });

    await expect(limited.launch(() => 'small')).resolves.toBe('small');
  });

  it('should terminate a long-running worker on killAll', async () => {
    void dispatcher.launch(() => new Promise(() => setInterval(() => undefined, 1000)), 'spinner');

    expect(dispatcher.killAll()).toEqual(['spinner']);
    expect(dispatcher.activeWorkerCount).toBe(0);
  });
});
