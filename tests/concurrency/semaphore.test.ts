/**
 * Semaphore Tests
 */

import { Semaphore } from '../../src/concurrency/semaphore.js';
import { UsageError } from '../../src/utils/errors.js';

describe('Semaphore', () => {
  it('should reject a non-positive permit count', () => {
    expect(() => new Semaphore(0)).toThrow(UsageError);
    expect(() => new Semaphore(1.5)).toThrow('Semaphore permits must be a positive integer');
  });

  it('should hand out permits until none are left', async () => {
    const semaphore = new Semaphore(2);

    await semaphore.acquire();
    expect(semaphore.tryAcquire()).toBe(true);
    expect(semaphore.tryAcquire()).toBe(false);
    expect(semaphore.available).toBe(0);
    expect(semaphore.held).toBe(2);
  });

  it('should suspend acquire until a release', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    let acquired = false;
    const pending = semaphore.acquire().then(() => {
      acquired = true;
    });

    await new Promise((r) => setTimeout(r, 10));
    expect(acquired).toBe(false);
    expect(semaphore.waiting).toBe(1);

    semaphore.release();
    await pending;

    expect(acquired).toBe(true);
    expect(semaphore.available).toBe(0);
  });

  it('should wake waiters in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    const order: number[] = [];
    const waiters = [1, 2, 3].map((id) =>
      semaphore.acquire().then(() => {
        order.push(id);
      })
    );

    semaphore.release();
    semaphore.release();
    semaphore.release();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
  });

  it('should not let a newcomer overtake a waiter', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const waiter = semaphore.acquire();

    semaphore.release();

    expect(semaphore.tryAcquire()).toBe(false);
    await waiter;
  });

  it('should throw when released more than acquired', () => {
    const semaphore = new Semaphore(1);

    expect(() => semaphore.release()).toThrow('Semaphore released more times than acquired');
  });

  it('should release the permit when use() throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.use(() => {
        throw new Error('inside');
      })
    ).rejects.toThrow('inside');
    expect(semaphore.available).toBe(1);
  });

  it('should return the value from use()', async () => {
    const semaphore = new Semaphore(3);

    await expect(semaphore.use(async () => 'ok')).resolves.toBe('ok');
    expect(semaphore.available).toBe(3);
  });
});
