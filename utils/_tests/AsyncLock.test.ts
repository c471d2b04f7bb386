import { describe, it, expect } from 'vitest';
import { AsyncLock } from '../AsyncLock';

describe('AsyncLock', () => {
  it('should grant the lock immediately when free', async () => {
    const lock = new AsyncLock();
    await lock.acquire();
    expect(lock.isLocked()).toBe(true);
    lock.release();
    expect(lock.isLocked()).toBe(false);
  });

  it('should serve waiters in FIFO order', async () => {
    const lock = new AsyncLock();
    const order: number[] = [];
    await lock.acquire();

    const first = lock.acquire().then(() => {
      order.push(1);
      lock.release();
    });
    const second = lock.acquire().then(() => {
      order.push(2);
      lock.release();
    });
    expect(lock.pending).toBe(2);

    lock.release();
    await Promise.all([first, second]);
    expect(order).toEqual([1, 2]);
    expect(lock.isLocked()).toBe(false);
  });

  it('should hand the lock to a queued waiter on release', async () => {
    const lock = new AsyncLock();
    await lock.acquire();
    const waiter = lock.acquire();
    lock.release();
    expect(lock.isLocked()).toBe(true);
    expect(lock.pending).toBe(0);
    await waiter;
    lock.release();
    expect(lock.isLocked()).toBe(false);
  });

  it('should throw when released while not held', () => {
    const lock = new AsyncLock();
    expect(() => lock.release()).toThrow('AsyncLock released while not held');
  });

  it('should release after runExclusive even when the callback throws', async () => {
    const lock = new AsyncLock();
    await expect(
      lock.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(lock.isLocked()).toBe(false);
  });

  it('should serialize runExclusive callers', async () => {
    const lock = new AsyncLock();
    let active = 0;
    let maxActive = 0;
    const task = async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
    };

    await Promise.all([lock.runExclusive(task), lock.runExclusive(task), lock.runExclusive(task)]);
    expect(maxActive).toBe(1);
  });
});
