import { describe, expect, it } from 'vitest';
import { SyncMutex } from './sync-mutex.js';

describe('SyncMutex', () => {
  it('should grant the lock immediately when free', async () => {
    const mutex = new SyncMutex();

    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);

    release();
    expect(mutex.isLocked).toBe(false);
  });

  it('should serve waiters in arrival order', async () => {
    const mutex = new SyncMutex();
    const order: string[] = [];
    const release = await mutex.acquire();

    const first = mutex.withLock(() => {
      order.push('first');
    });
    const second = mutex.withLock(() => {
      order.push('second');
    });
    expect(mutex.pending).toBe(2);

    order.push('holder');
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['holder', 'first', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('should never run two critical sections at once', async () => {
    const mutex = new SyncMutex();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 20 }, () =>
        mutex.withLock(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, 1));
          active--;
        })
      )
    );

    expect(maxActive).toBe(1);
  });

  it('should release the lock when the critical section throws', async () => {
    const mutex = new SyncMutex();

    await expect(
      mutex.withLock(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
  });

  it('should ignore a second release call', async () => {
    const mutex = new SyncMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();
    const releaseSecond = await waiting;

    expect(mutex.isLocked).toBe(true);
    releaseSecond();
    expect(mutex.isLocked).toBe(false);
  });

  it('should drop an aborted waiter from the queue', async () => {
    const mutex = new SyncMutex();
    const controller = new AbortController();
    const release = await mutex.acquire();

    const aborted = mutex.acquire(controller.signal);
    const next = mutex.acquire();
    controller.abort();

    await expect(aborted).rejects.toMatchObject({ name: 'AbortError' });
    expect(mutex.pending).toBe(1);

    release();
    const releaseNext = await next;
    expect(mutex.isLocked).toBe(true);
    releaseNext();
  });

  it('should reject immediately with an already aborted signal', async () => {
    const mutex = new SyncMutex();
    const controller = new AbortController();
    controller.abort();

    await expect(mutex.acquire(controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(mutex.isLocked).toBe(false);
  });
});
