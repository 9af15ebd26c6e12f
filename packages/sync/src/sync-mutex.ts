interface Waiter {
  grant: () => void;
}

/**
 * Async mutual exclusion lock guarding entity store writes.
 *
 * Waiters are served in arrival order. Releasing hands the lock straight to
 * the next waiter, so no other caller can slip in between.
 *
 * @example
 * ```typescript
 * const mutex = new SyncMutex();
 * await mutex.withLock(async () => {
 *   await store.upsert(entity);
 * });
 * ```
 */
export class SyncMutex {
  private locked = false;
  private readonly waiters: Waiter[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the lock and return its release function.
   *
   * Aborting `signal` while waiting removes the caller from the queue and
   * rejects with the abort reason. Calling the release function more than
   * once has no effect.
   */
  async acquire(signal?: AbortSignal): Promise<() => void> {
    signal?.throwIfAborted();

    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    return this.createRelease();
  }

  /**
   * Run `fn` while holding the lock
   */
  async withLock<T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.locked = false;
      }
    };
  }
}
