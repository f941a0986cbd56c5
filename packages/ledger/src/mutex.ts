/**
 * @verigate/ledger - Per-key async locks
 *
 * Operations on the same key run one at a time; different keys never wait
 * on each other. A waiter gives up after `timeoutMs`; a `null` timeout
 * waits for as long as it takes.
 */

class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  /** Resolves true once held, false if the wait timed out. */
  acquire(timeoutMs: number | null): Promise<boolean> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      if (timeoutMs === null) {
        this.queue.push(() => resolve(true));
        return;
      }
      const waiter = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.queue = this.queue.filter((w) => w !== waiter);
        resolve(false);
      }, timeoutMs);
      this.queue.push(waiter);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true.
      next();
    } else {
      this.locked = false;
    }
  }

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  get waiting(): number {
    return this.queue.length;
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, AsyncMutex>();

  /**
   * Run `fn` while holding the lock for `key`. Throws the error built by
   * `onTimeout` when the lock is not obtained in time.
   */
  async run<T>(key: string, timeoutMs: number | null, fn: () => Promise<T>, onTimeout: () => Error): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.locks.set(key, mutex);
    }

    const acquired = await mutex.acquire(timeoutMs);
    if (!acquired) {
      throw onTimeout();
    }

    try {
      return await fn();
    } finally {
      mutex.release();
      if (mutex.idle) this.locks.delete(key);
    }
  }

  /** Number of callers queued behind the current holder of `key`. */
  waiting(key: string): number {
    return this.locks.get(key)?.waiting ?? 0;
  }
}
