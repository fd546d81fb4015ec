/**
 * Meshconf Kernel: Keyed Mutex
 *
 * One FIFO lock per key. Holders of different keys never wait on each
 * other; waiters on the same key are admitted strictly in arrival order.
 *
 * Entries exist only while a key is held, so the table does not grow with
 * the number of distinct keys ever seen.
 */

/** Releases a held lock. Calling it more than once has no further effect. */
export type Release = () => void;

interface LockEntry {
  readonly waiters: Array<() => void>;
}

export class KeyedMutex<K = string> {
  private readonly locks = new Map<K, LockEntry>();

  /**
   * Wait until `key` is free, take it, and return its release function.
   */
  acquire(key: K): Promise<Release> {
    const entry = this.locks.get(key);
    if (entry === undefined) {
      this.locks.set(key, { waiters: [] });
      return Promise.resolve(this.releaseFor(key));
    }
    return new Promise<Release>((resolve) => {
      entry.waiters.push(() => resolve(this.releaseFor(key)));
    });
  }

  /**
   * Run `task` while holding `key`. The lock is released when the task
   * settles, whether it resolved or threw.
   */
  async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  /** True while some caller holds `key`. */
  isLocked(key: K): boolean {
    return this.locks.has(key);
  }

  /** Number of keys currently held. */
  get heldCount(): number {
    return this.locks.size;
  }

  private releaseFor(key: K): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const entry = this.locks.get(key);
      if (entry === undefined) return;
      const next = entry.waiters.shift();
      if (next !== undefined) {
        // Ownership passes directly to the next waiter; the key stays held.
        next();
      } else {
        this.locks.delete(key);
      }
    };
  }
}
