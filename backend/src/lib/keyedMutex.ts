/**
 * Keyed Mutex
 * Per-key FIFO mutual exclusion for read-modify-write sections.
 *
 * Callers holding more than one scope must always acquire them in the same
 * order (ticket before expert) to stay deadlock free.
 */

interface LockEntry {
  /** Waiters queued behind the current holder */
  waiters: Array<() => void>;
}

export class KeyedMutex {
  private readonly held = new Map<string, LockEntry>();

  constructor(private readonly scope: string) {}

  /**
   * Run `fn` while holding the lock for `key`. The lock is released when the
   * returned promise settles, whether `fn` resolves or throws.
   */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /**
   * Number of callers waiting for `key` (not counting the holder)
   */
  queueLength(key: string): number {
    return this.held.get(key)?.waiters.length ?? 0;
  }

  toString(): string {
    return `KeyedMutex(${this.scope}, ${this.held.size} held)`;
  }

  private acquire(key: string): Promise<void> {
    const entry = this.held.get(key);
    if (!entry) {
      this.held.set(key, { waiters: [] });
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      entry.waiters.push(resolve);
    });
  }

  private release(key: string): void {
    const entry = this.held.get(key);
    if (!entry) return;

    const next = entry.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
      return;
    }

    this.held.delete(key);
  }
}
