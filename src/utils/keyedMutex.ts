/**
 * Per-key mutual exclusion for async operations.
 *
 * Callers on the same key run strictly one after another in arrival order;
 * different keys never wait on each other. Entries are dropped once a key has
 * no holder and no waiters.
 *
 * @example
 * ```ts
 * const locks = new KeyedMutex();
 * await locks.runExclusive(swapId, () => {
 *   // only one transition for this swap id at a time
 * });
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Waits for every earlier holder of `key`, then returns a release function
   * that MUST be called when done.
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
