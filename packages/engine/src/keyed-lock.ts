/**
 * Per-key mutual exclusion.
 *
 * Each key owns a promise chain; work for the same key runs strictly one at a
 * time, work for different keys never waits on each other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has settled.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    // The chain must survive failures of individual holders
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any work for `key` is running or queued */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with running or queued work */
  get size(): number {
    return this.tails.size;
  }
}
