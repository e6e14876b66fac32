/**
 * Keyed Mutex
 *
 * Per-key async mutual exclusion. Callers for the same key run one at a
 * time in arrival order; different keys never wait on each other. Idle
 * keys are dropped so the map only holds keys with pending work.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any caller holds or waits for `key` */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with pending work */
  get size(): number {
    return this.tails.size;
  }
}
