/**
 * Per-key asynchronous mutual exclusion. Critical sections for the same key
 * run one after another in arrival order; different keys never wait on each
 * other. Multi-key sections acquire their keys in sorted order so two callers
 * locking overlapping sets cannot deadlock.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Runs {@link task} once every earlier holder of {@link key} has finished. */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    return this.runExclusiveMany([key], task);
  }

  /** Runs {@link task} while holding every key in {@link keys}. */
  async runExclusiveMany<T>(keys: readonly string[], task: () => Promise<T> | T): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** Number of keys with a pending or active holder. */
  get size(): number {
    return this.tails.size;
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
