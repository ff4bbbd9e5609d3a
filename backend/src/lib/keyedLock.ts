/**
 * In-process exclusive lock keyed by id. Tasks for the same key run one after
 * another in arrival order; tasks for different keys do not wait on each other.
 */
export class KeyedLock<K> {
  private readonly tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
