/**
 * In-process mutual exclusion keyed by string.
 *
 * Each key holds the tail of a promise chain; an operation waits for the
 * previous tail, then runs. Keys are removed once their chain drains.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => done);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with an operation running or queued.
   */
  get size(): number {
    return this.tails.size;
  }
}
