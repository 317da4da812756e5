/**
 * Per-key FIFO mutex built on promise chaining.
 *
 * Each `acquire` waits for the previous holder of the same key and
 * returns a release function. Keys with no holder are forgotten, so the
 * map only grows with the number of sessions currently busy.
 */
export class SessionLock {
  private readonly tails: Map<string, Promise<void>> = new Map();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
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

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Keys currently held or waited on. */
  get busyKeys(): number {
    return this.tails.size;
  }
}
