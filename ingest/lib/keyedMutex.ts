/**
 * In-process exclusive lock per key, FIFO. Used to serialise the
 * read-modify-write of one history file when several date tasks reach the
 * same security at once. Keys with no holder and no waiters are dropped.
 */
export class KeyedMutex {
  private readonly queues = new Map<string, Array<() => void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  private acquire(key: string): Promise<void> {
    const waiters = this.queues.get(key);
    if (!waiters) {
      this.queues.set(key, []);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      waiters.push(resolve);
    });
  }

  private release(key: string): void {
    const waiters = this.queues.get(key);
    if (!waiters) return;
    const next = waiters.shift();
    if (next) {
      next();
    } else {
      this.queues.delete(key);
    }
  }
}
