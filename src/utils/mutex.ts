/**
 * Async mutual exclusion. Callers run strictly one at a time in arrival
 * order; a failing critical section releases the lock.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(criticalSection: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await criticalSection();
    } finally {
      this.pending--;
      release();
    }
  }

  /** True while a critical section is running or queued */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
