/**
 * AsyncMutex: single-writer lock for the evolution engine.
 *
 * Pool files and the metrics file are read-modify-written; holders of this
 * lock are the only writers inside one process. Waiters are served FIFO.
 */
export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Acquire the lock. Resolves to an idempotent release function.
   */
  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }
    return new Promise(resolve => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  /**
   * Run `fn` while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}
