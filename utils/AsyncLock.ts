/**
 * Single-holder async mutex. Waiters are served in FIFO order and the lock is
 * handed over directly on release, so a queued waiter cannot be overtaken.
 */
export class AsyncLock {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    // Wait in queue
    await new Promise<void>(resolve => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    if (!this.locked) {
      throw new Error('AsyncLock released while not held');
    }
    const next = this.queue.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.queue.length;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
