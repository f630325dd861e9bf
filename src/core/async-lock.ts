/**
 * Mutual-exclusion lock for async code.
 *
 * Waiters are served in FIFO order; release hands the lock straight to the
 * next waiter.
 */
export class AsyncLock {
  private locked = false;
  private queue: (() => void)[] = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Lock stays held; ownership moves to the next waiter
      next();
    } else {
      this.locked = false;
    }
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
