/**
 * Single-holder async lock.
 *
 * Waiters resume one at a time as the holder releases. Hand-off order is
 * the queue order, but callers must not rely on it.
 *
 * @module utils/exclusiveLock
 */

export class ExclusiveLock {
  private held = false;
  private readonly waiting: Array<() => void> = [];

  get isLocked(): boolean {
    return this.held;
  }

  /** Number of callers queued behind the current holder. */
  get pending(): number {
    return this.waiting.length;
  }

  async acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
    } else {
      this.held = false;
    }
  }

  /** Run `work` while holding the lock; the lock is released however it settles. */
  async run<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }
}
