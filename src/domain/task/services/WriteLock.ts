/**
 * In-process mutex for serializing store mutations.
 *
 * Waiters are served FIFO. The lock is handed to the next waiter as soon as the
 * holder settles, whether it resolved or threw.
 */
export class WriteLock {
  private held = false;
  private waiters: Array<() => void> = [];

  /**
   * Acquire the lock. Resolves with a release function.
   */
  acquire(): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(() => this.release());
    }

    return new Promise<() => void>((resolve) => {
      this.waiters.push(() => resolve(() => this.release()));
    });
  }

  /**
   * Run fn while holding the lock
   */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.held;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand over without clearing `held`
      next();
    } else {
      this.held = false;
    }
  }
}
