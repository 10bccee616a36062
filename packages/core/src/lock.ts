/**
 * FIFO mutual exclusion for async work.
 * Waiters are woken in arrival order; the lock is handed over directly
 * so a newly arriving caller can never overtake a queued one.
 */
export class AsyncMutex {
  private locked = false;
  private waiting: Array<() => void> = [];

  async runExclusive<T>(func: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await func();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers queued behind the current holder. */
  get pending(): number {
    return this.waiting.length;
  }

  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    if (!this.locked) {
      throw new Error("Mutex released without acquisition.");
    }
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
  }
}
