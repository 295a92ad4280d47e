/**
 * Async mutual exclusion for serializing critical sections.
 *
 * @module utils/concurrency
 */

/**
 * FIFO async mutex.
 *
 * Callers queue in arrival order; a section that throws still releases the
 * lock. Not reentrant: awaiting `runExclusive` on the same mutex from inside
 * a section deadlocks.
 *
 * @example
 * ```typescript
 * const sendLock = new Mutex();
 * await sendLock.runExclusive(() => writeFrame(frame));
 * ```
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Run `fn` once every earlier caller has finished.
   *
   * @returns Promise resolving to the function's result
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Whether a section is currently running.
   */
  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock.
   */
  getQueueSize(): number {
    return this.queue.length;
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.queue.push(resolve));
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes directly to the next waiter; `locked` stays true.
      next();
    } else {
      this.locked = false;
    }
  }
}
