/**
 * Publish Lock - mutual exclusion for editing one published summary.
 *
 * One lock exists per batch, so concurrent re-probes in the same room take
 * turns publishing while unrelated rooms never wait on each other. Waiters
 * are served in FIFO order.
 */

/**
 * A lock handle that must be released after use.
 */
export interface PublishLockHandle {
  acquiredAt: number;
  release: () => void;
}

export class PublishLock {
  private held = false;
  private readonly waiters: Array<(handle: PublishLockHandle) => void> = [];

  isLocked(): boolean {
    return this.held;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<PublishLockHandle> {
    if (!this.held) {
      this.held = true;
      return this.createHandle();
    }
    return new Promise<PublishLockHandle>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run a critical section while holding the lock, releasing on every exit path.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const handle = await this.acquire();
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  private createHandle(): PublishLockHandle {
    let released = false;
    return {
      acquiredAt: Date.now(),
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  // Ownership passes straight to the next waiter so nobody can barge in between.
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next(this.createHandle());
    } else {
      this.held = false;
    }
  }
}
