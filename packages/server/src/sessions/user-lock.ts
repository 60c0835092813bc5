/**
 * UserLock - one-slot semaphore per user id.
 *
 * Serializes work for a single user while leaving other users untouched.
 * Waiters are served in FIFO order.
 */

interface WaitingRequest {
  resolve: () => void;
  reject: (error: Error) => void;
}

interface KeyState {
  waiting: WaitingRequest[];
}

export class UserLock {
  /** Present while the key is held; waiters queue on the entry. */
  private held = new Map<string, KeyState>();

  /**
   * Whether a holder is active for the key.
   */
  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  /**
   * Number of requests waiting for the key.
   */
  getWaitingCount(key: string): number {
    return this.held.get(key)?.waiting.length ?? 0;
  }

  /**
   * Take the key without waiting. Returns false if it is held.
   */
  tryAcquire(key: string): boolean {
    if (this.held.has(key)) return false;
    this.held.set(key, { waiting: [] });
    return true;
  }

  /**
   * Take the key, waiting behind the current holder if needed.
   */
  async acquire(key: string): Promise<void> {
    if (this.tryAcquire(key)) {
      return;
    }

    const state = this.held.get(key);
    if (!state) {
      // Unreachable: tryAcquire only fails while the key is held.
      throw new Error(`UserLock state missing for ${key}`);
    }

    return new Promise<void>((resolve, reject) => {
      state.waiting.push({ resolve, reject });
    });
  }

  /**
   * Release the key. Ownership passes directly to the next waiter, if any.
   */
  release(key: string): void {
    const state = this.held.get(key);
    if (!state) {
      console.warn(`[UserLock] release() called for ${key} which is not held`);
      return;
    }

    const next = state.waiting.shift();
    if (!next) {
      this.held.delete(key);
      return;
    }
    next.resolve();
  }

  /**
   * Reject every waiter. Called during shutdown.
   */
  clearWaiting(error?: Error): void {
    const err = error ?? new Error('UserLock shutting down');
    for (const state of this.held.values()) {
      for (const request of state.waiting) {
        request.reject(err);
      }
      state.waiting = [];
    }
  }
}
