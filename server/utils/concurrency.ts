/**
 * Promise-based mutual exclusion. Waiters are served in arrival order.
 */
export class Mutex {
  private readonly waiters: Array<() => void> = [];
  private locked = false;

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }

    if (!this.locked) {
      this.locked = true;
      return () => this.release();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(notify);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error('Aborted'));
      };

      const notify = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(() => this.release());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(notify);
    });
  }

  /** Takes the lock only when it is free; null when someone holds it. */
  tryAcquire(): (() => void) | null {
    if (this.locked) {
      return null;
    }
    this.locked = true;
    return () => this.release();
  }

  async runExclusive<T>(task: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private release() {
    const next = this.waiters.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
      return;
    }
    this.locked = false;
  }
}
