/**
 * Async counting semaphore. A mutex is a semaphore with one permit.
 */

export class Semaphore {
  private permits: number;
  private readonly queue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${String(permits)}`);
    }
    this.permits = permits;
  }

  /** Resolves with a release function once a permit is free. Releasing twice is a no-op. */
  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.queue.push(() => {
        resolve(this.releaser());
      });
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get waiting(): number {
    return this.queue.length;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.permits++;
      }
    };
  }
}

export class Mutex extends Semaphore {
  constructor() {
    super(1);
  }
}
