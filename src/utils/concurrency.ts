/**
 * Concurrency primitives: a counting semaphore, a bounded parallel map
 * and a fair read/write lock.
 */

/**
 * Simple semaphore for controlling concurrency
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.permits--;
        resolve();
      });
    });
  }

  private release(): void {
    this.permits++;
    const next = this.waiting.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Map over `items` with at most `limit` calls in flight.
 * Results keep input order. Every call settles before the returned
 * promise does.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(Math.max(1, limit));
  return Promise.allSettled(items.map((item, index) => semaphore.run(() => fn(item, index))));
}

interface LockWaiter {
  exclusive: boolean;
  grant: () => void;
}

/**
 * First-come first-served read/write lock.
 *
 * Shared holders run together; an exclusive holder runs alone. A queued
 * exclusive request blocks shared requests that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: LockWaiter[] = [];

  shared<T>(fn: () => Promise<T>): Promise<T> {
    return this.withLock(false, fn);
  }

  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.withLock(true, fn);
  }

  /** Whether anyone holds or waits for the lock */
  get busy(): boolean {
    return this.writer || this.readers > 0 || this.queue.length > 0;
  }

  private async withLock<T>(exclusive: boolean, fn: () => Promise<T>): Promise<T> {
    await this.acquire(exclusive);
    try {
      return await fn();
    } finally {
      this.release(exclusive);
    }
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writer && this.readers === 0 : !this.writer;
  }

  private take(exclusive: boolean): void {
    if (exclusive) {
      this.writer = true;
    } else {
      this.readers++;
    }
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({
        exclusive,
        grant: () => {
          this.take(exclusive);
          resolve();
        },
      });
    });
  }

  private release(exclusive: boolean): void {
    if (exclusive) {
      this.writer = false;
    } else {
      this.readers--;
    }

    for (let next = this.queue[0]; next && this.canGrant(next.exclusive); next = this.queue[0]) {
      this.queue.shift();
      next.grant();
    }
  }
}
