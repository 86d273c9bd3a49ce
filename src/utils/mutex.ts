import { LockQueueFullError } from '../shared/errors.js';

export type Release = () => void;

export interface MutexOptions {
  /** Waiters allowed behind the holder; unlimited when omitted. */
  maxWaiting?: number;
}

type Waiter = {
  resolve: (release: Release) => void;
};

/**
 * FIFO mutual exclusion for async work. Waiters are granted the lock in the
 * order they called `acquire`, which is what keeps turns in one conversation
 * in delivery order.
 */
export class Mutex {
  private readonly waiters: Waiter[] = [];
  private locked = false;

  constructor(private readonly options: MutexOptions = {}) {}

  acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    const max = this.options.maxWaiting;
    if (max !== undefined && this.waiters.length >= max) {
      return Promise.reject(new LockQueueFullError(max));
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push({ resolve });
    });
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked() {
    return this.locked;
  }

  pending() {
    return this.waiters.length;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.dispatchNext();
    };
  }

  private dispatchNext() {
    const next = this.waiters.shift();
    if (!next) {
      this.locked = false;
      return;
    }
    next.resolve(this.createRelease());
  }
}
