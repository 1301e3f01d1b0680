/**
 * Bounded worker pool
 *
 * Caps how many tasks run at once, which is what keeps concurrent calls to the
 * search and generation services inside their rate limits. Waiting tasks are
 * rejected when their signal aborts; slots are always released.
 */

import { CancelledError } from './errors.js';

interface Waiter {
  resolve: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class WorkerPool {
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(public readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /** Tasks currently holding a slot */
  get running(): number {
    return this.active;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.queue.length;
  }

  async run<T>(task: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      if (signal?.aborted) throw new CancelledError();
      return await task(signal);
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new CancelledError());

    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this.queue.indexOf(waiter);
          if (idx >= 0) this.queue.splice(idx, 1);
          reject(new CancelledError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter; active count is unchanged
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.resolve();
      return;
    }
    this.active--;
  }
}
