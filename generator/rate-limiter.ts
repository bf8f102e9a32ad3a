/**
 * Rate limiter shared by every request a client makes.
 *
 * Dispatch slots are handed out strictly one at a time: each caller waits
 * for the previous slot to be granted, then for the minimum delay since that
 * dispatch. The request itself runs outside the lock, so concurrent callers
 * may overlap in flight but never start closer together than `minDelayMs`.
 */

export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const MAX_QUEUE_SIZE = 500; // Prevent unbounded queue growth

export interface RateLimiterOptions {
  minDelayMs: number;
  sleep?: SleepFn;
  now?: ClockFn;
}

export class RateLimiter {
  private readonly minDelayMs: number;
  private readonly sleep: SleepFn;
  private readonly now: ClockFn;
  /** Tail of the dispatch chain; resolves once the last queued slot is granted */
  private tail: Promise<void> = Promise.resolve();
  private lastDispatch: number | null = null;
  private waiting = 0;

  constructor(options: RateLimiterOptions) {
    this.minDelayMs = Math.max(0, options.minDelayMs);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /** Run `fn` once a dispatch slot is available. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.waiting >= MAX_QUEUE_SIZE) {
      throw new Error('Rate limiter queue full');
    }

    this.waiting++;
    const slot = this.tail.then(() => this.acquire());
    // Keep the chain alive even if a slot wait were to reject
    this.tail = slot.catch(() => undefined);

    try {
      await slot;
    } finally {
      this.waiting--;
    }
    return fn();
  }

  private async acquire(): Promise<void> {
    if (this.lastDispatch !== null) {
      const elapsed = this.now() - this.lastDispatch;
      if (elapsed < this.minDelayMs) {
        await this.sleep(this.minDelayMs - elapsed);
      }
    }
    this.lastDispatch = this.now();
  }

  getQueueSize(): number {
    return this.waiting;
  }
}
