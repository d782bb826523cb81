import { sleep } from '../../core/retry.js';

/**
 * Token bucket refilled continuously at `requestsPerMinute`. Callers past the
 * limit wait in FIFO order instead of failing.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();
  private ratePerMs: number;

  constructor(
    private capacity: number,
    requestsPerMinute: number,
    private deps: { clock?: () => number; sleep?: (ms: number) => Promise<void> } = {}
  ) {
    if (capacity <= 0 || requestsPerMinute <= 0) {
      throw new Error('TokenBucket capacity and rate must be positive');
    }
    this.tokens = capacity;
    this.ratePerMs = requestsPerMinute / 60_000;
    this.lastRefill = this.now();
  }

  private now(): number {
    return (this.deps.clock ?? Date.now)();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.ratePerMs);
    this.lastRefill = now;
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  /** Resolves once a token has been taken. */
  acquire(): Promise<void> {
    const next = this.queue.then(() => this.take());
    this.queue = next;
    return next;
  }

  private async take(): Promise<void> {
    const pause = this.deps.sleep ?? sleep;
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      await pause(Math.ceil((1 - this.tokens) / this.ratePerMs));
    }
  }
}
