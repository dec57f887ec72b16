import { sleep } from '../utils/sleep.js';

export interface RequestBudget {
  /** Resolves once a request may be sent */
  acquire(): Promise<void>;
}

/**
 * Token bucket shared by every job that talks to one exchange.
 * Acquisitions are served one at a time in call order, so concurrent jobs
 * never draw from the bucket at once.
 */
export class RateLimiter implements RequestBudget {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;  // tokens/ms
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(maxPerSec: number = 10) {
    if (!(maxPerSec > 0)) throw new Error(`maxPerSec must be positive, got ${maxPerSec}`);
    this.maxTokens = Math.max(1, maxPerSec);
    this.tokens = this.maxTokens;
    this.refillRate = maxPerSec / 1000;
    this.lastRefill = Date.now();
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  private async take(): Promise<void> {
    this.refill();

    if (this.tokens < 1) {
      const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
      await sleep(waitMs);
      this.refill();
    }
    this.tokens--;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
