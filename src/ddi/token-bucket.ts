/**
 * Token bucket throttle
 *
 * Tokens refill continuously at `ratePerSecond` up to `capacity`. Waiters are
 * served in arrival order and sleep until their token is due.
 */

import { sleep } from "../utils/async.js";

export interface TokenBucketOptions {
  ratePerSecond: number;
  /** Burst size; defaults to one second's worth of tokens, at least 1 */
  capacity?: number;
}

export class TokenBucket {
  private readonly ratePerSecond: number;
  private readonly capacity: number;
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: TokenBucketOptions) {
    if (!(options.ratePerSecond > 0)) {
      throw new RangeError("ratePerSecond must be greater than 0");
    }
    this.ratePerSecond = options.ratePerSecond;
    // Below one token the bucket could never admit a request
    this.capacity = Math.max(1, options.capacity ?? options.ratePerSecond);
    this.tokens = this.capacity;
    this.lastRefill = Date.now();
  }

  /**
   * Wait for a token. Rejects without consuming one if `signal` aborts.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.take(signal));
    // A cancelled waiter must not block the ones queued behind it
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Take a token if one is available right now
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  private async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();
      if (this.tryAcquire()) return;

      const waitMs = Math.ceil(
        ((1 - this.tokens) / this.ratePerSecond) * 1000
      );
      await sleep(waitMs, signal);
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsedMs = now - this.lastRefill;
    if (elapsedMs <= 0) return;

    this.tokens = Math.min(
      this.capacity,
      this.tokens + (elapsedMs * this.ratePerSecond) / 1000
    );
    this.lastRefill = now;
  }
}
