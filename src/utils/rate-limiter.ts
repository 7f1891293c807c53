/**
 * @fileoverview In-memory token bucket rate limiter keyed by an arbitrary
 * string (the repository of a verified assertion).
 *
 * Algorithm overview:
 * - Each key starts with a full bucket of `burst` tokens
 * - Each allowed call consumes one token
 * - Tokens refill continuously at `ratePerSecond`, capped at `burst`
 * - An empty bucket rejects immediately; nothing is consumed
 *
 * Buckets live in one map owned by the limiter. Creation and consumption are
 * synchronous, so concurrent first use of a key always sees a single bucket.
 *
 * @see {@link https://en.wikipedia.org/wiki/Token_bucket} - Token bucket algorithm
 *
 * @module utils/rate-limiter
 */

import type { RateLimiterOptions, TokenBucketState } from "~/types";
import { TIME } from "~/types";

/**
 * Token bucket for one key
 */
class TokenBucket {
  private readonly state: TokenBucketState;

  constructor(
    private readonly ratePerSecond: number,
    private readonly burst: number,
    now: number,
  ) {
    this.state = { tokens: burst, lastRefill: now };
  }

  /** Consume a token if one is available */
  tryTake(now: number): boolean {
    this.refill(now);
    if (this.state.tokens < 1) {
      return false;
    }
    this.state.tokens -= 1;
    return true;
  }

  /**
   * Consume a token unconditionally, possibly going into debt
   *
   * @returns milliseconds until the reserved token is due
   */
  reserve(now: number): number {
    this.refill(now);
    this.state.tokens -= 1;
    if (this.state.tokens >= 0) {
      return 0;
    }
    return Math.ceil((-this.state.tokens / this.ratePerSecond) * TIME.SECOND);
  }

  /** Give back a reservation that was never used */
  release(now: number): void {
    this.refill(now);
    this.state.tokens = Math.min(this.burst, this.state.tokens + 1);
  }

  /**
   * Refill formula: `tokens += (elapsed / 1000) * ratePerSecond`
   * Tokens are capped at burst to prevent unbounded accumulation.
   */
  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.state.lastRefill);
    const tokensToAdd = (elapsed / TIME.SECOND) * this.ratePerSecond;
    this.state.tokens = Math.min(this.burst, this.state.tokens + tokensToAdd);
    this.state.lastRefill = now;
  }
}

/**
 * Per-key token bucket rate limiter
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ ratePerSecond: 1, burst: 5 });
 * if (!limiter.allow(claims.repository)) {
 *   throw new RateLimitedError(claims.repository);
 * }
 * ```
 */
export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly ratePerSecond: number;
  private readonly burst: number;

  constructor(options: RateLimiterOptions) {
    if (!(options.ratePerSecond > 0) || !Number.isFinite(options.ratePerSecond)) {
      throw new RangeError("ratePerSecond must be a positive number");
    }
    if (!Number.isInteger(options.burst) || options.burst < 1) {
      throw new RangeError("burst must be a positive integer");
    }
    this.ratePerSecond = options.ratePerSecond;
    this.burst = options.burst;
  }

  /**
   * Non-blocking check; consumes a token when one is available
   */
  allow(key: string): boolean {
    return this.getBucket(key).tryTake(Date.now());
  }

  /**
   * Wait until a token for `key` is available and consume it
   *
   * The token is reserved up front so waiters are served in arrival order.
   * If `signal` aborts first the reservation is returned and the promise
   * rejects with the abort reason.
   */
  async wait(key: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const bucket = this.getBucket(key);
    const delay = bucket.reserve(Date.now());
    if (delay === 0) {
      return;
    }

    try {
      await sleep(delay, signal);
    } catch (error) {
      bucket.release(Date.now());
      throw error;
    }
  }

  /**
   * Drop every bucket (tests and operations only)
   */
  reset(): void {
    this.buckets.clear();
  }

  /**
   * Number of distinct keys currently tracked
   */
  size(): number {
    return this.buckets.size;
  }

  private getBucket(key: string): TokenBucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new TokenBucket(this.ratePerSecond, this.burst, Date.now());
      this.buckets.set(key, bucket);
    }
    return bucket;
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
