/**
 * Rate limiting types
 */

/** Token bucket configuration shared by every bucket of a limiter */
export interface RateLimiterOptions {
  /** Tokens added per second */
  ratePerSecond: number;
  /** Bucket capacity, also the initial token count */
  burst: number;
}

/** Token bucket state */
export interface TokenBucketState {
  /** Current number of tokens in the bucket (fractional, negative while reserved) */
  tokens: number;
  /** Timestamp of last refill operation (ms since epoch) */
  lastRefill: number;
}
