/**
 * Token-bucket rate limiting per endpoint class
 */

import { TransientNetworkError, makeContext } from '../utils/ErrorHandler';

export const ENDPOINT_CLASSES = ['trade', 'query', 'market'] as const;

export type EndpointClass = (typeof ENDPOINT_CLASSES)[number];

export interface TokenBucketConfig {
  /** Tokens added per second */
  requestsPerSecond: number;
  /** Bucket capacity */
  burstSize: number;
}

export interface RateLimiterOptions {
  buckets: Record<EndpointClass, TokenBucketConfig>;
  /** Longest a caller may wait for a token before the call is refused */
  maxWaitMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface BucketState {
  config: TokenBucketConfig;
  tokens: number;
  lastRefill: number;
}

export class RateLimiter {
  private buckets: Map<EndpointClass, BucketState> = new Map();
  private readonly maxWaitMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    this.maxWaitMs = options.maxWaitMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));

    const start = this.now();
    for (const endpoint of ENDPOINT_CLASSES) {
      const config = options.buckets[endpoint];
      this.buckets.set(endpoint, { config, tokens: config.burstSize, lastRefill: start });
    }
  }

  /**
   * Takes one token, waiting for a refill if needed
   */
  async acquire(endpoint: EndpointClass): Promise<void> {
    const bucket = this.getBucket(endpoint);
    this.refill(bucket);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return;
    }

    const waitMs = Math.ceil(((1 - bucket.tokens) / bucket.config.requestsPerSecond) * 1000);
    if (waitMs > this.maxWaitMs) {
      throw new TransientNetworkError(
        `Rate limit budget for ${endpoint} exhausted; next token in ${waitMs}ms`,
        makeContext('acquire', 'RateLimiter', { metadata: { endpoint, waitMs } }),
        'RATE_LIMIT_WAIT_EXCEEDED'
      );
    }

    // Reserve the token now so concurrent callers queue behind this one
    bucket.tokens -= 1;
    await this.sleep(waitMs);
  }

  /**
   * Tokens currently available, after refill
   */
  available(endpoint: EndpointClass): number {
    const bucket = this.getBucket(endpoint);
    this.refill(bucket);
    return bucket.tokens;
  }

  private refill(bucket: BucketState): void {
    const now = this.now();
    const elapsedSeconds = (now - bucket.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      bucket.tokens = Math.min(
        bucket.config.burstSize,
        bucket.tokens + elapsedSeconds * bucket.config.requestsPerSecond
      );
      bucket.lastRefill = now;
    }
  }

  private getBucket(endpoint: EndpointClass): BucketState {
    const bucket = this.buckets.get(endpoint);
    if (!bucket) {
      throw new Error(`No rate limit bucket configured for ${endpoint}`);
    }
    return bucket;
  }
}
