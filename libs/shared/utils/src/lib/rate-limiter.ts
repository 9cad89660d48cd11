import { sleep } from './retry';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
  capacity: number;
  refillRate: number;
}

export interface RateLimiterConfig {
  capacity?: number;
  /** Tokens added per second */
  refillRate?: number;
}

/**
 * Client-side token bucket per identifier (usually one per upstream API)
 */
export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly defaultCapacity: number;
  private readonly defaultRefillRate: number;

  constructor(config?: RateLimiterConfig) {
    this.defaultCapacity = config?.capacity ?? 100;
    this.defaultRefillRate = config?.refillRate ?? 10;
  }

  private getBucket(identifier: string): TokenBucket {
    let bucket = this.buckets.get(identifier);

    if (!bucket) {
      bucket = {
        tokens: this.defaultCapacity,
        lastRefill: Date.now(),
        capacity: this.defaultCapacity,
        refillRate: this.defaultRefillRate,
      };
      this.buckets.set(identifier, bucket);
    }

    return bucket;
  }

  private refillBucket(bucket: TokenBucket): void {
    const now = Date.now();
    const timePassed = (now - bucket.lastRefill) / 1000;
    const tokensToAdd = Math.floor(timePassed * bucket.refillRate);

    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(bucket.capacity, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }
  }

  checkLimit(identifier: string, tokensRequired = 1): boolean {
    const bucket = this.getBucket(identifier);
    this.refillBucket(bucket);

    if (bucket.tokens >= tokensRequired) {
      bucket.tokens -= tokensRequired;
      return true;
    }

    return false;
  }

  /**
   * Waits for tokens up to `maxWaitTime`. Returns false when the wait would exceed it.
   */
  async waitForTokens(
    identifier: string,
    tokensRequired = 1,
    maxWaitTime = 30000,
    signal?: AbortSignal
  ): Promise<boolean> {
    const startTime = Date.now();

    while (Date.now() - startTime <= maxWaitTime) {
      if (this.checkLimit(identifier, tokensRequired)) {
        return true;
      }

      const timeToWait = this.getTimeUntilRefill(identifier, tokensRequired);
      if (timeToWait + (Date.now() - startTime) > maxWaitTime) {
        break;
      }

      await sleep(Math.min(timeToWait, 1000), signal);
    }

    return false;
  }

  getRemainingTokens(identifier: string): number {
    const bucket = this.buckets.get(identifier);
    if (!bucket) {
      return this.defaultCapacity;
    }

    this.refillBucket(bucket);
    return bucket.tokens;
  }

  getTimeUntilRefill(identifier: string, tokensNeeded: number): number {
    const bucket = this.buckets.get(identifier);
    if (!bucket) {
      return 0;
    }

    this.refillBucket(bucket);
    if (bucket.tokens >= tokensNeeded) {
      return 0;
    }

    const elapsed = Date.now() - bucket.lastRefill;
    const tokensRequired = tokensNeeded - bucket.tokens;
    return Math.max(1, Math.ceil((tokensRequired / bucket.refillRate) * 1000) - elapsed);
  }

  reset(identifier: string): void {
    this.buckets.delete(identifier);
  }
}
