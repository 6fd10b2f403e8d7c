/**
 * Per-source rate limiter
 *
 * Each source gets its own token bucket, built lazily from the configured
 * policy on first use. Waiting on one source's bucket never touches another's.
 */

import type { RateLimit, SourceType } from '@skillforge/ipc';
import { RateLimitAbortedError } from '../errors';
import { createTokenBucket } from './token-bucket';
import type { TokenBucket } from './token-bucket';

/** Default policy per built-in source */
export const DEFAULT_RATE_LIMITS: Readonly<Record<string, RateLimit>> = {
  local: { requestsPerMinute: 0, burstSize: 0 },
  'skills.sh': { requestsPerMinute: 60, burstSize: 10 },
  // unauthenticated search quota
  github: { requestsPerMinute: 10, burstSize: 5 },
  gitlab: { requestsPerMinute: 10, burstSize: 5 },
  bitbucket: { requestsPerMinute: 10, burstSize: 5 },
  codeberg: { requestsPerMinute: 20, burstSize: 5 },
};

/** Policy for sources with no configured limit */
export const FALLBACK_RATE_LIMIT: RateLimit = { requestsPerMinute: 10, burstSize: 5 };

export class RateLimiter {
  /** `null` marks an unlimited source whose bucket was already resolved */
  private readonly buckets = new Map<SourceType, TokenBucket | null>();
  private readonly limits: Map<SourceType, RateLimit>;

  constructor(limits: Readonly<Record<string, RateLimit>> = DEFAULT_RATE_LIMITS) {
    this.limits = new Map(Object.entries(limits));
  }

  /**
   * Wait until a request to `source` is admitted.
   * Rejects with RateLimitAbortedError if the signal aborts first.
   */
  async wait(source: SourceType, signal?: AbortSignal): Promise<void> {
    const bucket = this.getBucket(source);
    if (!bucket) return;

    try {
      await bucket.take(signal);
    } catch (err) {
      throw new RateLimitAbortedError(source, err);
    }
  }

  getLimit(source: SourceType): RateLimit {
    return this.limits.get(source) ?? FALLBACK_RATE_LIMIT;
  }

  /**
   * Replace the policy for one source. Its bucket is discarded and rebuilt
   * from the new policy on next use; other buckets are untouched.
   */
  setLimit(source: SourceType, limit: RateLimit): void {
    this.limits.set(source, { ...limit });
    this.buckets.delete(source);
  }

  /** The bucket for a source, creating it on first use */
  getBucket(source: SourceType): TokenBucket | null {
    const existing = this.buckets.get(source);
    if (existing !== undefined) return existing;

    const bucket = createTokenBucket(this.getLimit(source));
    this.buckets.set(source, bucket);
    return bucket;
  }
}
