/**
 * Token bucket with continuous refill
 *
 * Tokens accrue at `refillRate` per second up to `maxTokens`. Each admitted
 * call consumes one token. Callers that find the bucket empty sleep for
 * exactly the time one token takes to accrue, then re-evaluate.
 */

import type { RateLimit } from '@skillforge/ipc';
import { sleep } from '../utils/abort';

export class TokenBucket {
  private tokens: number;
  readonly maxTokens: number;
  /** Tokens per second */
  readonly refillRate: number;
  private lastRefill: number;

  constructor(maxTokens: number, refillRate: number) {
    this.tokens = maxTokens;
    this.maxTokens = maxTokens;
    this.refillRate = refillRate;
    this.lastRefill = performance.now();
  }

  /** Tokens currently available after refilling for elapsed time */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Take one token, waiting for it if necessary. Rejects with the signal's
   * reason if aborted while waiting.
   */
  async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const waitMs = this.tryTake();
      if (waitMs === 0) return;
      await sleep(waitMs, signal);
    }
  }

  /**
   * Refill and consume in one synchronous step. Returns 0 when a token was
   * taken, otherwise the milliseconds until one token is available.
   */
  tryTake(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    return Math.max(1, Math.ceil(((1 - this.tokens) / this.refillRate) * 1000));
  }

  private refill(): void {
    const now = performance.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }
}

/**
 * Build a bucket for a policy. `requestsPerMinute: 0` means unlimited and
 * yields no bucket at all. A zero burst defaults to ten seconds of traffic,
 * and never less than one token so slow policies still admit.
 */
export function createTokenBucket(limit: RateLimit): TokenBucket | null {
  if (limit.requestsPerMinute <= 0) return null;

  const maxTokens = limit.burstSize > 0 ? limit.burstSize : Math.max(1, limit.requestsPerMinute / 6);
  return new TokenBucket(maxTokens, limit.requestsPerMinute / 60);
}
