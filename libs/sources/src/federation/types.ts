/**
 * Federation service options
 */

import type { RateLimit, SourceType } from '@skillforge/ipc';
import type { Logger } from '../logger';
import type { SearchCache, SkillCache } from '../cache';
import type { RateLimiter } from '../rate-limit';

export interface FederationServiceOptions {
  logger?: Logger;
  /** Shared caches and limiter; built from the settings below when omitted */
  searchCache?: SearchCache;
  skillCache?: SkillCache;
  rateLimiter?: RateLimiter;
  /** Per-source policies merged over DEFAULT_RATE_LIMITS; ignored with `rateLimiter` */
  rateLimits?: Readonly<Record<string, RateLimit>>;
  /** TTL of cached search results and skills in ms; ignored with injected caches (default: 600000) */
  cacheTtlMs?: number;
  /** Expired-entry sweep interval in ms (default: 60000, 0 disables it) */
  cacheSweepIntervalMs?: number;
  /** Upper bound on concurrently running per-source units (default: one per target) */
  maxConcurrency?: number;
  /** Source that is never cached and always ranks first (default: 'local') */
  localSource?: SourceType;
}
