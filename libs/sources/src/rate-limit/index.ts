export { TokenBucket, createTokenBucket } from './token-bucket';
export { RateLimiter, DEFAULT_RATE_LIMITS, FALLBACK_RATE_LIMIT } from './rate-limiter';
