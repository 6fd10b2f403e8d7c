export { TtlCache, DEFAULT_SWEEP_INTERVAL_MS } from './ttl-cache';
export type { TtlCacheOptions, CacheEntry } from './ttl-cache';
export { SearchCache, SkillCache, searchCacheKey, skillCacheKey, DEFAULT_CACHE_TTL_MS } from './source-caches';
export type { SearchCacheKey } from './source-caches';
