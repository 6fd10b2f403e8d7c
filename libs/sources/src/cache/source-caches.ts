/**
 * Typed caches for search results and individual skills
 */

import type { ExternalSkill, SearchOptions, SearchResult, SourceType } from '@skillforge/ipc';
import { TtlCache } from './ttl-cache';
import type { TtlCacheOptions } from './ttl-cache';

export const DEFAULT_CACHE_TTL_MS = 10 * 60_000;

export type SearchCacheKey = Pick<SearchOptions, 'query' | 'page'> & Partial<Pick<SearchOptions, 'perPage' | 'tags'>>;

/**
 * Structured key: each field is JSON-encoded, so a delimiter inside a query
 * can never make two distinct keys equal.
 */
export function searchCacheKey(source: SourceType, key: SearchCacheKey): string {
  const tags = key.tags ? [...key.tags].sort() : [];
  return JSON.stringify([source, key.query, key.page, key.perPage ?? null, tags]);
}

export function skillCacheKey(source: SourceType, id: string): string {
  return JSON.stringify([source, id]);
}

export class SearchCache {
  readonly store: TtlCache<SearchResult>;

  constructor(options?: Partial<TtlCacheOptions>) {
    this.store = new TtlCache<SearchResult>({ ...options, ttlMs: options?.ttlMs ?? DEFAULT_CACHE_TTL_MS });
  }

  getSearchResult(source: SourceType, key: SearchCacheKey): SearchResult | undefined {
    return this.store.get(searchCacheKey(source, key));
  }

  setSearchResult(source: SourceType, key: SearchCacheKey, result: SearchResult): void {
    this.store.set(searchCacheKey(source, key), result);
  }

  clear(): void {
    this.store.clear();
  }

  close(): void {
    this.store.close();
  }
}

export class SkillCache {
  readonly store: TtlCache<ExternalSkill>;

  constructor(options?: Partial<TtlCacheOptions>) {
    this.store = new TtlCache<ExternalSkill>({ ...options, ttlMs: options?.ttlMs ?? DEFAULT_CACHE_TTL_MS });
  }

  getSkill(source: SourceType, id: string): ExternalSkill | undefined {
    return this.store.get(skillCacheKey(source, id));
  }

  setSkill(source: SourceType, id: string, skill: ExternalSkill): void {
    this.store.set(skillCacheKey(source, id), skill);
  }

  clear(): void {
    this.store.clear();
  }

  close(): void {
    this.store.close();
  }
}
