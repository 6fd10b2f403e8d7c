/**
 * Federation service — concurrent search across registered sources
 *
 * Each searched source runs as an independent unit:
 *   1. search cache lookup (skipped for the local source)
 *   2. rate-limit wait, bounded by the caller's signal
 *   3. provider call
 *   4. cache store (skipped for the local source)
 *
 * A unit that fails or is cancelled drops only its own contribution. The
 * merged list is sorted local-first, then by stars, then by name.
 */

import type {
  ExternalSkill,
  FederatedResult,
  RateLimit,
  SearchOptions,
  SearchResult,
  SourceType,
} from '@skillforge/ipc';
import { SOURCE_TYPES, emptySearchResult, normalizeSearchOptions } from '@skillforge/ipc';
import { SearchCache, SkillCache } from '../cache';
import { RateLimiter, DEFAULT_RATE_LIMITS } from '../rate-limit';
import { RateLimitAbortedError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { Source } from '../types';
import { sortSkills } from './sort';
import type { FederationServiceOptions } from './types';

type UnitOutcome =
  | { source: SourceType; status: 'fulfilled'; result: SearchResult }
  | { source: SourceType; status: 'rejected'; reason: unknown };

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/** A usable worker cap, or undefined for one worker per target */
function positiveLimit(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  const limit = Math.floor(value);
  return limit >= 1 ? limit : undefined;
}

// Cached entries are never handed out directly, so callers may mutate what they get
function copySkill(skill: ExternalSkill): ExternalSkill {
  return skill.tags ? { ...skill, tags: [...skill.tags] } : { ...skill };
}

function copyResult(result: SearchResult): SearchResult {
  return { ...result, skills: result.skills.map(copySkill) };
}

function elapsedSince(start: number): number {
  return performance.now() - start;
}

export class FederationService {
  private readonly sources = new Map<SourceType, Source>();
  private readonly searchCache: SearchCache;
  private readonly skillCache: SkillCache;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly maxConcurrency?: number;
  private readonly localSource: SourceType;

  constructor(options?: FederationServiceOptions) {
    const cacheOptions = {
      ttlMs: options?.cacheTtlMs,
      sweepIntervalMs: options?.cacheSweepIntervalMs,
    };
    this.searchCache = options?.searchCache ?? new SearchCache(cacheOptions);
    this.skillCache = options?.skillCache ?? new SkillCache(cacheOptions);
    this.rateLimiter = options?.rateLimiter ?? new RateLimiter({ ...DEFAULT_RATE_LIMITS, ...options?.rateLimits });
    this.logger = options?.logger ?? createLogger();
    this.maxConcurrency = positiveLimit(options?.maxConcurrency);
    this.localSource = options?.localSource ?? SOURCE_TYPES.local;
  }

  /** Add a source, replacing any source registered under the same name */
  registerSource(source: Source): void {
    this.sources.set(source.name, source);
  }

  getSource(sourceType: SourceType): Source | undefined {
    return this.sources.get(sourceType);
  }

  /** Registered sources that currently report themselves enabled */
  enabledSources(): SourceType[] {
    return [...this.sources.values()].filter((s) => s.isEnabled()).map((s) => s.name);
  }

  /** Update one source's rate policy; its bucket is rebuilt on next use */
  setRateLimit(sourceType: SourceType, limit: RateLimit): void {
    this.rateLimiter.setLimit(sourceType, limit);
  }

  /** Search every enabled source */
  search(options: Partial<SearchOptions>, signal?: AbortSignal): Promise<FederatedResult> {
    return this.searchSources(options, undefined, signal);
  }

  /**
   * Search the enabled sources named in `sourceFilter` (all enabled sources
   * when the filter is empty or omitted). Never rejects: failed sources are
   * reported in `errors` and contribute nothing.
   */
  async searchSources(
    options: Partial<SearchOptions>,
    sourceFilter?: readonly SourceType[],
    signal?: AbortSignal,
  ): Promise<FederatedResult> {
    const start = performance.now();
    const opts = normalizeSearchOptions(options);
    const targets = this.resolveTargets(sourceFilter);

    const federated: FederatedResult = {
      skills: [],
      total: 0,
      bySource: new Map(),
      errors: new Map(),
      sourceTimes: new Map(),
      searchTimeMs: 0,
    };

    if (targets.length === 0) return federated;

    const outcomes = await this.fanOut(targets, (source) => this.searchUnit(source, opts, signal));

    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        if (outcome.reason instanceof RateLimitAbortedError) {
          this.logger.warn({ source: outcome.source, err: outcome.reason }, 'rate limit wait cancelled');
        } else {
          const err = toError(outcome.reason);
          this.logger.error({ source: outcome.source, err }, 'source search failed');
          federated.errors.set(outcome.source, err);
        }
        continue;
      }

      const { result } = outcome;
      federated.skills.push(...result.skills);
      federated.total += result.total;
      federated.bySource.set(outcome.source, result.total);
      federated.sourceTimes.set(outcome.source, result.searchTimeMs);
    }

    sortSkills(federated.skills, this.localSource);
    federated.searchTimeMs = elapsedSince(start);

    this.logger.debug(
      { sources: targets.length, failed: federated.errors.size, total: federated.total, searchTimeMs: federated.searchTimeMs },
      'federated search complete',
    );

    return federated;
  }

  /**
   * Search exactly one source. Unregistered or disabled sources yield an
   * empty result; rate-limit and provider errors propagate.
   */
  async searchSource(sourceType: SourceType, options: Partial<SearchOptions>, signal?: AbortSignal): Promise<SearchResult> {
    const opts = normalizeSearchOptions(options);
    const source = this.sources.get(sourceType);
    if (!source || !source.isEnabled()) {
      return emptySearchResult(sourceType, opts);
    }

    return this.searchUnit(source, opts, signal);
  }

  /**
   * Look up one skill. Resolves `null` when the source is unregistered,
   * disabled, or does not know the id.
   */
  async getSkill(sourceType: SourceType, id: string, signal?: AbortSignal): Promise<ExternalSkill | null> {
    const source = this.sources.get(sourceType);
    if (!source || !source.isEnabled()) return null;

    const cacheable = sourceType !== this.localSource;
    if (cacheable) {
      const cached = this.skillCache.getSkill(sourceType, id);
      if (cached) return copySkill(cached);
    }

    await this.rateLimiter.wait(sourceType, signal);
    const skill = await source.getSkill(id, signal);

    if (skill && cacheable) {
      this.skillCache.setSkill(sourceType, id, copySkill(skill));
    }

    return skill;
  }

  /**
   * Full body of a skill. Populated content is returned as-is; otherwise the
   * owning source fetches it. Unregistered or disabled sources yield ''.
   */
  async getContent(skill: ExternalSkill, signal?: AbortSignal): Promise<string> {
    if (skill.content) return skill.content;

    const source = this.sources.get(skill.source);
    if (!source || !source.isEnabled()) return '';

    await this.rateLimiter.wait(skill.source, signal);
    return source.getContent(skill, signal);
  }

  clearCache(): void {
    this.searchCache.clear();
    this.skillCache.clear();
  }

  /** Stop the caches' background sweeps */
  close(): void {
    this.searchCache.close();
    this.skillCache.close();
  }

  private resolveTargets(sourceFilter?: readonly SourceType[]): Source[] {
    if (!sourceFilter || sourceFilter.length === 0) {
      return [...this.sources.values()].filter((s) => s.isEnabled());
    }

    const targets: Source[] = [];
    for (const sourceType of new Set(sourceFilter)) {
      const source = this.sources.get(sourceType);
      if (source && source.isEnabled()) targets.push(source);
    }
    return targets;
  }

  /** cache → rate limit → provider → cache, for one source */
  private async searchUnit(source: Source, opts: SearchOptions, signal?: AbortSignal): Promise<SearchResult> {
    const sourceType = source.name;
    const cacheable = sourceType !== this.localSource;

    if (cacheable) {
      const cached = this.searchCache.getSearchResult(sourceType, opts);
      if (cached) {
        this.logger.debug({ source: sourceType, query: opts.query, page: opts.page }, 'search cache hit');
        return copyResult(cached);
      }
    }

    await this.rateLimiter.wait(sourceType, signal);

    const callStart = performance.now();
    const response = await source.search(opts, signal);
    const result: SearchResult = { ...response, searchTimeMs: elapsedSince(callStart), source: sourceType };

    if (cacheable) {
      this.searchCache.setSearchResult(sourceType, opts, copyResult(result));
    }

    return result;
  }

  /**
   * Run one unit per source, at most `maxConcurrency` at a time, and settle
   * every unit independently. Outcomes keep the order of `sources`.
   */
  private async fanOut(sources: Source[], unit: (source: Source) => Promise<SearchResult>): Promise<UnitOutcome[]> {
    const outcomes: UnitOutcome[] = new Array(sources.length);
    const workers = Math.min(this.maxConcurrency ?? sources.length, sources.length);
    let next = 0;

    const work = async () => {
      while (next < sources.length) {
        const index = next++;
        const source = sources[index];
        try {
          outcomes[index] = { source: source.name, status: 'fulfilled', result: await unit(source) };
        } catch (reason) {
          outcomes[index] = { source: source.name, status: 'rejected', reason };
        }
      }
    };

    await Promise.all(Array.from({ length: workers }, work));
    return outcomes;
  }
}
