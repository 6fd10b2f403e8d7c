import { SOURCE_TYPES } from './source.types';
import type { ExternalSkill, KnownSourceType, SearchOptions, SearchResult, SourceType } from './source.types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 20;

/** Sources enabled when configuration does not name any */
export const DEFAULT_ENABLED_SOURCES: readonly KnownSourceType[] = [
  SOURCE_TYPES.local,
  SOURCE_TYPES.skillsSh,
  SOURCE_TYPES.github,
  SOURCE_TYPES.gitlab,
  SOURCE_TYPES.bitbucket,
  SOURCE_TYPES.codeberg,
];

const SOURCE_LABELS: Record<KnownSourceType, string> = {
  local: 'Local',
  'skills.sh': 'SKILLS.sh',
  github: 'GitHub',
  gitlab: 'GitLab',
  bitbucket: 'Bitbucket',
  codeberg: 'Codeberg',
};

function isKnownSourceType(source: SourceType): source is KnownSourceType {
  return Object.prototype.hasOwnProperty.call(SOURCE_LABELS, source);
}

/** Human-readable label for a source badge; unknown sources show their raw tag */
export function sourceLabel(source: SourceType): string {
  return isKnownSourceType(source) ? SOURCE_LABELS[source] : source;
}

export function isSourceEnabled(enabled: readonly SourceType[], source: SourceType): boolean {
  return enabled.includes(source);
}

/**
 * Fill in paging defaults. Non-positive or non-finite values fall back to
 * page 1 and 20 per page.
 */
export function normalizeSearchOptions(options: Partial<SearchOptions>): SearchOptions {
  const page = Math.floor(options.page ?? 0);
  const perPage = Math.floor(options.perPage ?? 0);
  return {
    query: options.query ?? '',
    ...(options.tags ? { tags: [...options.tags] } : {}),
    page: Number.isFinite(page) && page >= 1 ? page : DEFAULT_PAGE,
    perPage: Number.isFinite(perPage) && perPage >= 1 ? perPage : DEFAULT_PER_PAGE,
  };
}

/** An empty answer for a source, echoing the requested paging */
export function emptySearchResult(source: SourceType, options: Pick<SearchOptions, 'page' | 'perPage'>): SearchResult {
  return {
    skills: [],
    total: 0,
    page: options.page,
    perPage: options.perPage,
    searchTimeMs: 0,
    source,
  };
}

/** Identity key of a skill: ids are only unique within their source */
export function skillKey(skill: Pick<ExternalSkill, 'source' | 'id'>): string {
  return JSON.stringify([skill.source, skill.id]);
}

export function isSameSkill(
  a: Pick<ExternalSkill, 'source' | 'id'>,
  b: Pick<ExternalSkill, 'source' | 'id'>,
): boolean {
  return a.source === b.source && a.id === b.id;
}
