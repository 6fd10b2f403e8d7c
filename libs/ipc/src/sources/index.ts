export { SOURCE_TYPES } from './source.types';
export type {
  KnownSourceType,
  SourceType,
  ExternalSkill,
  SearchOptions,
  SearchResult,
  FederatedResult,
  RateLimit,
} from './source.types';

export {
  DEFAULT_PAGE,
  DEFAULT_PER_PAGE,
  DEFAULT_ENABLED_SOURCES,
  sourceLabel,
  isSourceEnabled,
  normalizeSearchOptions,
  emptySearchResult,
  skillKey,
  isSameSkill,
} from './source.constants';

export * from './source.schema';
