import {
  SOURCE_TYPES,
  DEFAULT_ENABLED_SOURCES,
  normalizeSearchOptions,
  emptySearchResult,
  sourceLabel,
  isSourceEnabled,
  skillKey,
  isSameSkill,
  SearchOptionsSchema,
  SourcesConfigSchema,
} from '../sources';

describe('normalizeSearchOptions', () => {
  it('defaults page 0 and perPage 0 to 1 and 20', () => {
    expect(normalizeSearchOptions({ query: 'x', page: 0, perPage: 0 })).toEqual({
      query: 'x',
      page: 1,
      perPage: 20,
    });
  });

  it('defaults negative values', () => {
    const opts = normalizeSearchOptions({ query: 'x', page: -3, perPage: -1 });
    expect(opts.page).toBe(1);
    expect(opts.perPage).toBe(20);
  });

  it('defaults fractions that floor to zero', () => {
    expect(normalizeSearchOptions({ page: 0.5, perPage: 0.5 })).toEqual({ query: '', page: 1, perPage: 20 });
    expect(normalizeSearchOptions({ page: 2.9, perPage: 10.2 })).toEqual({ query: '', page: 2, perPage: 10 });
  });

  it('defaults missing and non-finite values', () => {
    expect(normalizeSearchOptions({})).toEqual({ query: '', page: 1, perPage: 20 });
    expect(normalizeSearchOptions({ page: Number.NaN, perPage: Infinity }).page).toBe(1);
  });

  it('keeps valid paging and copies tags', () => {
    const tags = ['api'];
    const opts = normalizeSearchOptions({ query: 'q', tags, page: 3, perPage: 50 });
    expect(opts).toEqual({ query: 'q', tags: ['api'], page: 3, perPage: 50 });
    expect(opts.tags).not.toBe(tags);
  });
});

describe('emptySearchResult', () => {
  it('echoes paging with zero total', () => {
    expect(emptySearchResult('github', { page: 2, perPage: 10 })).toEqual({
      skills: [],
      total: 0,
      page: 2,
      perPage: 10,
      searchTimeMs: 0,
      source: 'github',
    });
  });
});

describe('sourceLabel', () => {
  it('labels known sources', () => {
    expect(sourceLabel(SOURCE_TYPES.local)).toBe('Local');
    expect(sourceLabel(SOURCE_TYPES.skillsSh)).toBe('SKILLS.sh');
    expect(sourceLabel(SOURCE_TYPES.github)).toBe('GitHub');
    expect(sourceLabel(SOURCE_TYPES.gitlab)).toBe('GitLab');
    expect(sourceLabel(SOURCE_TYPES.bitbucket)).toBe('Bitbucket');
    expect(sourceLabel(SOURCE_TYPES.codeberg)).toBe('Codeberg');
  });

  it('falls back to the raw tag', () => {
    expect(sourceLabel('sourcehut')).toBe('sourcehut');
    expect(sourceLabel('toString')).toBe('toString');
  });
});

describe('isSourceEnabled', () => {
  it('checks membership', () => {
    expect(isSourceEnabled(['local', 'github'], 'github')).toBe(true);
    expect(isSourceEnabled(['local', 'github'], 'gitlab')).toBe(false);
    expect(isSourceEnabled([], 'local')).toBe(false);
  });

  it('enables every built-in source by default', () => {
    expect(DEFAULT_ENABLED_SOURCES).toEqual(['local', 'skills.sh', 'github', 'gitlab', 'bitbucket', 'codeberg']);
  });
});

describe('skill identity', () => {
  it('compares source and id together', () => {
    expect(isSameSkill({ source: 'github', id: '1' }, { source: 'github', id: '1' })).toBe(true);
    expect(isSameSkill({ source: 'github', id: '1' }, { source: 'gitlab', id: '1' })).toBe(false);
  });

  it('builds distinct keys for ids that contain separators', () => {
    expect(skillKey({ source: 'a:b', id: 'c' })).not.toBe(skillKey({ source: 'a', id: 'b:c' }));
  });
});

describe('SearchOptionsSchema', () => {
  it('coerces query-string paging', () => {
    expect(SearchOptionsSchema.parse({ query: 'api', page: '2', perPage: '10' })).toEqual({
      query: 'api',
      page: 2,
      perPage: 10,
    });
  });

  it('rejects oversized pages', () => {
    expect(SearchOptionsSchema.safeParse({ perPage: 500 }).success).toBe(false);
  });
});

describe('SourcesConfigSchema', () => {
  it('applies defaults', () => {
    const config = SourcesConfigSchema.parse({});
    expect(config.enabledSources).toEqual([...DEFAULT_ENABLED_SOURCES]);
    expect(config.cacheTtlMs).toBe(600_000);
    expect(config.cacheSweepIntervalMs).toBe(60_000);
    expect(config.requestTimeoutMs).toBe(15_000);
    expect(config.logLevel).toBe('info');
    expect(config.rateLimits).toEqual({});
  });

  it('defaults burst size in rate limit overrides', () => {
    const config = SourcesConfigSchema.parse({ rateLimits: { github: { requestsPerMinute: 30 } } });
    expect(config.rateLimits['github']).toEqual({ requestsPerMinute: 30, burstSize: 0 });
  });

  it('rejects an empty source list', () => {
    expect(SourcesConfigSchema.safeParse({ enabledSources: [] }).success).toBe(false);
  });
});
