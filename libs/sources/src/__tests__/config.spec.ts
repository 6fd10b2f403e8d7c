/**
 * Configuration loader + createFederation tests
 */

import { getDefaultSourcesConfig, loadSourcesConfig } from '../config';
import { createFederation } from '../factory';
import { createLogger } from '../logger';
import { ConfigError } from '../errors';
import { GitHubSource } from '../adapters/github.adapter';

describe('loadSourcesConfig', () => {
  it('returns defaults for an empty environment', () => {
    const config = loadSourcesConfig({});

    expect(config).toEqual(getDefaultSourcesConfig());
    expect(config.enabledSources).toEqual(['local', 'skills.sh', 'github', 'gitlab', 'bitbucket', 'codeberg']);
    expect(config.cacheTtlMs).toBe(600_000);
    expect(config.cacheSweepIntervalMs).toBe(60_000);
    expect(config.requestTimeoutMs).toBe(15_000);
    expect(config.logLevel).toBe('info');
  });

  it('reads prefixed variables', () => {
    const config = loadSourcesConfig({
      SKILLFORGE_GITHUB_TOKEN: 'test-secret',
      SKILLFORGE_ENABLED_SOURCES: ' github, local ,',
      SKILLFORGE_CACHE_TTL_MS: '5000',
      SKILLFORGE_MAX_CONCURRENCY: '2',
      SKILLFORGE_LOG_LEVEL: 'debug',
      GITHUB_TOKEN: 'ignored',
    });

    expect(config.githubToken).toBe('test-secret');
    expect(config.enabledSources).toEqual(['github', 'local']);
    expect(config.cacheTtlMs).toBe(5000);
    expect(config.maxConcurrency).toBe(2);
    expect(config.logLevel).toBe('debug');
  });

  it('treats blank variables as unset', () => {
    expect(loadSourcesConfig({ SKILLFORGE_GITHUB_TOKEN: '  ', SKILLFORGE_CACHE_TTL_MS: '' }).githubToken).toBeUndefined();
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadSourcesConfig(
      { SKILLFORGE_CACHE_TTL_MS: '5000' },
      { cacheTtlMs: 1000, rateLimits: { github: { requestsPerMinute: 30, burstSize: 10 } } },
    );

    expect(config.cacheTtlMs).toBe(1000);
    expect(config.rateLimits).toEqual({ github: { requestsPerMinute: 30, burstSize: 10 } });
  });

  it('rejects invalid values with every issue listed', () => {
    let error: unknown;
    try {
      loadSourcesConfig({ SKILLFORGE_CACHE_TTL_MS: 'soon', SKILLFORGE_LOG_LEVEL: 'loud' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues.some((i) => i.startsWith('cacheTtlMs:'))).toBe(true);
    expect(issues.some((i) => i.startsWith('logLevel:'))).toBe(true);
  });
});

describe('createFederation', () => {
  const logger = createLogger({ level: 'silent' });

  it('registers every configured built-in source', () => {
    const federation = createFederation(loadSourcesConfig({}), { logger });

    try {
      expect(federation.getSource('github')).toBeInstanceOf(GitHubSource);
      expect(federation.getSource('local')?.isEnabled()).toBe(false);
      expect(federation.enabledSources()).toEqual(['skills.sh', 'github', 'gitlab', 'bitbucket', 'codeberg']);
    } finally {
      federation.close();
    }
  });

  it('enables the local source when a registry is supplied', () => {
    const registry = {
      getSkill: async () => null,
      searchSkills: async () => ({ skills: [], total: 0 }),
      listSkillsByTag: async () => ({ skills: [], total: 0 }),
      listSkills: async () => ({ skills: [], total: 0 }),
    };
    const federation = createFederation(loadSourcesConfig({ SKILLFORGE_ENABLED_SOURCES: 'local' }), { registry, logger });

    try {
      expect(federation.enabledSources()).toEqual(['local']);
    } finally {
      federation.close();
    }
  });

  it('skips unknown source names', () => {
    const lines: string[] = [];
    const capture = createLogger({ level: 'warn', destination: { write: (msg: string) => { lines.push(msg); } } });
    const federation = createFederation(loadSourcesConfig({}, { enabledSources: ['github', 'sourcehut'] }), {
      logger: capture,
    });

    try {
      expect(federation.getSource('sourcehut')).toBeUndefined();
      expect(federation.enabledSources()).toEqual(['github']);
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({ source: 'sourcehut', msg: 'unknown source in configuration, skipped' });
    } finally {
      federation.close();
    }
  });
});
