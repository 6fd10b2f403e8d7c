/**
 * Configuration loader for the federated sources
 *
 * Environment variables (all optional, prefixed with SKILLFORGE_):
 *   GITHUB_TOKEN, GITLAB_TOKEN, BITBUCKET_USERNAME, BITBUCKET_PASSWORD,
 *   CODEBERG_TOKEN, ENABLED_SOURCES (comma list), CACHE_TTL_MS,
 *   CACHE_SWEEP_INTERVAL_MS, REQUEST_TIMEOUT_MS, MAX_CONCURRENCY, LOG_LEVEL
 *
 * Explicit overrides win over the environment, which wins over defaults.
 */

import { SourcesConfigSchema } from '@skillforge/ipc';
import type { SourcesConfig, SourcesConfigInput } from '@skillforge/ipc';
import { ConfigError } from '../errors';
import { ENV_PREFIX, getDefaultSourcesConfig } from './defaults';

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

/** Numeric variables that do not parse become NaN and fail validation */
function readNumber(env: Env, name: string): number | undefined {
  const value = readString(env, name);
  return value === undefined ? undefined : Number(value);
}

function readList(env: Env, name: string): string[] | undefined {
  const value = readString(env, name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/** Drop keys whose value is undefined so they do not mask defaults */
function defined(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/** Raw, unvalidated settings found in the environment */
export function readEnvConfig(env: Env): Record<string, unknown> {
  return defined({
    githubToken: readString(env, 'GITHUB_TOKEN'),
    gitlabToken: readString(env, 'GITLAB_TOKEN'),
    bitbucketUsername: readString(env, 'BITBUCKET_USERNAME'),
    bitbucketPassword: readString(env, 'BITBUCKET_PASSWORD'),
    codebergToken: readString(env, 'CODEBERG_TOKEN'),
    enabledSources: readList(env, 'ENABLED_SOURCES'),
    cacheTtlMs: readNumber(env, 'CACHE_TTL_MS'),
    cacheSweepIntervalMs: readNumber(env, 'CACHE_SWEEP_INTERVAL_MS'),
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS'),
    maxConcurrency: readNumber(env, 'MAX_CONCURRENCY'),
    logLevel: readString(env, 'LOG_LEVEL'),
  });
}

/**
 * Build a validated configuration. Throws ConfigError listing every invalid
 * field.
 */
export function loadSourcesConfig(env: Env = process.env, overrides?: SourcesConfigInput): SourcesConfig {
  const parsed = SourcesConfigSchema.safeParse({
    ...getDefaultSourcesConfig(),
    ...readEnvConfig(env),
    ...defined(overrides ?? {}),
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`));
  }

  return parsed.data;
}
