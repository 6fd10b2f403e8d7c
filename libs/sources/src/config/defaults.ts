/**
 * Default configuration for the federated sources
 */

import { DEFAULT_ENABLED_SOURCES } from '@skillforge/ipc';
import type { SourcesConfig } from '@skillforge/ipc';
import { DEFAULT_CACHE_TTL_MS, DEFAULT_SWEEP_INTERVAL_MS } from '../cache';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../adapters/http-client';

/** Prefix of every environment variable read by loadSourcesConfig() */
export const ENV_PREFIX = 'SKILLFORGE_';

export function getDefaultSourcesConfig(): SourcesConfig {
  return {
    enabledSources: [...DEFAULT_ENABLED_SOURCES],
    rateLimits: {},
    cacheTtlMs: DEFAULT_CACHE_TTL_MS,
    cacheSweepIntervalMs: DEFAULT_SWEEP_INTERVAL_MS,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    logLevel: 'info',
  };
}
