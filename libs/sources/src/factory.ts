/**
 * Wires a FederationService from configuration
 */

import { SOURCE_TYPES } from '@skillforge/ipc';
import type { SourceType, SourcesConfig } from '@skillforge/ipc';
import {
  BitbucketSource,
  CodebergSource,
  GitHubSource,
  GitLabSource,
  LocalSource,
  SkillsShSource,
} from './adapters';
import type { SkillRegistry } from './adapters';
import { FederationService } from './federation';
import { createLogger } from './logger';
import type { Logger } from './logger';
import type { Source } from './types';

export interface FederationDependencies {
  /** Local skill store; the local source stays disabled without one */
  registry?: SkillRegistry | null;
  logger?: Logger;
}

function buildSource(type: SourceType, config: SourcesConfig, deps: FederationDependencies): Source | null {
  const timeoutMs = config.requestTimeoutMs;

  switch (type) {
    case SOURCE_TYPES.local:
      return new LocalSource(deps.registry);
    case SOURCE_TYPES.skillsSh:
      return new SkillsShSource({ githubToken: config.githubToken, timeoutMs });
    case SOURCE_TYPES.github:
      return new GitHubSource({ token: config.githubToken, timeoutMs });
    case SOURCE_TYPES.gitlab:
      return new GitLabSource({ token: config.gitlabToken, timeoutMs });
    case SOURCE_TYPES.bitbucket:
      return new BitbucketSource({
        username: config.bitbucketUsername,
        password: config.bitbucketPassword,
        timeoutMs,
      });
    case SOURCE_TYPES.codeberg:
      return new CodebergSource({ token: config.codebergToken, timeoutMs });
    default:
      return null;
  }
}

/**
 * Create a federation and register a source for every built-in type named in
 * `config.enabledSources`. Unknown names are logged and skipped.
 */
export function createFederation(config: SourcesConfig, deps: FederationDependencies = {}): FederationService {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });

  const federation = new FederationService({
    logger,
    rateLimits: config.rateLimits,
    cacheTtlMs: config.cacheTtlMs,
    cacheSweepIntervalMs: config.cacheSweepIntervalMs,
    maxConcurrency: config.maxConcurrency,
  });

  for (const type of config.enabledSources) {
    const source = buildSource(type, config, deps);
    if (!source) {
      logger.warn({ source: type }, 'unknown source in configuration, skipped');
      continue;
    }
    federation.registerSource(source);
  }

  return federation;
}
