/**
 * Zod schemas for federated source validation
 */

import { z } from 'zod';
import { DEFAULT_ENABLED_SOURCES, DEFAULT_PER_PAGE } from './source.constants';

export const SourceTypeSchema = z.string().min(1).max(64);

export const SearchOptionsSchema = z.object({
  query: z.string().max(500).default(''),
  tags: z.array(z.string().min(1).max(100)).optional(),
  page: z.coerce.number().int().default(1),
  perPage: z.coerce.number().int().max(100).default(DEFAULT_PER_PAGE),
});

export const RateLimitSchema = z.object({
  requestsPerMinute: z.number().int().nonnegative(),
  burstSize: z.number().int().nonnegative().default(0),
});

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const SourcesConfigSchema = z.object({
  githubToken: z.string().optional(),
  gitlabToken: z.string().optional(),
  bitbucketUsername: z.string().optional(),
  bitbucketPassword: z.string().optional(),
  codebergToken: z.string().optional(),
  enabledSources: z.array(SourceTypeSchema).min(1).default([...DEFAULT_ENABLED_SOURCES]),
  rateLimits: z.record(SourceTypeSchema, RateLimitSchema).default({}),
  cacheTtlMs: z.number().int().positive().default(10 * 60_000),
  cacheSweepIntervalMs: z.number().int().nonnegative().default(60_000),
  requestTimeoutMs: z.number().int().positive().default(15_000),
  maxConcurrency: z.number().int().positive().optional(),
  logLevel: LogLevelSchema.default('info'),
});

export type SearchOptionsInput = z.input<typeof SearchOptionsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;
export type SourcesConfigInput = z.input<typeof SourcesConfigSchema>;
