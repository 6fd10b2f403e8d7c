/**
 * @skillforge/sources
 *
 * Federated skill search: per-source rate limiting, TTL caching and
 * concurrent fan-out over pluggable providers.
 *
 * @packageDocumentation
 */

export * from './errors';
export * from './types';
export * from './cache';
export * from './rate-limit';
export * from './federation';
export * from './adapters';
export * from './config';
export { createFederation } from './factory';
export type { FederationDependencies } from './factory';
export { createLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
export { sleep, linkAbort } from './utils/abort';
export type { LinkedAbort } from './utils/abort';
