/**
 * Typed error classes for the sources library
 */

import type { SourceType } from '@skillforge/ipc';

export class SourcesError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourcesError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Upstream answered with a status the provider cannot absorb */
export class SourceApiError extends SourcesError {
  public readonly source: SourceType;
  public readonly statusCode: number;
  public readonly responseBody?: string;

  constructor(source: SourceType, statusCode: number, responseBody?: string) {
    super(`${source} API error ${statusCode}`, 'SOURCE_API_ERROR');
    this.name = 'SourceApiError';
    this.source = source;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Upstream body did not match the expected shape */
export class SourceDecodeError extends SourcesError {
  public readonly source: SourceType;

  constructor(source: SourceType, detail: string, options?: { cause?: unknown }) {
    super(`Failed to decode ${source} response: ${detail}`, 'SOURCE_DECODE_ERROR', options);
    this.name = 'SourceDecodeError';
    this.source = source;
  }
}

/** Request never completed (network failure, timeout, abort) */
export class SourceRequestError extends SourcesError {
  public readonly source: SourceType;

  constructor(source: SourceType, cause: unknown) {
    super(
      `${source} request failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'SOURCE_REQUEST_FAILED',
      { cause },
    );
    this.name = 'SourceRequestError';
    this.source = source;
  }
}

export class RateLimitAbortedError extends SourcesError {
  public readonly source: SourceType;

  constructor(source: SourceType, reason?: unknown) {
    super(`Rate limit wait for ${source} was aborted`, 'RATE_LIMIT_ABORTED', { cause: reason });
    this.name = 'RateLimitAbortedError';
    this.source = source;
  }
}

export class ConfigError extends SourcesError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid sources configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
