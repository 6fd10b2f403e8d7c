/**
 * Structured logger shared by the federation and its sources
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from '@skillforge/ipc';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Alternate destination (tests capture lines through this) */
  destination?: DestinationStream;
}

export function createLogger(options?: LoggerOptions): Logger {
  const config = {
    name: options?.name ?? 'skillforge-sources',
    level: options?.level ?? 'info',
  };
  return options?.destination ? pino(config, options.destination) : pino(config);
}
