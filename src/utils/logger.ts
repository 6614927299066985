/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config.js';

export type { Logger };

const LEVELS: Record<string, LogLevel> = {
  DEBUG: 'DEBUG',
  INFO: 'INFO',
  WARN: 'WARN',
  ERROR: 'ERROR',
  FATAL: 'FATAL',
  SILENT: 'SILENT',
};

/**
 * Build a logger. Output is pretty-printed outside production and tests.
 */
export function createLogger(level: LogLevel): Logger {
  const pretty =
    process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

  return pino({
    level: level.toLowerCase(),
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

/**
 * Process logger. Reads LOG_LEVEL directly so that importing it never
 * depends on the rest of the configuration being valid.
 */
export const logger = createLogger(
  LEVELS[(process.env.LOG_LEVEL ?? '').toUpperCase()] ?? 'INFO'
);
