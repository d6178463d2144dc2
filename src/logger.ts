/**
 * Process logger.
 *
 * Logs go to stderr so rendered trees and reports on stdout stay clean.
 * Components derive their own child logger with `{ component }`.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;

  /** Human-readable output through pino-pretty */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';

  if (options.pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

export type { Logger };
