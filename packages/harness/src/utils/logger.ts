/**
 * Structured logging (pino).
 *
 * Call shape across the harness is `logger.info({ ...context }, 'message')`.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level: LogLevel;
  service: string;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.service,
    level: options.level,
    base: { service: options.service },
  });
}

/**
 * Logger used when a caller does not pass one. Quiet under Vitest.
 */
export const defaultLogger: Logger = createLogger({
  level: process.env.VITEST ? 'silent' : parseLogLevel(process.env.LOG_LEVEL),
  service: 'ledger-harness',
});

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}
