/**
 * Logger Module
 * Structured logging using pino
 */

import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Logger = PinoLogger;

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerOptions {
  level?: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel !== undefined && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Create a logger instance for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger('compiler');
 * logger.debug({ types: 12 }, 'Compiled vocabulary');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  return pino({
    name: component,
    level: options.level ?? getLogLevel(),
  });
}
