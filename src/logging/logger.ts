/**
 * Logger module.
 * Structured logging using pino, one named logger per component.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  /** Minimum level (default: LOG_LEVEL or 'info') */
  level?: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Get log level from environment or default.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Create a logger instance for a specific component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('binding');
 * logger.warn({ path: '/soc/uart@1000' }, 'deprecated property');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;
  return pino({ name: component, level });
}

/**
 * Logger type export for use in type annotations.
 */
export type Logger = PinoLogger;
