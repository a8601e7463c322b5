import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - matches pino's Logger exactly.
 *
 * No abstraction, use library types directly.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ mode: 'HYBRID' }, 'Tap switched');
 *   logger.warn({ err: error }, 'Harvester failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

/**
 * Log level type.
 */
export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
