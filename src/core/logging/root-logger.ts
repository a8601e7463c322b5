import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Get log level from environment.
 *
 * RESERVOIR_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (a library should be quiet unless debugging)
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env['RESERVOIR_LOG_LEVEL']?.toLowerCase();

  if (level && isLogLevel(level)) {
    return level;
  }

  return 'silent';
}

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr (stdout carries CLI results)
 * - JSON format for machine parsing
 * - Redaction of pool state
 */
export function createRootLogger(level: LogLevel = resolveLogLevel()): Logger {
  return pino(
    {
      level,

      // Redact sensitive fields
      redact: REDACTION_CONFIG,

      // ISO timestamps for consistency
      timestamp: pino.stdTimeFunctions.isoTime,

      // Include error stack traces
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // Sync output to stderr (fd 2)
    pino.destination({ dest: 2, sync: true })
  );
}
