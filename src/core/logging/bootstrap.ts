import type { Logger } from './types.js';
import { createRootLogger } from './root-logger.js';

/**
 * Bootstrap logger for code that runs without the DI container.
 *
 * Used by:
 * - container.ts during initialization
 * - library classes constructed directly by embedders (pool, taps, collector)
 *
 * After DI is ready, prefer the injected ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger();
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
