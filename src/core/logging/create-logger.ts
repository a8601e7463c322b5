import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { createRootLogger, resolveLogLevel } from './root-logger.js';

/**
 * Logger factory - creates component loggers.
 *
 * One instance per container (registered with instanceCachingFactory), so every
 * component logger shares the same root and destination.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel = resolveLogLevel()) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
