// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, isLogLevel } from './types.js';

// Root logger construction (shared by the factory and bootstrap)
export { createRootLogger, resolveLogLevel } from './root-logger.js';

// Factory (for DI registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

// Redaction config (for testing/verification)
export { REDACTION_CONFIG } from './redaction.js';
