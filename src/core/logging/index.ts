export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, isLogLevel } from './types.js';

export { PinoLoggerFactory, createRootLogger, resolveLogLevel } from './create-logger.js';

// pre-container code
export { createBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
