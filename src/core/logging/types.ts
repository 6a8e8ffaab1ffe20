import type { Logger as PinoLogger } from 'pino';

/**
 * Pino's logger, used directly.
 *
 * Data-first call style:
 *   logger.debug({ objectId }, 'object released');
 *   logger.warn({ err }, 'keep-alive failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `{ component }`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
