import pino from 'pino';
import type { DestinationStream } from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * OBJLINK_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent.
 */
export function resolveLogLevel(env: Readonly<Record<string, string | undefined>>): LogLevel {
  const level = env['OBJLINK_LOG_LEVEL']?.toLowerCase();
  return level && isLogLevel(level) ? level : 'silent';
}

/**
 * Root pino logger. JSON lines, written synchronously to stderr unless a
 * destination is supplied.
 */
export function createRootLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger(resolveLogLevel(process.env));
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
