import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * FILEKEEP_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (a library should not write to stderr unless asked)
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const level = env['FILEKEEP_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}

/**
 * Root pino instance.
 *
 * - Sync output to stderr (stdout belongs to CLI output)
 * - JSON lines for machine parsing
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
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
