import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { resolveLogLevel } from './types.js';

/**
 * Root pino logger.
 *
 * - Sync output to stderr, the same stream crash reports go to, so lines interleave in order
 * - JSON format; crash reports themselves are plain text and do not go through here
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(process.env),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
