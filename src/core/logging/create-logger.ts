import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { LOG_LEVEL_ENV, parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger.
 *
 * The engine runs inside an editor host that owns stdout, so logs go to
 * stderr (fd 2), synchronously, as JSON. Default level is silent.
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: parseLogLevel(process.env[LOG_LEVEL_ENV]),
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
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
