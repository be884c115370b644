import type { Logger } from '../../core/logging/index.js';
import type { NotifierPort, NotifyLevel } from '../../ports/notifier.port.js';
import type { AppError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Single exit for user-visible reports: every notification is also logged.
 */
export class Reporter {
  constructor(
    private readonly notifier: NotifierPort,
    private readonly logger: Logger
  ) {}

  notify(message: string, level: NotifyLevel): void {
    switch (level) {
      case 'info':
        this.logger.info(message);
        break;
      case 'warn':
        this.logger.warn(message);
        break;
      case 'error':
        this.logger.error(message);
        break;
      default:
        assertNever(level);
    }
    this.notifier.notify(message, level);
  }

  report(error: AppError, level: NotifyLevel = 'error'): void {
    this.logger.debug({ tag: error._tag }, 'reporting error');
    this.notify(formatAppError(error), level);
  }
}
