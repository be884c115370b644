import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * Data-first calls:
 *   logger.debug({ buf, url }, 'buffer loaded');
 *   logger.error({ err }, 'adapter failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Child logger bound to `{ component }` */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const LOG_LEVEL_ENV = 'BURROW_LOG_LEVEL';

export function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'silent';
}
