import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's own, no wrapper.
 *
 * Data-first calls:
 *   logger.info({ path }, 'Created storage root');
 *   logger.warn({ err: error }, 'Protection failed');
 */
export type Logger = PinoLogger;

/**
 * Hands out component-scoped child loggers.
 */
export interface ILoggerFactory {
  create(component: string): Logger;

  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
