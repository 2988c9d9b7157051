import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ signal: 'SIGSEGV' }, 'Installed fatal signal handler');
 *   logger.warn({ err: error }, 'Source map could not be loaded');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Read FAULTLINE_LOG_LEVEL. Unknown or missing values mean `silent`:
 * a crash library stays quiet unless asked.
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const requested = env['FAULTLINE_LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find((level) => level === requested) ?? 'silent';
}
