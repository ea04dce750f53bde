/**
 * Logger helpers
 *
 * Hot paths (admission, batching, pool scheduling) log at debug level on
 * every request. `lazyLog` skips building the context object unless the
 * level is enabled.
 */

import { pino, type Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;

/**
 * @example
 * lazyLog(logger, 'debug', () => ({ ticketId, running }), 'Ticket running');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: () => LogContext,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

/**
 * Root logger for the process; components receive children or this
 * instance through their constructor config.
 */
export function createRootLogger(level: string): Logger {
  return pino({ name: 'infergate', level });
}
