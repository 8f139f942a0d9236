/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: the context is only built
 * when the level is enabled.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * @example
 * lazyLog(logger, 'debug', () => ({ rows: table.rows.map(describeRow) }), 'Parsed process table');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
