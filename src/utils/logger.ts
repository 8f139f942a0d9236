/**
 * Harness logger
 *
 * Logs go to stderr so that progress printed on stdout stays readable.
 */

import { pino, destination, type Logger, type LevelWithSilent } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'ollama-bench',
      level: options.level ?? DEFAULT_LOG_LEVEL,
    },
    destination(2)
  );
}
