/**
 * Shutdown handling for the launcher.
 *
 * Commands run in their own process groups, so the terminal's signal never
 * reaches them. Every terminating signal kills them before the harness exits.
 */

import type { Logger } from 'pino';

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

const SIGNAL_NUMBERS: Record<ShutdownSignal, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGTERM: 15,
};

export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
}

export interface ActiveCommands {
  getActiveCount(): number;
  terminateAll(): void;
}

export interface ShutdownHandlerOptions {
  runner: ActiveCommands;
  logger?: Logger;
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Exit with 128 + signo after killing every running command
 */
export function installShutdownHandlers(options: ShutdownHandlerOptions): void {
  const { runner, logger } = options;
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  for (const signal of SHUTDOWN_SIGNALS) {
    source.once(signal, () => {
      logger?.warn({ signal, active: runner.getActiveCount() }, 'Interrupted, stopping running commands');
      runner.terminateAll();
      exit(128 + SIGNAL_NUMBERS[signal]);
    });
  }
}
