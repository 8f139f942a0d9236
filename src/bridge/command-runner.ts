/**
 * External Command Runner
 *
 * Runs one external command to completion and captures its output:
 * - Bounds every call with a deadline
 * - Kills the whole process group when the deadline passes
 * - Settles only after the child has exited and its pipes are closed
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { errnoCode } from '../api/errors.js';
import { TimerGuard } from '../utils/timer-guard.js';

export interface CommandOptions {
  /** Deadline for the whole call (ms) */
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CompletedCommand {
  kind: 'completed';
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * The deadline passed. Output produced before the kill is discarded.
 */
export interface TimedOutCommand {
  kind: 'timeout';
  timeoutMs: number;
  durationMs: number;
}

export interface FailedSpawn {
  kind: 'spawn-failed';
  error: Error;
  /** Executable not found on PATH */
  missing: boolean;
}

export type CommandOutcome = CompletedCommand | TimedOutCommand | FailedSpawn;

/**
 * Anything that can run an external command.
 *
 * The harness never calls child_process directly; tests swap in an
 * in-process fake.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandOutcome>;
}

export interface SpawnCommandRunnerOptions {
  logger?: Logger;
}

/**
 * Signal number exit codes follow the shell convention (128 + signo)
 */
const SIGNAL_EXIT_BASE = 128;
const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGKILL: 9,
  SIGTERM: 15,
};

export class SpawnCommandRunner implements CommandRunner {
  private readonly logger?: Logger;
  private readonly active = new Set<ChildProcess>();

  constructor(options: SpawnCommandRunnerOptions = {}) {
    this.logger = options.logger;
  }

  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandOutcome> {
    const label = [command, ...args].join(' ');

    return new Promise<CommandOutcome>((resolve) => {
      const startedAt = performance.now();
      let child: ChildProcess;

      try {
        child = spawn(command, [...args], {
          cwd: options.cwd,
          env: options.env ?? process.env,
          stdio: ['ignore', 'pipe', 'pipe'],
          // Own process group, so a timeout can take down grandchildren too
          detached: process.platform !== 'win32',
        });
      } catch (error) {
        resolve(spawnFailed(error));
        return;
      }

      this.active.add(child);
      this.logger?.debug({ command: label, pid: child.pid }, 'Command spawned');

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      const deadline = new TimerGuard(label);
      let settled = false;

      const settle = (outcome: CommandOutcome): void => {
        if (settled) {
          return;
        }
        settled = true;
        deadline.clear();
        this.active.delete(child);
        resolve(outcome);
      };

      deadline.set(() => {
        this.logger?.warn(
          { command: deadline.getName(), pid: child.pid, timeoutMs: options.timeoutMs },
          'Command timed out, killing process group'
        );
        this.killProcessGroup(child);
      }, options.timeoutMs);

      child.once('error', (error) => {
        // No pid means the process never started
        if (child.pid === undefined) {
          settle(spawnFailed(error));
          return;
        }
        this.logger?.warn({ command: label, error: error.message }, 'Command emitted an error');
      });

      child.once('close', (code, signal) => {
        const durationMs = performance.now() - startedAt;

        if (deadline.hasFired()) {
          settle({ kind: 'timeout', timeoutMs: options.timeoutMs, durationMs });
          return;
        }

        settle({
          kind: 'completed',
          exitCode: code ?? signalExitCode(signal),
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
          durationMs,
        });
      });
    });
  }

  /**
   * Number of commands still running
   */
  getActiveCount(): number {
    return this.active.size;
  }

  /**
   * Kill every running command (used on shutdown signals so no child outlives the harness)
   */
  terminateAll(): void {
    for (const child of this.active) {
      this.killProcessGroup(child);
    }
  }

  private killProcessGroup(child: ChildProcess): void {
    const pid = child.pid;
    if (pid === undefined) {
      return;
    }

    if (process.platform !== 'win32') {
      try {
        process.kill(-pid, 'SIGKILL');
        return;
      } catch (error) {
        this.logger?.debug({ pid, errno: errnoCode(error) }, 'Process group kill failed, killing child only');
      }
    }

    if (child.exitCode === null) {
      child.kill('SIGKILL');
    }
  }
}

function spawnFailed(error: unknown): FailedSpawn {
  const normalized = error instanceof Error ? error : new Error(String(error));
  return {
    kind: 'spawn-failed',
    error: normalized,
    missing: errnoCode(normalized) === 'ENOENT',
  };
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) {
    return 1;
  }
  return SIGNAL_EXIT_BASE + (SIGNAL_NUMBERS[signal] ?? 0);
}

/**
 * Human-readable reason for a command that did not complete with exit 0
 */
export function describeFailure(outcome: CommandOutcome): string {
  switch (outcome.kind) {
    case 'spawn-failed':
      return outcome.missing ? `command not found: ${outcome.error.message}` : outcome.error.message;
    case 'timeout':
      return `timed out after ${outcome.timeoutMs}ms`;
    case 'completed': {
      const stderr = outcome.stderr.trim();
      return stderr.length > 0 ? stderr : `exit code ${outcome.exitCode}`;
    }
  }
}
