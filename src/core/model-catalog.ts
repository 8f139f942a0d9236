/**
 * Model Catalog
 *
 * Enumerates the models installed in the runtime via `ollama ls`.
 * Failing to enumerate is fatal to a run.
 */

import type { Logger } from 'pino';
import type { CommandRunner } from '../bridge/command-runner.js';
import { describeFailure } from '../bridge/command-runner.js';
import { HarnessError } from '../api/errors.js';

export interface ModelCatalogOptions {
  runner: CommandRunner;
  /** Model-serving runtime CLI (default: ollama) */
  runtimeCommand?: string;
  /** Timeout for the listing (ms, default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_LIST_TIMEOUT_MS = 30_000;

/**
 * Parse `ollama ls` output: skip the header, keep the first token of each row
 *
 * @example
 * ```typescript
 * parseModelList('NAME          ID            SIZE    MODIFIED\nllama3:8b     365c0bd3c000  4.7 GB  2 days ago\n');
 * // => ['llama3:8b']
 * ```
 */
export function parseModelList(text: string): string[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.slice(1).map((line) => line.trim().split(/\s+/)[0]);
}

/**
 * List installed models in the order the runtime reports them.
 *
 * @throws HarnessError EnvironmentError when the runtime CLI is missing,
 * exits non-zero or times out
 */
export async function listModels(options: ModelCatalogOptions): Promise<string[]> {
  const command = options.runtimeCommand ?? 'ollama';
  const outcome = await options.runner.run(command, ['ls'], {
    timeoutMs: options.timeoutMs ?? DEFAULT_LIST_TIMEOUT_MS,
  });

  if (outcome.kind !== 'completed' || outcome.exitCode !== 0) {
    const reason = describeFailure(outcome);
    const hint =
      outcome.kind === 'spawn-failed' && outcome.missing
        ? ` Make sure ${command} is installed and in PATH.`
        : ` Make sure ${command} is running.`;
    throw new HarnessError('EnvironmentError', `Failed to list models with '${command} ls': ${reason}.${hint}`, {
      command: `${command} ls`,
      outcome: outcome.kind,
    });
  }

  const models = parseModelList(outcome.stdout);
  options.logger?.info({ count: models.length, models }, 'Enumerated runtime models');
  return models;
}
