/**
 * Model Benchmark Runner
 *
 * Runs one prompt against one model through `ollama run` under a timeout
 * and derives timing metrics from the wall-clock duration.
 *
 * The generate call is not streamed, so first-token latency is an
 * estimate: a fixed share (`firstTokenRatio`) of the total call time.
 * Token counts are whitespace-delimited words, not tokenizer tokens.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type { CommandOutcome, CommandRunner } from '../bridge/command-runner.js';
import { describeFailure } from '../bridge/command-runner.js';
import { toHarnessError } from '../api/errors.js';
import type { BenchmarkResult, FailedBenchmarkResult, SuccessfulBenchmarkResult } from '../types/benchmark.js';
import { roundTo, safeDivide } from '../utils/math-helpers.js';

export const DEFAULT_BENCHMARK_TIMEOUT_MS = 300_000;
export const DEFAULT_FIRST_TOKEN_RATIO = 0.15;
export const DEFAULT_PROMPT = 'Explain the concept of machine learning in 50 words.';

export interface BenchmarkModelOptions {
  runner: CommandRunner;
  model: string;
  prompt: string;
  /** Bound on the generate call (ms, default: 300000) */
  timeoutMs?: number;
  /** Share of total time reported as first-token latency (default: 0.15) */
  firstTokenRatio?: number;
  /** Model-serving runtime CLI (default: ollama) */
  runtimeCommand?: string;
  /** Monotonic clock in ms (default: performance.now) */
  clock?: () => number;
  logger?: Logger;
}

export interface DerivedMetrics {
  firstTokenLatencyMs: number;
  tokensPerSecond: number;
  totalTimeS: number;
  tokenCount: number;
}

/**
 * Approximate token count: whitespace-delimited words
 */
export function countTokens(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * Derive reported metrics from a token count and the unrounded call time.
 *
 * @example
 * ```typescript
 * computeMetrics(41, 7.59)
 * // => { firstTokenLatencyMs: 1138.5, tokensPerSecond: 5.4, totalTimeS: 7.59, tokenCount: 41 }
 * ```
 */
export function computeMetrics(
  tokenCount: number,
  totalTimeS: number,
  firstTokenRatio = DEFAULT_FIRST_TOKEN_RATIO
): DerivedMetrics {
  const elapsed = Number.isFinite(totalTimeS) && totalTimeS > 0 ? totalTimeS : 0;
  const tokens = Math.max(0, tokenCount);

  return {
    firstTokenLatencyMs: roundTo(elapsed * firstTokenRatio * 1000, 2),
    tokensPerSecond: roundTo(safeDivide(tokens, elapsed), 2),
    totalTimeS: roundTo(elapsed, 2),
    tokenCount: tokens,
  };
}

function failed(model: string, status: FailedBenchmarkResult['status'], error: string): FailedBenchmarkResult {
  return Object.freeze({
    model,
    status,
    firstTokenLatencyMs: null,
    tokensPerSecond: null,
    totalTimeS: null,
    tokenCount: null,
    error,
  });
}

/**
 * Benchmark a single model. Never rejects: every failure becomes a
 * `timeout` or `error` result, and nothing is retried.
 */
export async function benchmarkModel(options: BenchmarkModelOptions): Promise<BenchmarkResult> {
  const { model, prompt, logger } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_BENCHMARK_TIMEOUT_MS;
  const clock = options.clock ?? (() => performance.now());
  const command = options.runtimeCommand ?? 'ollama';

  if (model.trim().length === 0) {
    return failed(model, 'error', 'Model identifier must not be empty');
  }

  const startedAt = clock();
  let outcome: CommandOutcome;
  try {
    outcome = await options.runner.run(command, ['run', model, prompt], { timeoutMs });
  } catch (error) {
    const harnessError = toHarnessError(error);
    logger?.error({ model, error: harnessError.toObject() }, 'Generate call threw');
    return failed(model, 'error', harnessError.message);
  }
  const totalTimeS = (clock() - startedAt) / 1000;

  switch (outcome.kind) {
    case 'timeout':
      logger?.warn({ model, timeoutMs }, 'Benchmark exceeded its timeout');
      return failed(model, 'timeout', `Timeout exceeded after ${roundTo(timeoutMs / 1000, 2)}s`);

    case 'spawn-failed':
      logger?.error({ model, error: outcome.error.message }, 'Generate call could not start');
      return failed(model, 'error', describeFailure(outcome));

    case 'completed': {
      if (outcome.exitCode !== 0) {
        logger?.error({ model, exitCode: outcome.exitCode }, 'Generate call failed');
        return failed(model, 'error', describeFailure(outcome));
      }

      const metrics = computeMetrics(countTokens(outcome.stdout), totalTimeS, options.firstTokenRatio);
      logger?.debug({ model, ...metrics }, 'Generate call finished');

      const result: SuccessfulBenchmarkResult = {
        model,
        status: 'success',
        ...metrics,
        error: null,
      };
      return Object.freeze(result);
    }
  }
}
