import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import {
  DEFAULT_BENCHMARK_TIMEOUT_MS,
  benchmarkModel,
  computeMetrics,
  countTokens,
} from '../../../src/core/model-benchmark.js';
import { FakeCommandRunner, completed, timedOut } from '../../helpers/fake-command-runner.js';

const logger = pino({ level: 'silent' });
const PROMPT = 'Say hello.';

/**
 * Clock returning the given readings in order, then repeating the last one
 */
function clockOf(...readings: number[]): () => number {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)];
}

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

describe('countTokens', () => {
  it('counts whitespace-delimited words', () => {
    expect(countTokens('Machine learning  is\na subset\tof AI.')).toBe(7);
  });

  it('returns 0 for empty or blank output', () => {
    expect(countTokens('')).toBe(0);
    expect(countTokens('  \n\t ')).toBe(0);
  });
});

describe('computeMetrics', () => {
  it('derives rounded metrics from the unrounded time', () => {
    expect(computeMetrics(41, 7.59)).toEqual({
      firstTokenLatencyMs: 1138.5,
      tokensPerSecond: 5.4,
      totalTimeS: 7.59,
      tokenCount: 41,
    });
  });

  it('honours a custom first-token ratio', () => {
    expect(computeMetrics(10, 2.5, 0.2).firstTokenLatencyMs).toBe(500);
  });

  it('reports zero throughput for zero elapsed time', () => {
    expect(computeMetrics(12, 0)).toEqual({
      firstTokenLatencyMs: 0,
      tokensPerSecond: 0,
      totalTimeS: 0,
      tokenCount: 12,
    });
  });

  it('never produces NaN or Infinity', () => {
    const metrics = computeMetrics(5, Number.NaN);
    expect(Object.values(metrics).every(Number.isFinite)).toBe(true);
  });
});

describe('benchmarkModel', () => {
  it('returns a success result with metrics', async () => {
    const runner = new FakeCommandRunner().on('ollama run llama3:8b', completed(words(41)));

    const result = await benchmarkModel({
      runner,
      model: 'llama3:8b',
      prompt: PROMPT,
      clock: clockOf(1000, 8590),
      logger,
    });

    expect(result).toEqual({
      model: 'llama3:8b',
      status: 'success',
      firstTokenLatencyMs: 1138.5,
      tokensPerSecond: 5.4,
      totalTimeS: 7.59,
      tokenCount: 41,
      error: null,
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('passes the model, prompt and timeout to the runtime', async () => {
    const runner = new FakeCommandRunner().on('ollama run', completed('ok'));
    await benchmarkModel({ runner, model: 'mistral:7b', prompt: PROMPT, timeoutMs: 5000, clock: clockOf(0, 1) });

    expect(runner.calls).toEqual([
      { command: 'ollama', args: ['run', 'mistral:7b', PROMPT], options: { timeoutMs: 5000 } },
    ]);
  });

  it('defaults the timeout to five minutes', async () => {
    const runner = new FakeCommandRunner().on('ollama run', completed('ok'));
    await benchmarkModel({ runner, model: 'mistral:7b', prompt: PROMPT, clock: clockOf(0, 1) });
    expect(runner.calls[0].options.timeoutMs).toBe(DEFAULT_BENCHMARK_TIMEOUT_MS);
  });

  it('reports zero tokens per second for empty output', async () => {
    const runner = new FakeCommandRunner().on('ollama run', completed(''));
    const result = await benchmarkModel({ runner, model: 'm', prompt: PROMPT, clock: clockOf(0, 2000) });

    expect(result).toMatchObject({ status: 'success', tokenCount: 0, tokensPerSecond: 0, totalTimeS: 2 });
  });

  it('returns a timeout result when the deadline passes', async () => {
    const runner = new FakeCommandRunner().on('ollama run', timedOut(120_000));
    const result = await benchmarkModel({
      runner,
      model: 'llama3:70b',
      prompt: PROMPT,
      timeoutMs: 120_000,
      clock: clockOf(0, 120_000),
      logger,
    });

    expect(result).toEqual({
      model: 'llama3:70b',
      status: 'timeout',
      firstTokenLatencyMs: null,
      tokensPerSecond: null,
      totalTimeS: null,
      tokenCount: null,
      error: 'Timeout exceeded after 120s',
    });
  });

  it('returns an error result with stderr on a non-zero exit', async () => {
    const runner = new FakeCommandRunner().on(
      'ollama run',
      completed('', 1, 'Error: pull model manifest: file does not exist\n')
    );
    const result = await benchmarkModel({ runner, model: 'nope', prompt: PROMPT, clock: clockOf(0, 10), logger });

    expect(result).toMatchObject({
      status: 'error',
      error: 'Error: pull model manifest: file does not exist',
      tokenCount: null,
    });
  });

  it('falls back to the exit code when stderr is empty', async () => {
    const runner = new FakeCommandRunner().on('ollama run', completed('partial', 137));
    const result = await benchmarkModel({ runner, model: 'm', prompt: PROMPT, clock: clockOf(0, 10) });
    expect(result.error).toBe('exit code 137');
  });

  it('returns an error result when the runtime is missing', async () => {
    const runner = new FakeCommandRunner();
    const result = await benchmarkModel({ runner, model: 'm', prompt: PROMPT, clock: clockOf(0, 10), logger });

    expect(result.status).toBe('error');
    expect(result.error).toBe('command not found: spawn ollama ENOENT');
  });

  it('returns an error result when the runner throws', async () => {
    const runner = new FakeCommandRunner().on('ollama run', new Error('pipe closed'));
    const result = await benchmarkModel({ runner, model: 'm', prompt: PROMPT, clock: clockOf(0, 10), logger });
    expect(result).toMatchObject({ status: 'error', error: 'pipe closed' });
  });

  it('rejects an empty model identifier without running anything', async () => {
    const runner = new FakeCommandRunner();
    const result = await benchmarkModel({ runner, model: '  ', prompt: PROMPT });

    expect(result).toMatchObject({ status: 'error', error: 'Model identifier must not be empty' });
    expect(runner.calls).toHaveLength(0);
  });
});
