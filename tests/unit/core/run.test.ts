import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runBenchmark } from '../../../src/core/run.js';
import { FakeCommandRunner, completed } from '../../helpers/fake-command-runner.js';

const PS_IDLE = completed('NAME    ID    SIZE    PROCESSOR    UNTIL\n');

describe('runBenchmark', () => {
  let dir: string;
  let runner: FakeCommandRunner;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ollama-bench-run-'));
    runner = new FakeCommandRunner().on('ollama ps', PS_IDLE).on('ollama run', completed('a b c d'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('sweeps, renders and writes a Markdown report', async () => {
    const outputPath = join(dir, 'report.md');
    const result = await runBenchmark(
      { models: ['llama3:8b'], prompt: 'Hi', platform: 'win32', outputPath },
      { runner, now: () => new Date(2024, 0, 2, 3, 4, 5) }
    );

    expect(result.outputPath).toBe(outputPath);
    expect(result.outcome.results).toHaveLength(1);
    expect(result.report.prompt).toBe('Hi');

    const lines = readFileSync(outputPath, 'utf8').split('\n');
    expect(lines[0]).toBe('# Ollama Model Benchmark Report');
    expect(lines[2]).toBe('**Generated:** 2024-01-02 03:04:05');
    expect(lines).toContain('| **Ollama Using GPU** | No |');
  });

  it('writes a zero-result report when no models are installed', async () => {
    runner.on('ollama ls', completed('NAME    ID    SIZE    MODIFIED\n'));
    const outputPath = join(dir, 'empty.md');

    const result = await runBenchmark({ platform: 'win32', outputPath }, { runner });

    expect(result.outcome.results).toEqual([]);
    expect(readFileSync(outputPath, 'utf8').split('\n')).toContain('- **Total Models Benchmarked:** 0');
  });

  it('writes JSON when asked', async () => {
    const outputPath = join(dir, 'report.json');
    await runBenchmark({ models: ['m'], platform: 'win32', outputPath, format: 'json' }, { runner });

    const parsed: unknown = JSON.parse(readFileSync(outputPath, 'utf8'));
    expect(parsed).toMatchObject({
      prompt: 'Explain the concept of machine learning in 50 words.',
      results: [{ model: 'm', status: 'success', tokenCount: 4 }],
    });
  });

  it('hands the sweep to the caller before it runs', async () => {
    const started: string[] = [];
    await runBenchmark(
      { models: ['x', 'y'], platform: 'win32', outputPath: join(dir, 'r.md') },
      { runner, onSweep: (sweep) => sweep.on('model:start', (model) => started.push(model)) }
    );
    expect(started).toEqual(['x', 'y']);
  });

  it('raises ReportWriteError when the report cannot be written', async () => {
    const blocker = join(dir, 'file');
    writeFileSync(blocker, '');

    await expect(
      runBenchmark({ models: ['m'], platform: 'win32', outputPath: join(blocker, 'r.md') }, { runner })
    ).rejects.toMatchObject({ code: 'ReportWriteError' });
  });
});
