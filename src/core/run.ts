/**
 * End-to-end harness run: sweep, render, write.
 */

import type { Logger } from 'pino';
import type { CommandRunner } from '../bridge/command-runner.js';
import type { BenchmarkReport, ReportFormat } from '../types/benchmark.js';
import { DEFAULT_TOP_N, renderReport } from '../report/markdown-report.js';
import { writeReport } from '../report/writer.js';
import { BenchmarkSweep, type BenchmarkSweepConfig, type SweepOutcome } from './benchmark-sweep.js';
import { DEFAULT_PROMPT } from './model-benchmark.js';

export interface RunBenchmarkOptions extends BenchmarkSweepConfig {
  outputPath: string;
  format?: ReportFormat;
  topN?: number;
}

export interface RunBenchmarkDeps {
  runner: CommandRunner;
  logger?: Logger;
  /** Subscribe to progress before the sweep starts */
  onSweep?: (sweep: BenchmarkSweep) => void;
  /** Report timestamp source (default: new Date()) */
  now?: () => Date;
}

export interface RunBenchmarkResult {
  outputPath: string;
  report: BenchmarkReport;
  outcome: SweepOutcome;
}

/**
 * @throws HarnessError EnvironmentError when models cannot be enumerated,
 * ReportWriteError when the report cannot be written
 */
export async function runBenchmark(options: RunBenchmarkOptions, deps: RunBenchmarkDeps): Promise<RunBenchmarkResult> {
  const sweep = new BenchmarkSweep(deps.runner, options, deps.logger);
  deps.onSweep?.(sweep);

  const outcome = await sweep.run();
  const report: BenchmarkReport = {
    results: outcome.results,
    machine: outcome.machine,
    gpu: outcome.gpu,
    prompt: options.prompt ?? DEFAULT_PROMPT,
    generatedAt: deps.now?.() ?? new Date(),
  };

  const content = renderReport(report, options.format ?? 'markdown', { topN: options.topN ?? DEFAULT_TOP_N });
  const outputPath = await writeReport(options.outputPath, content);
  deps.logger?.info({ outputPath, format: options.format ?? 'markdown' }, 'Report written');

  return { outputPath, report, outcome };
}
