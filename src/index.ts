export { runBenchmark, type RunBenchmarkOptions, type RunBenchmarkDeps, type RunBenchmarkResult } from './core/run.js';
export {
  BenchmarkSweep,
  type BenchmarkSweepConfig,
  type BenchmarkSweepEvents,
  type GpuCheckPhase,
  type SweepOutcome,
} from './core/benchmark-sweep.js';
export { HarnessError, toHarnessError, type HarnessErrorCode } from './api/errors.js';
export {
  SpawnCommandRunner,
  describeFailure,
  type CommandRunner,
  type CommandOptions,
  type CommandOutcome,
} from './bridge/command-runner.js';

export * from './core/machine-probe.js';
export * from './core/gpu-detector.js';
export * from './core/process-table.js';
export * from './core/model-catalog.js';
export * from './core/model-benchmark.js';
export * from './report/markdown-report.js';
export { writeReport } from './report/writer.js';
export { loadConfig, validateConfig, toHarnessOptions, type HarnessConfig, type HarnessOptions } from './config/loader.js';
export { createLogger } from './utils/logger.js';

export type * from './types/benchmark.js';
export { UNKNOWN, isSuccessfulResult } from './types/benchmark.js';
