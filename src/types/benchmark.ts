/**
 * Benchmark harness types
 *
 * Shapes shared by the machine probe, GPU detector, benchmark runner
 * and report generator.
 */

/**
 * Placeholder used wherever a host fact could not be determined
 */
export const UNKNOWN = 'Unknown';

/**
 * Static host facts, captured once at start
 */
export interface MachineSpec {
  readonly os: string;
  readonly osRelease: string;
  readonly osVersion: string;
  readonly cpu: string;
  readonly physicalCores: number | null;
  readonly logicalCores: number | null;
  readonly memoryGb: number | null;
  readonly gpu: string;
  readonly arch: string;
  readonly runtimeVersion: string;
  readonly nodeVersion: string;
}

/**
 * GPU capability and live usage, as seen by one detector pass.
 *
 * `gpuInUse` implies `gpuAvailable`.
 */
export interface GpuStatus {
  readonly gpuAvailable: boolean;
  readonly gpuInUse: boolean;
  /** Processor split reported by the runtime, e.g. "100% GPU" */
  readonly gpuLayers: string;
  readonly backend: string;
}

export type BenchmarkStatus = 'success' | 'timeout' | 'error';

export interface SuccessfulBenchmarkResult {
  readonly model: string;
  readonly status: Extract<BenchmarkStatus, 'success'>;
  /** Estimated, the generate call is not streamed */
  readonly firstTokenLatencyMs: number;
  readonly tokensPerSecond: number;
  readonly totalTimeS: number;
  readonly tokenCount: number;
  readonly error: null;
}

export interface FailedBenchmarkResult {
  readonly model: string;
  readonly status: Exclude<BenchmarkStatus, 'success'>;
  readonly firstTokenLatencyMs: null;
  readonly tokensPerSecond: null;
  readonly totalTimeS: null;
  readonly tokenCount: null;
  readonly error: string;
}

/**
 * Outcome of one model's benchmark. Exactly one per attempted model.
 */
export type BenchmarkResult = SuccessfulBenchmarkResult | FailedBenchmarkResult;

/**
 * Everything the report generator renders
 */
export interface BenchmarkReport {
  readonly results: readonly BenchmarkResult[];
  readonly machine: MachineSpec;
  readonly gpu: GpuStatus;
  readonly prompt: string;
  readonly generatedAt: Date;
}

export type ReportFormat = 'markdown' | 'json';

export function isSuccessfulResult(result: BenchmarkResult): result is SuccessfulBenchmarkResult {
  return result.status === 'success';
}
