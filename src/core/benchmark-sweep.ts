/**
 * Benchmark Sweep
 *
 * Drives one full harness run: probe the host, take GPU readings around
 * the benchmarks, and benchmark each model strictly one after another.
 *
 * GPU usage is read three times (before the first model, after the first
 * successful model, after the last model) because the runtime only lists
 * models it currently has loaded. Readings are reconciled latest-wins.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { CommandRunner } from '../bridge/command-runner.js';
import type { BenchmarkResult, GpuStatus, MachineSpec } from '../types/benchmark.js';
import { checkGpuCapability, checkGpuUsage, reconcileGpuStatus, type GpuDetectorOptions } from './gpu-detector.js';
import { probeMachine } from './machine-probe.js';
import { listModels } from './model-catalog.js';
import { benchmarkModel, DEFAULT_BENCHMARK_TIMEOUT_MS, DEFAULT_FIRST_TOKEN_RATIO, DEFAULT_PROMPT } from './model-benchmark.js';

export type GpuCheckPhase = 'initial' | 'after-first-success' | 'final';

export interface BenchmarkSweepConfig {
  /** Models to benchmark; enumerated from the runtime when empty */
  models?: readonly string[];
  prompt?: string;
  /** Per-model timeout (ms) */
  timeoutMs?: number;
  firstTokenRatio?: number;
  /** Model-serving runtime CLI (default: ollama) */
  runtimeCommand?: string;
  listTimeoutMs?: number;
  psTimeoutMs?: number;
  /** Timeout for host and vendor-tool queries (ms) */
  probeTimeoutMs?: number;
  platform?: NodeJS.Platform;
  arch?: string;
}

/**
 * Sweep events
 */
export interface BenchmarkSweepEvents {
  machine: (machine: MachineSpec) => void;
  gpu: (phase: GpuCheckPhase, status: GpuStatus) => void;
  'model:start': (model: string, index: number, total: number) => void;
  'model:complete': (result: BenchmarkResult, index: number, total: number) => void;
}

export interface SweepOutcome {
  machine: MachineSpec;
  gpu: GpuStatus;
  results: BenchmarkResult[];
}

export class BenchmarkSweep extends EventEmitter<BenchmarkSweepEvents> {
  private readonly runner: CommandRunner;
  private readonly config: BenchmarkSweepConfig;
  private readonly logger?: Logger;

  constructor(runner: CommandRunner, config: BenchmarkSweepConfig = {}, logger?: Logger) {
    super();
    this.runner = runner;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Run the sweep.
   *
   * @throws HarnessError EnvironmentError if models cannot be enumerated.
   * An empty runtime and per-model failures never throw.
   */
  public async run(): Promise<SweepOutcome> {
    const { config, runner, logger } = this;
    const runtimeCommand = config.runtimeCommand ?? 'ollama';
    const prompt = config.prompt ?? DEFAULT_PROMPT;

    const machine = await probeMachine({
      runner,
      runtimeCommand,
      timeoutMs: config.probeTimeoutMs,
      platform: config.platform,
      logger,
    });
    this.emit('machine', machine);

    const detector: GpuDetectorOptions = {
      runner,
      runtimeCommand,
      platform: config.platform,
      arch: config.arch,
      probeTimeoutMs: config.probeTimeoutMs,
      psTimeoutMs: config.psTimeoutMs,
      logger,
    };
    const capability = await checkGpuCapability(detector);

    let gpu = await checkGpuUsage(detector, capability);
    this.emit('gpu', 'initial', gpu);

    const models = await this.resolveModels(runtimeCommand);
    const total = models.length;
    const results: BenchmarkResult[] = [];
    let rechecked = false;

    for (const [index, model] of models.entries()) {
      this.emit('model:start', model, index, total);
      logger?.info({ model, index: index + 1, total }, 'Benchmarking model');

      const result = await benchmarkModel({
        runner,
        model,
        prompt,
        timeoutMs: config.timeoutMs ?? DEFAULT_BENCHMARK_TIMEOUT_MS,
        firstTokenRatio: config.firstTokenRatio ?? DEFAULT_FIRST_TOKEN_RATIO,
        runtimeCommand,
        logger,
      });
      results.push(result);
      this.emit('model:complete', result, index, total);

      // The first loaded model is the earliest point usage can be observed
      if (!rechecked && result.status === 'success') {
        rechecked = true;
        gpu = reconcileGpuStatus(gpu, await checkGpuUsage(detector, capability));
        this.emit('gpu', 'after-first-success', gpu);
      }
    }

    gpu = reconcileGpuStatus(gpu, await checkGpuUsage(detector, capability));
    this.emit('gpu', 'final', gpu);

    logger?.info(
      { total, successful: results.filter((r) => r.status === 'success').length, gpuInUse: gpu.gpuInUse },
      'Benchmark sweep complete'
    );

    return { machine, gpu, results };
  }

  private async resolveModels(runtimeCommand: string): Promise<readonly string[]> {
    if (this.config.models && this.config.models.length > 0) {
      return this.config.models;
    }

    const models = await listModels({
      runner: this.runner,
      runtimeCommand,
      timeoutMs: this.config.listTimeoutMs,
      logger: this.logger,
    });
    if (models.length === 0) {
      this.logger?.warn(
        { command: `${runtimeCommand} ls` },
        `No models found. Install a model first, e.g. '${runtimeCommand} pull <model>'.`
      );
    }
    return models;
  }
}
