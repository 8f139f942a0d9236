/**
 * GPU Usage Detection
 *
 * Two separate questions:
 * 1. Capability: does this host have a GPU the runtime could use?
 * 2. Usage: is the runtime running any loaded model on it right now?
 *
 * Usage only reflects models currently loaded, so callers check it before
 * and after a benchmark sweep and reconcile the readings with
 * `reconcileGpuStatus`. Nothing here caches a previous reading.
 */

import type { Logger } from 'pino';
import type { CommandRunner } from '../bridge/command-runner.js';
import { describeFailure } from '../bridge/command-runner.js';
import type { GpuStatus } from '../types/benchmark.js';
import { parseProcessTable, summarizeProcessorUsage } from './process-table.js';

export const NO_GPU_BACKEND = 'None';
export const NO_GPU_LAYERS = 'N/A';
export const RUNTIME_REPORTED_BACKEND = 'Reported by runtime';

export interface GpuCapability {
  gpuAvailable: boolean;
  backend: string;
}

export interface GpuDetectorOptions {
  runner: CommandRunner;
  /** Model-serving runtime CLI (default: ollama) */
  runtimeCommand?: string;
  platform?: NodeJS.Platform;
  arch?: string;
  /** Timeout for vendor tools (ms, default: 5000) */
  probeTimeoutMs?: number;
  /** Timeout for the process-table command (ms, default: 10000) */
  psTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;
const DEFAULT_PS_TIMEOUT_MS = 10_000;

const NO_GPU: GpuCapability = { gpuAvailable: false, backend: NO_GPU_BACKEND };

/**
 * Query the platform's GPU enumeration tools once.
 *
 * Missing tools, non-zero exits and timeouts all mean "no GPU".
 */
export async function checkGpuCapability(options: GpuDetectorOptions): Promise<GpuCapability> {
  const platform = options.platform ?? process.platform;
  const arch = options.arch ?? process.arch;
  const timeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;

  const query = async (command: string, args: readonly string[]): Promise<string | null> => {
    try {
      const outcome = await options.runner.run(command, args, { timeoutMs });
      if (outcome.kind === 'completed' && outcome.exitCode === 0) {
        return outcome.stdout.trim();
      }
      options.logger?.debug({ command, reason: describeFailure(outcome) }, 'GPU capability query failed');
    } catch (error) {
      options.logger?.debug({ command, error: String(error) }, 'GPU capability query threw');
    }
    return null;
  };

  if (platform === 'darwin') {
    if (arch === 'arm64') {
      return { gpuAvailable: true, backend: 'Apple Silicon (Metal)' };
    }
    const displays = await query('system_profiler', ['SPDisplaysDataType']);
    if (displays !== null && displays.includes('Metal')) {
      return { gpuAvailable: true, backend: 'Metal supported' };
    }
    return NO_GPU;
  }

  if (platform === 'linux') {
    const nvidia = await query('nvidia-smi', ['--query-gpu=name,memory.total', '--format=csv,noheader']);
    if (nvidia) {
      return { gpuAvailable: true, backend: `NVIDIA: ${nvidia}` };
    }

    const rocm = await query('rocm-smi', ['--showproductname']);
    if (rocm !== null) {
      return { gpuAvailable: true, backend: 'AMD ROCm' };
    }
  }

  return NO_GPU;
}

/**
 * Read the runtime's process table and combine it with a capability reading.
 *
 * If the process-table command fails, the GPU is reported as not in use
 * and the capability values are kept.
 */
export async function checkGpuUsage(
  options: GpuDetectorOptions,
  capability: GpuCapability
): Promise<GpuStatus> {
  const idle: GpuStatus = {
    gpuAvailable: capability.gpuAvailable,
    gpuInUse: false,
    gpuLayers: NO_GPU_LAYERS,
    backend: capability.backend,
  };

  const command = options.runtimeCommand ?? 'ollama';
  let stdout: string;
  try {
    const outcome = await options.runner.run(command, ['ps'], {
      timeoutMs: options.psTimeoutMs ?? DEFAULT_PS_TIMEOUT_MS,
    });
    if (outcome.kind !== 'completed' || outcome.exitCode !== 0) {
      options.logger?.warn({ command: `${command} ps`, reason: describeFailure(outcome) }, 'Process table unavailable');
      return idle;
    }
    stdout = outcome.stdout;
  } catch (error) {
    options.logger?.warn({ command: `${command} ps`, error: String(error) }, 'Process table unavailable');
    return idle;
  }

  const table = parseProcessTable(stdout, options.logger);
  for (const issue of table.issues) {
    options.logger?.debug({ line: issue.line, reason: issue.reason }, 'Skipped process table row');
  }

  const usage = summarizeProcessorUsage(table);
  // A GPU the runtime is using is available even if no vendor tool found it
  const inferred = usage.gpuInUse && !capability.gpuAvailable;

  return {
    gpuAvailable: capability.gpuAvailable || usage.gpuInUse,
    gpuInUse: usage.gpuInUse,
    gpuLayers: usage.gpuLayers ?? NO_GPU_LAYERS,
    backend: inferred ? RUNTIME_REPORTED_BACKEND : capability.backend,
  };
}

/**
 * One full detector pass: capability check followed by usage check
 */
export async function detectGpuStatus(options: GpuDetectorOptions): Promise<GpuStatus> {
  const capability = await checkGpuCapability(options);
  const status = await checkGpuUsage(options, capability);
  options.logger?.debug({ gpu: status }, 'GPU detector pass complete');
  return status;
}

/**
 * Latest-wins reconciliation of two sequential readings.
 *
 * A later in-use reading always replaces the earlier one; a later idle
 * reading never overrides an earlier in-use one. Between two idle
 * readings the later one wins.
 */
export function reconcileGpuStatus(earlier: GpuStatus, later: GpuStatus): GpuStatus {
  if (later.gpuInUse || !earlier.gpuInUse) {
    return later;
  }
  return earlier;
}

/**
 * Label for the "Ollama Using GPU" report cell
 */
export function describeGpuUsage(status: GpuStatus): string {
  if (status.gpuInUse) {
    return 'Yes';
  }
  return status.gpuAvailable ? 'Available but not used' : 'No';
}
