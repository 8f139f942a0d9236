/**
 * Machine Probe
 *
 * Collects static host facts (OS, CPU, memory, GPU model, runtime version)
 * for the report header. Every sub-query is read-only and allowed to fail:
 * a failed query yields "Unknown" and probing continues.
 */

import * as os from 'node:os';
import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { CommandRunner } from '../bridge/command-runner.js';
import { UNKNOWN, type MachineSpec } from '../types/benchmark.js';
import { roundTo } from '../utils/math-helpers.js';

/**
 * The subset of `node:os` the probe reads
 */
export interface HostInfo {
  type(): string;
  release(): string;
  version(): string;
  arch(): string;
  cpus(): Array<{ model: string }>;
  totalmem(): number;
}

export interface MachineProbeOptions {
  runner: CommandRunner;
  /** Model-serving runtime CLI (default: ollama) */
  runtimeCommand?: string;
  /** Per-query timeout (ms, default: 5000) */
  timeoutMs?: number;
  platform?: NodeJS.Platform;
  host?: HostInfo;
  readTextFile?: (path: string) => Promise<string>;
  logger?: Logger;
}

interface CpuFacts {
  cpu: string | null;
  physicalCores: number | null;
  logicalCores: number | null;
  memoryGb: number | null;
  gpu: string | null;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;
const BYTES_PER_GB = 1024 ** 3;
const KB_PER_GB = 1024 ** 2;

/**
 * Probe the host. Never rejects.
 */
export async function probeMachine(options: MachineProbeOptions): Promise<MachineSpec> {
  const host = options.host ?? os;
  const platform = options.platform ?? process.platform;
  const query = createQuery(options);

  const facts =
    platform === 'darwin'
      ? await probeDarwin(query)
      : platform === 'linux'
        ? await probeLinux(query, options.readTextFile ?? readUtf8, options.logger)
        : { cpu: null, physicalCores: null, logicalCores: null, memoryGb: null, gpu: null };

  const runtimeVersion = parseRuntimeVersion(
    (await query(options.runtimeCommand ?? 'ollama', ['--version'])) ?? ''
  );

  const cpus = safeCall(() => host.cpus(), [], options.logger);
  const totalMem = safeCall(() => host.totalmem(), 0, options.logger);

  const spec: MachineSpec = {
    os: safeCall(() => host.type(), UNKNOWN, options.logger),
    osRelease: safeCall(() => host.release(), UNKNOWN, options.logger),
    osVersion: safeCall(() => host.version(), UNKNOWN, options.logger),
    cpu: facts.cpu ?? cpus[0]?.model ?? UNKNOWN,
    physicalCores: facts.physicalCores,
    logicalCores: facts.logicalCores ?? (cpus.length > 0 ? cpus.length : null),
    memoryGb: facts.memoryGb ?? (totalMem > 0 ? roundTo(totalMem / BYTES_PER_GB, 1) : null),
    gpu: facts.gpu ?? UNKNOWN,
    arch: safeCall(() => host.arch(), UNKNOWN, options.logger),
    runtimeVersion: runtimeVersion ?? UNKNOWN,
    nodeVersion: process.version,
  };

  options.logger?.debug({ machine: spec }, 'Machine probe complete');
  return Object.freeze(spec);
}

type Query = (command: string, args: readonly string[]) => Promise<string | null>;

/**
 * Run a command and return its trimmed stdout, or null on any failure
 */
function createQuery(options: MachineProbeOptions): Query {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;

  return async (command, args) => {
    try {
      const outcome = await options.runner.run(command, args, { timeoutMs });
      if (outcome.kind !== 'completed' || outcome.exitCode !== 0) {
        options.logger?.debug({ command, args, outcome: outcome.kind }, 'Probe query failed');
        return null;
      }
      const text = outcome.stdout.trim();
      return text.length > 0 ? text : null;
    } catch (error) {
      options.logger?.debug({ command, args, error: String(error) }, 'Probe query threw');
      return null;
    }
  };
}

async function probeDarwin(query: Query): Promise<CpuFacts> {
  const brand = await query('sysctl', ['-n', 'machdep.cpu.brand_string']);
  const physical = await query('sysctl', ['-n', 'hw.physicalcpu']);
  const logical = await query('sysctl', ['-n', 'hw.ncpu']);
  const memBytes = await query('sysctl', ['-n', 'hw.memsize']);
  const displays = await query('system_profiler', ['SPDisplaysDataType']);

  const bytes = parsePositiveInt(memBytes);

  return {
    cpu: brand,
    physicalCores: parsePositiveInt(physical),
    logicalCores: parsePositiveInt(logical),
    memoryGb: bytes === null ? null : roundTo(bytes / BYTES_PER_GB, 1),
    gpu: displays === null ? null : parseChipsetModel(displays),
  };
}

async function probeLinux(
  query: Query,
  readTextFile: (path: string) => Promise<string>,
  logger?: Logger
): Promise<CpuFacts> {
  const read = async (path: string): Promise<string | null> => {
    try {
      return await readTextFile(path);
    } catch (error) {
      logger?.debug({ path, error: String(error) }, 'Probe file unreadable');
      return null;
    }
  };

  const cpuinfo = await read('/proc/cpuinfo');
  const meminfo = await read('/proc/meminfo');
  const nproc = await query('nproc', []);
  const nvidia = await query('nvidia-smi', ['--query-gpu=name', '--format=csv,noheader']);

  const cpuFacts = cpuinfo === null ? { model: null, physicalCores: null } : parseCpuInfo(cpuinfo);

  return {
    cpu: cpuFacts.model,
    physicalCores: cpuFacts.physicalCores,
    logicalCores: parsePositiveInt(nproc),
    memoryGb: meminfo === null ? null : parseMemInfoGb(meminfo),
    gpu: nvidia === null ? null : nvidia.split(/\r?\n/)[0].trim() || null,
  };
}

/**
 * Read the CPU model and physical core count from /proc/cpuinfo.
 *
 * Physical cores are the distinct (physical id, core id) pairs; null when
 * the kernel does not report them.
 */
export function parseCpuInfo(text: string): { model: string | null; physicalCores: number | null } {
  let model: string | null = null;
  const cores = new Set<string>();
  let physicalId = '0';

  for (const line of text.split(/\r?\n/)) {
    const separator = line.indexOf(':');
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    if (key === 'model name' && model === null && value.length > 0) {
      model = value;
    } else if (key === 'physical id') {
      physicalId = value;
    } else if (key === 'core id') {
      cores.add(`${physicalId}:${value}`);
    }
  }

  return { model, physicalCores: cores.size > 0 ? cores.size : null };
}

/**
 * Total memory in GB (one decimal) from /proc/meminfo's MemTotal line
 */
export function parseMemInfoGb(text: string): number | null {
  const match = text.match(/^MemTotal:\s+(\d+)\s*kB/m);
  if (!match) {
    return null;
  }
  return roundTo(Number.parseInt(match[1], 10) / KB_PER_GB, 1);
}

/**
 * GPU name from `system_profiler SPDisplaysDataType`
 */
export function parseChipsetModel(text: string): string | null {
  const match = text.match(/^\s*Chipset Model:\s*(.+)$/m);
  return match ? match[1].trim() : null;
}

/**
 * Version from `ollama --version`, which may be preceded by warnings:
 *
 * ```
 * Warning: could not connect to a running Ollama instance
 * Warning: client version is 0.5.7
 * ```
 */
export function parseRuntimeVersion(text: string): string | null {
  const line = text
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .find((entry) => /version/i.test(entry));
  if (!line) {
    return null;
  }
  const tokens = line.split(/\s+/);
  return tokens[tokens.length - 1];
}

function parsePositiveInt(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function safeCall<T>(fn: () => T, fallback: T, logger?: Logger): T {
  try {
    return fn();
  } catch (error) {
    logger?.debug({ error: String(error) }, 'Host query failed');
    return fallback;
  }
}

function readUtf8(path: string): Promise<string> {
  return readFile(path, 'utf8');
}
