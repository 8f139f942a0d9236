import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import {
  NO_GPU_BACKEND,
  NO_GPU_LAYERS,
  RUNTIME_REPORTED_BACKEND,
  checkGpuCapability,
  checkGpuUsage,
  describeGpuUsage,
  detectGpuStatus,
  reconcileGpuStatus,
} from '../../../src/core/gpu-detector.js';
import type { GpuStatus } from '../../../src/types/benchmark.js';
import { FakeCommandRunner, completed, timedOut } from '../../helpers/fake-command-runner.js';

const logger = pino({ level: 'silent' });

const PS_HEADER = 'NAME            ID              SIZE      PROCESSOR          CONTEXT    UNTIL';
const PS_GPU_ROW = 'mistral:7b      6577803aa9a0    5.1 GB    100% GPU           4096       4 minutes from now';
const PS_CPU_ROW = 'phi3:mini       4f2222927938    3.0 GB    100% CPU           2048       4 minutes from now';

function status(overrides: Partial<GpuStatus>): GpuStatus {
  return { gpuAvailable: true, gpuInUse: false, gpuLayers: NO_GPU_LAYERS, backend: 'AMD ROCm', ...overrides };
}

describe('checkGpuCapability', () => {
  it('reports Metal on Apple Silicon without running commands', async () => {
    const runner = new FakeCommandRunner();
    const capability = await checkGpuCapability({ runner, platform: 'darwin', arch: 'arm64' });

    expect(capability).toEqual({ gpuAvailable: true, backend: 'Apple Silicon (Metal)' });
    expect(runner.calls).toHaveLength(0);
  });

  it('checks system_profiler on Intel Macs', async () => {
    const runner = new FakeCommandRunner().on(
      'system_profiler SPDisplaysDataType',
      completed('Graphics/Displays:\n    Metal Support: Metal 3\n')
    );
    const capability = await checkGpuCapability({ runner, platform: 'darwin', arch: 'x64' });
    expect(capability).toEqual({ gpuAvailable: true, backend: 'Metal supported' });
  });

  it('reports NVIDIA with the nvidia-smi description on Linux', async () => {
    const runner = new FakeCommandRunner().on('nvidia-smi', completed('NVIDIA GeForce RTX 4090, 24564 MiB\n'));
    const capability = await checkGpuCapability({ runner, platform: 'linux', arch: 'x64', logger });

    expect(capability).toEqual({ gpuAvailable: true, backend: 'NVIDIA: NVIDIA GeForce RTX 4090, 24564 MiB' });
    expect(runner.lines()).toEqual(['nvidia-smi --query-gpu=name,memory.total --format=csv,noheader']);
  });

  it('falls back to rocm-smi when nvidia-smi is missing', async () => {
    const runner = new FakeCommandRunner().on('rocm-smi', completed('GPU[0] : Card series: Radeon\n'));
    const capability = await checkGpuCapability({ runner, platform: 'linux', arch: 'x64', logger });

    expect(capability).toEqual({ gpuAvailable: true, backend: 'AMD ROCm' });
    expect(runner.lines()).toEqual([
      'nvidia-smi --query-gpu=name,memory.total --format=csv,noheader',
      'rocm-smi --showproductname',
    ]);
  });

  it('reports no GPU when every tool fails', async () => {
    const runner = new FakeCommandRunner()
      .on('nvidia-smi', completed('', 9, 'NVIDIA-SMI has failed'))
      .on('rocm-smi', timedOut());
    const capability = await checkGpuCapability({ runner, platform: 'linux', arch: 'x64', logger });
    expect(capability).toEqual({ gpuAvailable: false, backend: NO_GPU_BACKEND });
  });

  it('treats a throwing runner as no GPU', async () => {
    const runner = new FakeCommandRunner().on('nvidia-smi', new Error('boom')).on('rocm-smi', new Error('boom'));
    const capability = await checkGpuCapability({ runner, platform: 'linux', arch: 'x64', logger });
    expect(capability.gpuAvailable).toBe(false);
  });

  it('reports no GPU on other platforms', async () => {
    const runner = new FakeCommandRunner();
    expect(await checkGpuCapability({ runner, platform: 'win32', arch: 'x64' })).toEqual({
      gpuAvailable: false,
      backend: NO_GPU_BACKEND,
    });
  });

  it('passes the probe timeout to every query', async () => {
    const runner = new FakeCommandRunner();
    await checkGpuCapability({ runner, platform: 'linux', arch: 'x64', probeTimeoutMs: 1234 });
    expect(runner.calls.map((call) => call.options.timeoutMs)).toEqual([1234, 1234]);
  });
});

describe('checkGpuUsage', () => {
  const capability = { gpuAvailable: true, backend: 'AMD ROCm' };

  it('marks the GPU in use when a loaded model runs on it', async () => {
    const runner = new FakeCommandRunner().on('ollama ps', completed(`${PS_HEADER}\n${PS_GPU_ROW}\n`));
    expect(await checkGpuUsage({ runner, logger }, capability)).toEqual({
      gpuAvailable: true,
      gpuInUse: true,
      gpuLayers: '100% GPU',
      backend: 'AMD ROCm',
    });
  });

  it('reports the CPU split without marking GPU use', async () => {
    const runner = new FakeCommandRunner().on('ollama ps', completed(`${PS_HEADER}\n${PS_CPU_ROW}\n`));
    expect(await checkGpuUsage({ runner }, capability)).toEqual({
      gpuAvailable: true,
      gpuInUse: false,
      gpuLayers: '100% CPU',
      backend: 'AMD ROCm',
    });
  });

  it('reports idle when no model is loaded', async () => {
    const runner = new FakeCommandRunner().on('ollama ps', completed(`${PS_HEADER}\n`));
    expect(await checkGpuUsage({ runner }, capability)).toEqual(status({}));
  });

  it('keeps the capability values when ollama ps fails', async () => {
    const runner = new FakeCommandRunner().on('ollama ps', completed('', 1, 'could not connect to ollama app'));
    expect(await checkGpuUsage({ runner, logger }, capability)).toEqual(status({}));
  });

  it('keeps the capability values when ollama ps is missing', async () => {
    const runner = new FakeCommandRunner();
    const result = await checkGpuUsage({ runner }, { gpuAvailable: false, backend: NO_GPU_BACKEND });
    expect(result).toEqual({ gpuAvailable: false, gpuInUse: false, gpuLayers: NO_GPU_LAYERS, backend: NO_GPU_BACKEND });
  });

  it('marks the GPU available when the runtime uses one no vendor tool found', async () => {
    const runner = new FakeCommandRunner().on('ollama ps', completed(`${PS_HEADER}\n${PS_GPU_ROW}\n`));
    const result = await checkGpuUsage({ runner }, { gpuAvailable: false, backend: NO_GPU_BACKEND });
    expect(result).toEqual({
      gpuAvailable: true,
      gpuInUse: true,
      gpuLayers: '100% GPU',
      backend: RUNTIME_REPORTED_BACKEND,
    });
  });

  it('uses the configured runtime command', async () => {
    const runner = new FakeCommandRunner().on('/opt/ollama/bin/ollama ps', completed(`${PS_HEADER}\n`));
    await checkGpuUsage({ runner, runtimeCommand: '/opt/ollama/bin/ollama', psTimeoutMs: 777 }, capability);
    expect(runner.calls[0]).toEqual({
      command: '/opt/ollama/bin/ollama',
      args: ['ps'],
      options: { timeoutMs: 777 },
    });
  });

  it('reads tables without a PROCESSOR header by whitespace tokens', async () => {
    const legacy = ['NAME         ID              SIZE     UNTIL', 'llama3:8b    365c0bd3c000    4.7GB    GPU', 'phi3'].join(
      '\n'
    );
    const runner = new FakeCommandRunner().on('ollama ps', completed(`${legacy}\n`));

    expect(await checkGpuUsage({ runner, logger }, capability)).toEqual({
      gpuAvailable: true,
      gpuInUse: true,
      gpuLayers: 'GPU',
      backend: 'AMD ROCm',
    });
  });

  it('ignores malformed rows', async () => {
    const runner = new FakeCommandRunner().on('ollama ps', completed(`${PS_HEADER}\ngarbage\n${PS_GPU_ROW}\n`));
    const result = await checkGpuUsage({ runner, logger }, capability);
    expect(result.gpuInUse).toBe(true);
  });
});

describe('detectGpuStatus', () => {
  it('runs the capability check then the usage check', async () => {
    const runner = new FakeCommandRunner()
      .on('nvidia-smi', completed('NVIDIA L4, 23034 MiB'))
      .on('ollama ps', completed(`${PS_HEADER}\n${PS_GPU_ROW}\n`));

    const result = await detectGpuStatus({ runner, platform: 'linux', arch: 'x64' });

    expect(result).toEqual({
      gpuAvailable: true,
      gpuInUse: true,
      gpuLayers: '100% GPU',
      backend: 'NVIDIA: NVIDIA L4, 23034 MiB',
    });
    expect(runner.lines()).toEqual([
      'nvidia-smi --query-gpu=name,memory.total --format=csv,noheader',
      'ollama ps',
    ]);
  });
});

describe('reconcileGpuStatus', () => {
  const idle = status({});
  const busy = status({ gpuInUse: true, gpuLayers: '100% GPU' });

  it('takes a later in-use reading over an earlier idle one', () => {
    expect(reconcileGpuStatus(idle, busy)).toBe(busy);
  });

  it('never lets a later idle reading override an earlier in-use one', () => {
    expect(reconcileGpuStatus(busy, idle)).toBe(busy);
  });

  it('takes the later reading when both are in use', () => {
    const later = status({ gpuInUse: true, gpuLayers: '48%/52% CPU/GPU' });
    expect(reconcileGpuStatus(busy, later)).toBe(later);
  });

  it('takes the later reading when both are idle', () => {
    const later = status({ gpuLayers: '100% CPU' });
    expect(reconcileGpuStatus(idle, later)).toBe(later);
  });
});

describe('describeGpuUsage', () => {
  it('labels each state', () => {
    expect(describeGpuUsage(status({ gpuInUse: true }))).toBe('Yes');
    expect(describeGpuUsage(status({}))).toBe('Available but not used');
    expect(describeGpuUsage(status({ gpuAvailable: false, backend: NO_GPU_BACKEND }))).toBe('No');
  });
});
