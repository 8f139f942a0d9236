#!/usr/bin/env node

/**
 * Ollama Benchmark CLI
 *
 * Benchmarks installed models one at a time and writes a report.
 *
 * Usage:
 *   ollama-bench                           # All installed models
 *   ollama-bench llama3:8b mistral:7b      # Selected models
 *   ollama-bench -t 120 -o report.md       # Custom timeout and output
 */

import { HarnessError, toHarnessError } from '../api/errors.js';
import { SpawnCommandRunner } from '../bridge/command-runner.js';
import { loadConfig, toHarnessOptions } from '../config/loader.js';
import { describeGpuUsage } from '../core/gpu-detector.js';
import { runBenchmark } from '../core/run.js';
import { formatConsoleSummary } from '../report/markdown-report.js';
import { createLogger } from '../utils/logger.js';
import { USAGE, parseCliArgs } from './args.js';
import { installShutdownHandlers } from './signals.js';

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(args.config);
  const options = toHarnessOptions(config);
  const logger = createLogger({ level: config.logging.level });
  const runner = new SpawnCommandRunner({ logger });

  installShutdownHandlers({ runner, logger });

  console.log('Ollama Model Benchmark Tool');
  console.log('='.repeat(60));

  const { outputPath, outcome } = await runBenchmark(
    {
      ...options,
      models: args.models,
      timeoutMs: args.timeoutS !== undefined ? args.timeoutS * 1000 : options.timeoutMs,
      outputPath: args.output ?? options.outputPath,
      format: args.format ?? options.format,
    },
    {
      runner,
      logger,
      onSweep: (sweep) => {
        sweep.on('machine', (machine) => {
          console.log(`Machine: ${machine.os} ${machine.arch}, ${machine.cpu}`);
          console.log(`Ollama: ${machine.runtimeVersion}`);
        });
        sweep.on('gpu', (phase, status) => {
          console.log(`GPU (${phase}): ${describeGpuUsage(status)} [${status.backend}, ${status.gpuLayers}]`);
        });
        sweep.on('model:start', (model, index, total) => {
          console.log(`\n[${index + 1}/${total}] Benchmarking ${model}...`);
        });
        sweep.on('model:complete', (result) => {
          if (result.status === 'success') {
            console.log(
              `  First token: ${result.firstTokenLatencyMs}ms, ` +
                `${result.tokensPerSecond} tokens/sec, total ${result.totalTimeS}s`
            );
          } else {
            console.log(`  ${result.status}: ${result.error}`);
          }
        });
      },
    }
  );

  console.log('\n' + '='.repeat(60));
  for (const line of formatConsoleSummary(outcome.results)) {
    console.log(line);
  }
  console.log(`Report saved to: ${outputPath}`);

  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const harnessError = toHarnessError(error);
    console.error(`\nError: ${harnessError.message}`);
    if (error instanceof HarnessError && error.code === 'InvalidArgument') {
      console.error(USAGE);
    }
    process.exitCode = 1;
  });
