/**
 * Command-line argument parsing for the benchmark launcher
 */

import { HarnessError } from '../api/errors.js';
import type { ReportFormat } from '../types/benchmark.js';
import { MAX_TIMER_DELAY_MS } from '../utils/timer-guard.js';

const MAX_TIMEOUT_S = Math.floor(MAX_TIMER_DELAY_MS / 1000);

export interface CliArgs {
  models: string[];
  output?: string;
  /** Per-model timeout in seconds */
  timeoutS?: number;
  format?: ReportFormat;
  config?: string;
  help: boolean;
}

export const USAGE = `
ollama-bench - Benchmark local Ollama models

Usage:
  ollama-bench [options] [model ...]

Options:
  -m, --model NAME     Model to benchmark (repeatable; default: all installed)
  -o, --output PATH    Report path (default: ollama_benchmark_report.md)
  -t, --timeout SECS   Per-model timeout in seconds (default: 300)
  --format FORMAT      Report format: markdown or json (default: markdown)
  --config PATH        YAML configuration file (default: config/harness.yaml)
  -h, --help           Show this help message

Examples:
  # Benchmark every installed model
  ollama-bench

  # Benchmark two models with a 2 minute timeout
  ollama-bench -m llama3:8b -m mistral:7b -t 120
`;

function isReportFormat(value: string): value is ReportFormat {
  return value === 'markdown' || value === 'json';
}

/**
 * @throws HarnessError InvalidArgument on unknown flags or bad values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { models: [], help: false };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new HarnessError('InvalidArgument', `Option ${flag} requires a value`, { flag });
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '-m':
      case '--model':
        args.models.push(valueOf(arg, i));
        i++;
        break;
      case '-o':
      case '--output':
        args.output = valueOf(arg, i);
        i++;
        break;
      case '-t':
      case '--timeout': {
        const raw = valueOf(arg, i);
        const seconds = Number(raw);
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new HarnessError('InvalidArgument', `Timeout must be a positive number of seconds: ${raw}`, {
            flag: arg,
          });
        }
        if (seconds > MAX_TIMEOUT_S) {
          throw new HarnessError('InvalidArgument', `Timeout must be at most ${MAX_TIMEOUT_S} seconds: ${raw}`, {
            flag: arg,
          });
        }
        args.timeoutS = seconds;
        i++;
        break;
      }
      case '--format': {
        const format = valueOf(arg, i);
        if (!isReportFormat(format)) {
          throw new HarnessError('InvalidArgument', `Unknown report format: ${format}`, { flag: arg });
        }
        args.format = format;
        i++;
        break;
      }
      case '--config':
        args.config = valueOf(arg, i);
        i++;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new HarnessError('InvalidArgument', `Unknown option: ${arg}`, { flag: arg });
        }
        args.models.push(arg);
    }
  }

  return args;
}
