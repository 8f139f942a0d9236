/**
 * Benchmark Report Generator
 *
 * Pure rendering of a BenchmarkReport into Markdown or JSON. No I/O.
 */

import { describeGpuUsage } from '../core/gpu-detector.js';
import {
  UNKNOWN,
  isSuccessfulResult,
  type BenchmarkReport,
  type BenchmarkResult,
  type MachineSpec,
  type ReportFormat,
  type SuccessfulBenchmarkResult,
} from '../types/benchmark.js';

export const DEFAULT_TOP_N = 5;

export interface RenderOptions {
  /** Rows in each ranking table (default: 5) */
  topN?: number;
}

export type RankingKey = 'firstTokenLatencyMs' | 'tokensPerSecond';

/**
 * Successful results ordered by `key`, truncated to `limit`.
 * Ties keep their original order.
 */
export function rankResults(
  results: readonly BenchmarkResult[],
  key: RankingKey,
  order: 'asc' | 'desc',
  limit = DEFAULT_TOP_N
): SuccessfulBenchmarkResult[] {
  const direction = order === 'asc' ? 1 : -1;
  return results
    .filter(isSuccessfulResult)
    .sort((a, b) => direction * (a[key] - b[key]))
    .slice(0, Math.max(0, limit));
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Make a value safe inside a Markdown table cell
 */
export function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

function row(cells: readonly string[]): string {
  return `| ${cells.map(escapeCell).join(' | ')} |`;
}

function formatCores(machine: MachineSpec): string {
  if (machine.physicalCores === null && machine.logicalCores === null) {
    return UNKNOWN;
  }
  return `${machine.physicalCores ?? UNKNOWN} physical / ${machine.logicalCores ?? UNKNOWN} logical`;
}

function formatMemory(memoryGb: number | null): string {
  return memoryGb === null ? UNKNOWN : `${memoryGb} GB`;
}

function resultRow(result: BenchmarkResult): string {
  if (isSuccessfulResult(result)) {
    return row([
      result.model,
      result.status,
      String(result.firstTokenLatencyMs),
      String(result.tokensPerSecond),
      String(result.totalTimeS),
      String(result.tokenCount),
    ]);
  }
  return row([result.model, result.status, '-', '-', '-', `Error: ${result.error}`]);
}

export function renderMarkdownReport(report: BenchmarkReport, options: RenderOptions = {}): string {
  const topN = options.topN ?? DEFAULT_TOP_N;
  const { machine, gpu, results } = report;
  const successful = results.filter(isSuccessfulResult).length;
  const lines: string[] = [];

  lines.push('# Ollama Model Benchmark Report', '');
  lines.push(`**Generated:** ${formatTimestamp(report.generatedAt)}`, '');
  lines.push(`**Prompt:** ${report.prompt}`, '');

  lines.push('## Machine Specifications', '');
  lines.push('| Spec | Value |');
  lines.push('|------|-------|');
  lines.push(row(['**OS**', `${machine.os} ${machine.osRelease}`.trim()]));
  lines.push(row(['**CPU**', machine.cpu]));
  lines.push(row(['**CPU Cores**', formatCores(machine)]));
  lines.push(row(['**Memory**', formatMemory(machine.memoryGb)]));
  lines.push(row(['**GPU**', machine.gpu]));
  lines.push(row(['**Architecture**', machine.arch]));
  lines.push(row(['**Ollama Version**', machine.runtimeVersion]));
  lines.push(row(['**Node.js Version**', machine.nodeVersion]));
  lines.push('');

  lines.push('## Ollama GPU Status', '');
  lines.push('| Property | Value |');
  lines.push('|----------|-------|');
  lines.push(row(['**GPU Available**', gpu.gpuAvailable ? 'Yes' : 'No']));
  lines.push(row(['**GPU Backend**', gpu.backend]));
  lines.push(row(['**Ollama Using GPU**', describeGpuUsage(gpu)]));
  lines.push(row(['**GPU/CPU Split**', gpu.gpuLayers]));
  lines.push('');

  lines.push('## Summary', '');
  lines.push(`- **Total Models Benchmarked:** ${results.length}`);
  lines.push(`- **Successful:** ${successful}`);
  lines.push(`- **Failed:** ${results.length - successful}`);
  lines.push('');

  lines.push('## Benchmark Results', '');
  lines.push('| Model | Status | First Token (ms) | Tokens/Second | Total Time (s) | Token Count |');
  lines.push('|-------|--------|------------------|---------------|----------------|-------------|');
  for (const result of results) {
    lines.push(resultRow(result));
  }
  lines.push('');

  lines.push(`## Fastest by First Token Latency (Top ${topN})`, '');
  lines.push('| Model | First Token (ms) |');
  lines.push('|-------|------------------|');
  for (const result of rankResults(results, 'firstTokenLatencyMs', 'asc', topN)) {
    lines.push(row([result.model, String(result.firstTokenLatencyMs)]));
  }
  lines.push('');

  lines.push(`## Fastest by Throughput (Top ${topN})`, '');
  lines.push('| Model | Tokens/Second |');
  lines.push('|-------|---------------|');
  for (const result of rankResults(results, 'tokensPerSecond', 'desc', topN)) {
    lines.push(row([result.model, String(result.tokensPerSecond)]));
  }
  lines.push('');

  lines.push('## Notes', '');
  lines.push('- **First Token (ms):** Estimated time to first token (milliseconds), derived from the total call time');
  lines.push('- **Tokens/Second:** Throughput in tokens per second');
  lines.push('- **Total Time (s):** Total benchmark time in seconds');
  lines.push('- **Token Count:** Number of whitespace-delimited tokens in the response');
  lines.push('');

  return lines.join('\n');
}

export function renderJsonReport(report: BenchmarkReport): string {
  return JSON.stringify(report, null, 2) + '\n';
}

/**
 * Render a report in the requested format
 */
export function renderReport(report: BenchmarkReport, format: ReportFormat, options: RenderOptions = {}): string {
  switch (format) {
    case 'markdown':
      return renderMarkdownReport(report, options);
    case 'json':
      return renderJsonReport(report);
  }
}

/**
 * End-of-run summary lines for the console
 */
export function formatConsoleSummary(results: readonly BenchmarkResult[]): string[] {
  const successful = results.filter(isSuccessfulResult);
  const lines = [`Successfully benchmarked: ${successful.length}/${results.length} models`];

  const [fastestLatency] = rankResults(results, 'firstTokenLatencyMs', 'asc', 1);
  const [fastestThroughput] = rankResults(results, 'tokensPerSecond', 'desc', 1);
  if (fastestLatency) {
    lines.push(`Fastest first token: ${fastestLatency.model} (${fastestLatency.firstTokenLatencyMs}ms)`);
  }
  if (fastestThroughput) {
    lines.push(`Highest throughput: ${fastestThroughput.model} (${fastestThroughput.tokensPerSecond} tokens/sec)`);
  }

  return lines;
}
