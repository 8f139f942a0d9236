/**
 * Runtime Process Table Parser
 *
 * Parses the column-aligned listing printed by `ollama ps`:
 *
 * ```
 * NAME            ID              SIZE      PROCESSOR    CONTEXT    UNTIL
 * mistral:7b      6577803aa9a0    5.1 GB    100% GPU     4096       24 hours from now
 * ```
 *
 * Cells may contain spaces ("5.1 GB", "100% GPU"), so rows are sliced at
 * the header's column offsets instead of being split on whitespace. Tables
 * without a PROCESSOR header fall back to whitespace tokens.
 */

import type { Logger } from 'pino';
import { lazyLog } from '../utils/logger-helpers.js';

export const PROCESSOR_COLUMN = 'PROCESSOR';
export const CONTEXT_COLUMN = 'CONTEXT';

/**
 * Token index of the processor cell in legacy tables (NAME ID SIZE PROCESSOR)
 */
export const FALLBACK_PROCESSOR_INDEX = 3;

/**
 * How processor values are pulled out of data rows
 */
export type ParseStrategy =
  | {
      kind: 'columns';
      processorStart: number;
      /** Start of the column after PROCESSOR, null when it is the last column */
      contextStart: number | null;
    }
  | {
      kind: 'whitespace';
      index: number;
    };

export interface ProcessTableRow {
  /** 1-based line number in the command output */
  line: number;
  model: string;
  processor: string;
}

/**
 * A data row that could not be parsed. Collected, never thrown.
 */
export interface ProcessTableIssue {
  line: number;
  reason: string;
  raw: string;
}

export interface ProcessTable {
  /** Null when the output had no header line at all */
  strategy: ParseStrategy | null;
  rows: ProcessTableRow[];
  issues: ProcessTableIssue[];
}

export type ProcessorKind = 'gpu' | 'cpu' | 'unknown';

export interface ProcessorUsage {
  gpuInUse: boolean;
  /** Processor split of the row that decided the usage, null without rows */
  gpuLayers: string | null;
}

/**
 * Choose the parse strategy from the header line
 */
export function selectParseStrategy(header: string): ParseStrategy {
  const processorStart = header.indexOf(PROCESSOR_COLUMN);
  if (processorStart < 0) {
    return { kind: 'whitespace', index: FALLBACK_PROCESSOR_INDEX };
  }

  const contextStart = header.indexOf(CONTEXT_COLUMN, processorStart + PROCESSOR_COLUMN.length);
  return {
    kind: 'columns',
    processorStart,
    contextStart: contextStart >= 0 ? contextStart : null,
  };
}

/**
 * Pull the processor value out of one data row.
 *
 * @throws Error when the row does not reach the processor column
 */
export function extractProcessor(row: string, strategy: ParseStrategy): string {
  switch (strategy.kind) {
    case 'columns': {
      if (row.length <= strategy.processorStart) {
        throw new Error(`row ends before ${PROCESSOR_COLUMN} column (offset ${strategy.processorStart})`);
      }
      const end = strategy.contextStart ?? row.length;
      const value = row.slice(strategy.processorStart, end).trim();
      if (value.length === 0) {
        throw new Error(`empty ${PROCESSOR_COLUMN} cell`);
      }
      return value;
    }
    case 'whitespace': {
      const tokens = row.trim().split(/\s+/);
      const value = tokens[strategy.index];
      if (value === undefined) {
        throw new Error(`expected at least ${strategy.index + 1} fields, found ${tokens.length}`);
      }
      return value;
    }
  }
}

/**
 * Parse `ollama ps` output. Malformed rows are reported in `issues` and
 * skipped; they never stop the remaining rows from being read.
 */
export function parseProcessTable(text: string, logger?: Logger): ProcessTable {
  const lines = text.split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => line.trim().length > 0);

  if (headerIndex < 0) {
    return { strategy: null, rows: [], issues: [] };
  }

  const strategy = selectParseStrategy(lines[headerIndex]);
  const rows: ProcessTableRow[] = [];
  const issues: ProcessTableIssue[] = [];

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const raw = lines[i];
    if (raw.trim().length === 0) {
      continue;
    }

    try {
      rows.push({
        line: i + 1,
        model: raw.trim().split(/\s+/)[0],
        processor: extractProcessor(raw, strategy),
      });
    } catch (error) {
      issues.push({
        line: i + 1,
        reason: error instanceof Error ? error.message : String(error),
        raw,
      });
    }
  }

  lazyLog(
    logger,
    'debug',
    () => ({
      strategy: strategy.kind,
      rows: rows.map((row) => `${row.model}=${row.processor}`),
      issues,
    }),
    'Parsed runtime process table'
  );

  return { strategy, rows, issues };
}

export function classifyProcessor(value: string): ProcessorKind {
  const upper = value.toUpperCase();
  if (upper.includes('GPU')) {
    return 'gpu';
  }
  if (upper.includes('CPU')) {
    return 'cpu';
  }
  return 'unknown';
}

/**
 * Reduce the parsed rows to a single usage reading.
 *
 * Any row on the GPU marks the GPU in use, and the last such row's split
 * is reported. Without a GPU row, the last CPU row's split is reported.
 */
export function summarizeProcessorUsage(table: ProcessTable): ProcessorUsage {
  let gpuLayers: string | null = null;
  let cpuLayers: string | null = null;

  for (const row of table.rows) {
    const kind = classifyProcessor(row.processor);
    if (kind === 'gpu') {
      gpuLayers = row.processor;
    } else if (kind === 'cpu') {
      cpuLayers = row.processor;
    }
  }

  if (gpuLayers !== null) {
    return { gpuInUse: true, gpuLayers };
  }
  return { gpuInUse: false, gpuLayers: cpuLayers };
}
