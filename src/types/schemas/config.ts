/**
 * Harness Configuration Schemas
 *
 * Zod schemas for validating config/harness.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../../utils/timer-guard.js';

/**
 * A timer delay in milliseconds
 */
const timeoutMs = z
  .number()
  .int()
  .positive('must be positive')
  .max(MAX_TIMER_DELAY_MS, `must be <= ${MAX_TIMER_DELAY_MS}`);

/**
 * Model-serving runtime CLI
 */
export const RuntimeCommandConfigSchema = z.object({
  command: z.string().min(1, 'Runtime command cannot be empty'),
  list_timeout_ms: timeoutMs,
  ps_timeout_ms: timeoutMs,
});

/**
 * Per-model benchmark settings
 */
export const BenchmarkConfigSchema = z.object({
  prompt: z.string().min(1, 'Prompt cannot be empty'),
  timeout_ms: timeoutMs,
  first_token_ratio: z.number().gt(0, 'must be > 0').max(1, 'must be <= 1'),
});

/**
 * Host probe settings
 */
export const ProbeConfigSchema = z.object({
  command_timeout_ms: timeoutMs,
});

export const ReportConfigSchema = z.object({
  output_path: z.string().min(1, 'Output path cannot be empty'),
  format: z.enum(['markdown', 'json']),
  top_n: z.number().int().min(1, 'must be >= 1'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

export const HarnessConfigSchema = z.object({
  runtime: RuntimeCommandConfigSchema,
  benchmark: BenchmarkConfigSchema,
  probe: ProbeConfigSchema,
  report: ReportConfigSchema,
  logging: LoggingConfigSchema,
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

export type HarnessEnvironment = 'production' | 'development' | 'test';
