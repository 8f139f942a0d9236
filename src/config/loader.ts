/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { HarnessError, errnoCode, zodErrorToHarnessError } from '../api/errors.js';
import { HarnessConfigSchema } from '../types/schemas/config.js';
import type { HarnessConfig, HarnessEnvironment } from '../types/schemas/config.js';
import type { ReportFormat } from '../types/benchmark.js';

export type { HarnessConfig, HarnessEnvironment };

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays and scalars from `source` replace those in `target`.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'harness.yaml');
}

function resolveEnvironment(environment?: HarnessEnvironment): HarnessEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  if (env === 'production' || env === 'test') {
    return env;
  }
  return 'development';
}

/**
 * Load, merge and validate configuration.
 *
 * @throws HarnessError with code ConfigError when the file is missing,
 * is not valid YAML, or fails validation
 */
export function loadConfig(configPath?: string, environment?: HarnessEnvironment): HarnessConfig {
  const finalPath = configPath ?? defaultConfigPath();

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new HarnessError('ConfigError', `Configuration file not found: ${finalPath}`, { path: finalPath });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new HarnessError('ConfigError', `Failed to load configuration: ${message}`, { path: finalPath });
  }

  if (!isPlainObject(raw)) {
    throw new HarnessError('ConfigError', `Configuration root must be a mapping: ${finalPath}`, { path: finalPath });
  }

  const { environments, ...base } = raw;
  let merged: PlainObject = base;

  if (isPlainObject(environments)) {
    const overrides = environments[resolveEnvironment(environment)];
    if (isPlainObject(overrides)) {
      merged = deepMerge(base, overrides);
    }
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel) {
    merged = deepMerge(merged, { logging: { level: logLevel } });
  }

  return validateConfig(merged);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): HarnessConfig {
  const parseResult = HarnessConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw zodErrorToHarnessError(parseResult.error);
  }
  return parseResult.data;
}

/**
 * Runtime options derived from the YAML (snake_case) configuration
 */
export interface HarnessOptions {
  runtimeCommand: string;
  listTimeoutMs: number;
  psTimeoutMs: number;
  probeTimeoutMs: number;
  prompt: string;
  timeoutMs: number;
  firstTokenRatio: number;
  outputPath: string;
  format: ReportFormat;
  topN: number;
}

export function toHarnessOptions(config: HarnessConfig): HarnessOptions {
  return {
    runtimeCommand: config.runtime.command,
    listTimeoutMs: config.runtime.list_timeout_ms,
    psTimeoutMs: config.runtime.ps_timeout_ms,
    probeTimeoutMs: config.probe.command_timeout_ms,
    prompt: config.benchmark.prompt,
    timeoutMs: config.benchmark.timeout_ms,
    firstTokenRatio: config.benchmark.first_token_ratio,
    outputPath: config.report.output_path,
    format: config.report.format,
    topN: config.report.top_n,
  };
}
