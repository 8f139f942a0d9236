/**
 * Harness error utilities.
 *
 * Provides a consistent error type for every failure the harness can
 * surface, plus helpers to turn arbitrary thrown values into it.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 *
 * Per-model codes (Timeout, RuntimeExecutionError) end up inside a
 * BenchmarkResult; EnvironmentError is fatal only for model enumeration;
 * ReportWriteError and ConfigError always end the run.
 */
export type HarnessErrorCode =
  | 'EnvironmentError'
  | 'Timeout'
  | 'RuntimeExecutionError'
  | 'ReportWriteError'
  | 'ConfigError'
  | 'InvalidArgument';

/**
 * Plain shape of a harness error (for JSON output and logging)
 */
export interface HarnessErrorShape {
  code: HarnessErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class HarnessError extends Error implements HarnessErrorShape {
  public readonly code: HarnessErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.details = details;
  }

  public toObject(): HarnessErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map unknown errors into HarnessError instances.
 *
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toHarnessError(
  error: unknown,
  fallbackCode: HarnessErrorCode = 'RuntimeExecutionError'
): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }

  if (error instanceof Error) {
    const errno = errnoCode(error);
    if (errno === 'ENOENT') {
      return new HarnessError('EnvironmentError', error.message, { errno });
    }

    if (/timed? ?out/i.test(error.message)) {
      return new HarnessError('Timeout', error.message);
    }

    return new HarnessError(fallbackCode, error.message);
  }

  return new HarnessError(fallbackCode, typeof error === 'string' ? error : 'Unknown harness error');
}

/**
 * Convert a zod validation error into a ConfigError listing every field.
 *
 * @example
 * ```typescript
 * const parsed = HarnessConfigSchema.safeParse(raw);
 * if (!parsed.success) {
 *   throw zodErrorToHarnessError(parsed.error);
 * }
 * // Throws: "Configuration validation failed:\nbenchmark.timeout_ms must be positive"
 * ```
 */
export function zodErrorToHarnessError(error: ZodError): HarnessError {
  const lines = error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });

  return new HarnessError('ConfigError', `Configuration validation failed:\n${lines.join('\n')}`, {
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
