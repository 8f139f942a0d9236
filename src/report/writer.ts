import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { HarnessError, errnoCode } from '../api/errors.js';

/**
 * Write rendered report content, creating parent directories.
 * Overwrites any existing file.
 *
 * @returns The absolute path written
 * @throws HarnessError ReportWriteError
 */
export async function writeReport(outputPath: string, content: string): Promise<string> {
  const target = resolve(outputPath);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new HarnessError('ReportWriteError', `Failed to write report to ${target}: ${message}`, {
      path: target,
      errno: errnoCode(error),
    });
  }
  return target;
}
