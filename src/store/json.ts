/**
 * JSON reads with schema validation.
 * Used for the JSON store documents and config.json.
 */

import type { z } from 'zod';
import { safeReadFile } from './atomic.js';
import { StmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist. Unparseable content fails with
 * `code`: STORAGE_ERROR for store documents unless the caller says otherwise.
 */
export async function readJson(filePath: string, code: ExitCode = ExitCode.STORAGE_ERROR): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new StmError(code, `Invalid JSON in: ${filePath}`, { cause: err });
  }
}

/**
 * Read a JSON file and validate it against a schema.
 * Returns `fallback` if the file does not exist.
 */
export async function readJsonDocument<T, I>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, I>,
  fallback: () => T,
): Promise<T> {
  const raw = await readJson(filePath);
  if (raw === null) return fallback();

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new StmError(
      ExitCode.STORAGE_ERROR,
      `Malformed data file: ${filePath}`,
      { cause: result.error, fix: 'Restore the file from a backup or remove it to start empty' },
    );
  }
  return result.data;
}
