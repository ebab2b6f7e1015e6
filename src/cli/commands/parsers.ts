/**
 * Commander argument parsers shared by the commands.
 */

import { InvalidArgumentError } from 'commander';
import { parseEnvValue } from '../../core/config.js';

/** Parse an integer option value. */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/** Parse a comma-separated list, dropping empty entries. */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Collect repeated `--param key=value` options into one object.
 * Values are typed the way environment values are (booleans, numbers).
 */
export function collectParam(value: string, previous: Record<string, unknown> = {}): Record<string, unknown> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError('Expected key=value.');
  }
  return { ...previous, [value.slice(0, eq).trim()]: parseEnvValue(value.slice(eq + 1)) };
}
