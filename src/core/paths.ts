/**
 * Path resolution for the task manager's data directory.
 *
 * Environment variables:
 *   STM_DIR - Data directory (default: .stm), absolute or relative to cwd
 */

import { isAbsolute, join, resolve } from 'node:path';

/** Data directory name used when STM_DIR is unset. */
export const DEFAULT_DATA_DIR = '.stm';

/**
 * Get the data directory as configured (possibly relative).
 */
export function getDataDir(): string {
  return process.env['STM_DIR'] ?? DEFAULT_DATA_DIR;
}

/**
 * Get the absolute path to the data directory.
 */
export function getDataDirAbsolute(cwd?: string): string {
  const dataDir = getDataDir();
  if (isAbsolute(dataDir)) {
    return dataDir;
  }
  return resolve(cwd ?? process.cwd(), dataDir);
}

/** Project config file: `<dataDir>/config.json`. */
export function getConfigPath(dataDir: string): string {
  return join(dataDir, 'config.json');
}

/** JSON backend users document. */
export function getUsersPath(dataDir: string): string {
  return join(dataDir, 'users.json');
}

/** JSON backend tasks document. */
export function getTasksPath(dataDir: string): string {
  return join(dataDir, 'tasks.json');
}

/** Relational backend database file. */
export function getDbPath(dataDir: string): string {
  return join(dataDir, 'stm.db');
}
