/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > Project config > Defaults
 *
 * The core never calls loadConfig itself: front-ends load the config once at
 * startup and hand the Orchestrator the explicit value from
 * resolveOrchestratorOptions().
 */

import { z } from 'zod';
import type { AppConfig, ResolvedValue } from '../types/config.js';
import type { OrchestratorOptions } from './orchestrator.js';
import { readJson } from '../store/json.js';
import { getConfigPath, getDataDirAbsolute } from './paths.js';
import { StmError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: AppConfig = {
  storage: {
    engine: 'sqlite',
  },
  logging: {
    level: 'info',
    filePath: 'logs/stm.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  auth: {
    secret: 'change-me',
    tokenTtlMinutes: 1440,
  },
  api: {
    host: '127.0.0.1',
    port: 8000,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  STM_STORAGE_ENGINE: 'storage.engine',
  STM_LOG_LEVEL: 'logging.level',
  STM_LOG_FILE: 'logging.filePath',
  STM_AUTH_SECRET: 'auth.secret',
  STM_AUTH_TOKEN_TTL_MINUTES: 'auth.tokenTtlMinutes',
  STM_API_HOST: 'api.host',
  STM_API_PORT: 'api.port',
};

const appConfigSchema = z.object({
  storage: z.object({
    engine: z.string().trim().min(1),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  auth: z.object({
    secret: z.coerce.string().min(1),
    tokenTtlMinutes: z.number().positive(),
  }),
  api: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }),
}) satisfies z.ZodType<AppConfig>;

/** Narrow an unknown value to a plain object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/** Deep copy of the defaults, for merging and for tests. */
export function getDefaultConfig(): AppConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<AppConfig> {
  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  // Layer 1: Project config
  const projectConfig = await readJson(getConfigPath(getDataDirAbsolute(cwd)), ExitCode.CONFIG_ERROR);
  if (isRecord(projectConfig)) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 2: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : 'config';
    throw new StmError(ExitCode.CONFIG_ERROR, `Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`, {
      fix: `Check ${getConfigPath(getDataDirAbsolute(cwd))} and the STM_* environment variables`,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const projectConfig = await readJson(getConfigPath(getDataDirAbsolute(cwd)), ExitCode.CONFIG_ERROR);
  if (isRecord(projectConfig)) {
    const val = getNestedValue(projectConfig, path);
    if (val !== undefined) {
      return { value: val, source: 'project' };
    }
  }

  return { value: getNestedValue({ ...getDefaultConfig() }, path), source: 'default' };
}

/**
 * Turn a loaded config into the explicit value the Orchestrator is built from.
 * `engine` overrides the configured storage engine (the CLI's --engine flag);
 * the Orchestrator rejects engines no factory is registered for.
 */
export function resolveOrchestratorOptions(
  config: AppConfig,
  cwd?: string,
  engine?: string,
): OrchestratorOptions {
  return {
    storage: {
      engine: engine ?? config.storage.engine,
      dataDir: getDataDirAbsolute(cwd),
    },
  };
}
