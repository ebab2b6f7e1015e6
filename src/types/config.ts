/**
 * Configuration type definitions.
 * Resolution: defaults < project config file < environment variables.
 */

/** Engines registered out of the box. */
export const BUILTIN_ENGINES = ['sqlite', 'json'] as const;

/** Name of a registered storage engine; the built-in ones are listed above. */
export type StorageEngine = string;

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Storage configuration. */
export interface StorageConfig {
  engine: StorageEngine;
}

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/stm.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Token issuance settings for the REST API. */
export interface AuthConfig {
  secret: string;
  tokenTtlMinutes: number;
}

/** REST API listener settings. */
export interface ApiConfig {
  host: string;
  port: number;
}

/** Project configuration (config.json). */
export interface AppConfig {
  storage: StorageConfig;
  logging: LoggingConfig;
  auth: AuthConfig;
  api: ApiConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'cli' | 'env' | 'project' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
