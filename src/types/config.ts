/**
 * Configuration type definitions.
 * Covers workspace and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showColor: boolean;
}

/** Backup configuration. */
export interface BackupConfig {
  /** Take numbered backups before overwriting workspace files. */
  enabled: boolean;
  /** Numbered backups retained per file. */
  keep: number;
}

/** Storage behaviour. */
export interface StorageConfig {
  /** Abort a load on the first malformed line instead of skipping it. */
  strictParsing: boolean;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the workspace directory (default: 'logs/plotline.log') */
  filePath: string;
  /** Rotate once the active file reaches this many bytes. */
  maxFileSize: number;
  /** Rotated files kept on disk. */
  maxFiles: number;
}

/** Complete configuration. */
export interface PlotlineConfig {
  version: string;
  output: OutputConfig;
  backup: BackupConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'default' | 'global' | 'workspace' | 'env';

/** A resolved config value with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
