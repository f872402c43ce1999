/**
 * Centralized pino logger factory.
 *
 * Singleton root logger with a pino-roll transport for rotation and
 * retention. Level labels are upper-cased and timestamps are ISO strings.
 * Subsystems log through child loggers (getLogger('store')).
 *
 * stdout belongs to command output, so diagnostics go to the rolled file,
 * or to stderr before initLogger has run.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;

/**
 * Convert bytes to the size notation pino-roll accepts ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param workspaceDir - Absolute path to the workspace directory
 * @param config       - Logging section of the resolved configuration
 */
export function initLogger(workspaceDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(workspaceDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: { count: config.maxFiles },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr logger at 'warn' so
 * library callers and tests never need to initialize anything.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: process.env['PLOTLINE_LOG_LEVEL'] ?? 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Flush and drop the root logger. */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
