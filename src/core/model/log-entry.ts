/**
 * Log entry value helpers.
 */

import type { LogEntry } from '../../types/log.js';

export interface LogEntryInit {
  session: string;
  message: string;
  tags?: Iterable<string>;
  metadata?: Record<string, string>;
  timestamp?: Date;
  occlude?: boolean;
}

export function createLogEntry(init: LogEntryInit): LogEntry {
  return {
    session: init.session,
    timestamp: init.timestamp ?? new Date(),
    message: init.message,
    tags: new Set(init.tags ?? []),
    metadata: { ...init.metadata },
    occlude: init.occlude ?? false,
  };
}

export function withOcclusion(entry: LogEntry, occlude: boolean): LogEntry {
  return { ...entry, tags: new Set(entry.tags), metadata: { ...entry.metadata }, occlude };
}

export function hasAnyTag(entry: LogEntry, tags: Iterable<string>): boolean {
  for (const tag of tags) {
    if (entry.tags.has(tag)) return true;
  }
  return false;
}

export function hasAllTags(entry: LogEntry, tags: Iterable<string>): boolean {
  for (const tag of tags) {
    if (!entry.tags.has(tag)) return false;
  }
  return true;
}

/** Tags in stable (sorted) order. */
export function sortedTags(entry: LogEntry): string[] {
  return [...entry.tags].sort();
}
