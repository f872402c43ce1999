/**
 * Session naming and per-session statistics.
 */

import type { LogCollection } from './collection.js';

/**
 * Session tag of the form `<prefix>_<YYYYMMDDTHHMMSS>` in UTC,
 * e.g. `session_20250301T141500`.
 */
export function generateSessionTag(prefix: string = 'session', now: Date = new Date()): string {
  const compact = now.toISOString().replace(/\.\d{3}Z$/, '').replace(/[-:]/g, '');
  return `${prefix}_${compact}`;
}

export interface SessionSummary {
  session: string;
  entries: number;
  first: Date;
  last: Date;
  /** Tag -> number of entries carrying it. */
  tags: Record<string, number>;
}

/** Statistics for one session, or null when it has no entries. */
export function sessionSummary(logs: LogCollection, session: string): SessionSummary | null {
  const entries = logs.bySession(session);
  const [first] = entries;
  const last = entries[entries.length - 1];
  if (!first || !last) return null;

  const tags: Record<string, number> = {};
  for (const entry of entries) {
    for (const tag of entry.tags) tags[tag] = (tags[tag] ?? 0) + 1;
  }
  return { session, entries: entries.length, first: first.timestamp, last: last.timestamp, tags };
}
