/**
 * Ordered collection of log entries with query helpers.
 * Entries are kept sorted by timestamp; equal timestamps keep insertion order.
 */

import type { LogEntry } from '../../types/log.js';
import { createLogEntry, hasAllTags, hasAnyTag } from '../model/log-entry.js';

export class LogCollection implements Iterable<LogEntry> {
  private readonly entries: LogEntry[] = [];

  constructor(entries: Iterable<LogEntry> = []) {
    this.addAll(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<LogEntry> {
    return this.entries[Symbol.iterator]();
  }

  all(): LogEntry[] {
    return [...this.entries];
  }

  add(entry: LogEntry): void {
    const time = entry.timestamp.getTime();
    let at = this.entries.length;
    while (at > 0 && this.entries[at - 1].timestamp.getTime() > time) at--;
    this.entries.splice(at, 0, entry);
  }

  addAll(entries: Iterable<LogEntry>): void {
    for (const entry of entries) this.add(entry);
  }

  /** Build an entry stamped now (unless given a timestamp), add it and return it. */
  create(
    session: string,
    message: string,
    options: { tags?: Iterable<string>; metadata?: Record<string, string>; timestamp?: Date } = {},
  ): LogEntry {
    const entry = createLogEntry({ session, message, ...options });
    this.add(entry);
    return entry;
  }

  /** New collection of the entries passing `predicate`. */
  filter(predicate: (entry: LogEntry) => boolean): LogCollection {
    return new LogCollection(this.entries.filter(predicate));
  }

  /** New collection with every entry passed through `fn`. */
  map(fn: (entry: LogEntry) => LogEntry): LogCollection {
    return new LogCollection(this.entries.map(fn));
  }

  bySession(session: string): LogEntry[] {
    return this.entries.filter((entry) => entry.session === session);
  }

  /** Entries carrying any of `tags`, or all of them with `{ all: true }`. */
  byTags(tags: readonly string[], options: { all?: boolean } = {}): LogEntry[] {
    return this.entries.filter((entry) => (options.all ? hasAllTags(entry, tags) : hasAnyTag(entry, tags)));
  }

  /** Entries with `start <= timestamp <= end`. */
  byDateRange(start: Date, end: Date): LogEntry[] {
    const from = start.getTime();
    const to = end.getTime();
    return this.entries.filter((entry) => {
      const time = entry.timestamp.getTime();
      return time >= from && time <= to;
    });
  }

  /** Case-insensitive substring search over messages. */
  search(text: string): LogEntry[] {
    const needle = text.toLowerCase();
    return this.entries.filter((entry) => entry.message.toLowerCase().includes(needle));
  }

  included(): LogEntry[] {
    return this.entries.filter((entry) => !entry.occlude);
  }

  occluded(): LogEntry[] {
    return this.entries.filter((entry) => entry.occlude);
  }

  /** Distinct session names in order of first appearance. */
  sessions(): string[] {
    return [...new Set(this.entries.map((entry) => entry.session))];
  }
}
