/**
 * Log occlusion by session, tags or date range. Every operation returns a
 * new collection; with `dryRun` the input collection comes back untouched.
 */

import type { LogEntry } from '../../types/log.js';
import { hasAllTags, hasAnyTag, withOcclusion } from '../model/log-entry.js';
import type { LogCollection } from './collection.js';

export interface LogOcclusionOptions {
  dryRun?: boolean;
}

export interface LogOcclusionResult {
  logs: LogCollection;
  /** Entries whose flag changed (or would change), as they were before. */
  affected: LogEntry[];
  dryRun: boolean;
}

/** Which entries a log occlusion targets. */
export type LogSelector =
  | { session: string }
  | { tags: readonly string[]; all?: boolean }
  | { from: Date; to: Date };

function selects(selector: LogSelector, entry: LogEntry): boolean {
  if ('session' in selector) return entry.session === selector.session;
  if ('tags' in selector) {
    return selector.all ? hasAllTags(entry, selector.tags) : hasAnyTag(entry, selector.tags);
  }
  const time = entry.timestamp.getTime();
  return time >= selector.from.getTime() && time <= selector.to.getTime();
}

function setOcclusion(
  logs: LogCollection,
  selector: LogSelector,
  occlude: boolean,
  options: LogOcclusionOptions,
): LogOcclusionResult {
  const targeted = (entry: LogEntry): boolean => entry.occlude !== occlude && selects(selector, entry);
  const affected = logs.all().filter(targeted);
  const dryRun = options.dryRun ?? false;
  if (dryRun || affected.length === 0) {
    return { logs, affected, dryRun };
  }
  return {
    logs: logs.map((entry) => (targeted(entry) ? withOcclusion(entry, occlude) : entry)),
    affected,
    dryRun,
  };
}

export function occludeLogs(logs: LogCollection, selector: LogSelector, options: LogOcclusionOptions = {}): LogOcclusionResult {
  return setOcclusion(logs, selector, true, options);
}

export function includeLogs(logs: LogCollection, selector: LogSelector, options: LogOcclusionOptions = {}): LogOcclusionResult {
  return setOcclusion(logs, selector, false, options);
}

export function occludeBySession(logs: LogCollection, session: string, options: LogOcclusionOptions = {}): LogOcclusionResult {
  return occludeLogs(logs, { session }, options);
}

export function occludeByTags(
  logs: LogCollection,
  tags: readonly string[],
  options: LogOcclusionOptions & { all?: boolean } = {},
): LogOcclusionResult {
  return occludeLogs(logs, { tags, all: options.all }, options);
}

export function occludeByDateRange(
  logs: LogCollection,
  from: Date,
  to: Date,
  options: LogOcclusionOptions = {},
): LogOcclusionResult {
  return occludeLogs(logs, { from, to }, options);
}
