/**
 * Parsing of command-line option values into model values.
 * Every parser throws PlotlineError (INVALID_INPUT) on bad input.
 */

import type { Duration, ItemStatus, Priority, RelationType, TimeConstraint } from '../types/item.js';
import { ExitCode } from '../types/exit-codes.js';
import { PlotlineError } from '../core/errors.js';
import {
  ITEM_STATUSES,
  PRIORITIES,
  RELATION_TYPES,
  isItemStatus,
  isPriority,
  isRelationType,
  priorityFromSymbol,
  relationFromSymbol,
  statusFromSymbol,
} from '../core/model/registry.js';
import { isValidItemId, isValidTag } from '../core/model/item.js';
import { parseDurationInput } from '../core/notation/duration.js';
import { parseTimeConstraint } from '../core/notation/constraint.js';

function invalid(message: string, fix?: string): PlotlineError {
  return new PlotlineError(ExitCode.INVALID_INPUT, message, { fix });
}

function canonical(value: string): string {
  return value.trim().toUpperCase().replace(/[-\s]/g, '_');
}

/** String option value, or undefined when absent. */
export function optString(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key];
  return typeof value === 'string' ? value : undefined;
}

export function optBool(opts: Record<string, unknown>, key: string): boolean {
  return opts[key] === true;
}

/** Repeatable option (`<values...>`), empty when absent. */
export function optArray(opts: Record<string, unknown>, key: string): string[] {
  const value = opts[key];
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/** Comma-separated list, trimmed, blanks dropped. */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/** Status by name (`in-progress`, `COMPLETED`) or glyph. */
export function parseStatus(value: string): ItemStatus {
  const bySymbol = statusFromSymbol(value.trim());
  if (bySymbol) return bySymbol;
  const name = canonical(value);
  if (isItemStatus(name)) return name;
  throw invalid(`Invalid status '${value}'`, `Use one of: ${ITEM_STATUSES.join(', ').toLowerCase()}`);
}

/** Priority by name (`high`) or glyph (`!!`). */
export function parsePriority(value: string): Priority {
  const name = canonical(value);
  if (isPriority(name)) return name;
  const bySymbol = priorityFromSymbol(value.trim());
  if (bySymbol !== undefined && value.trim() !== '') return bySymbol;
  throw invalid(`Invalid priority '${value}'`, `Use one of: ${PRIORITIES.join(', ').toLowerCase()}`);
}

/** Relation by name (`requires`, `any-of`) or glyph. */
export function parseRelationType(value: string): RelationType {
  const bySymbol = relationFromSymbol(value.trim());
  if (bySymbol) return bySymbol;
  const name = canonical(value).replace(/_/g, '');
  if (isRelationType(name)) return name;
  throw invalid(`Invalid relation type '${value}'`, `Use one of: ${RELATION_TYPES.join(', ').toLowerCase()}`);
}

export function parseDurationOption(value: string): Duration {
  return parseDurationInput(value);
}

export function parseConstraintOptions(values: readonly string[]): TimeConstraint[] {
  return values.map((value) => parseTimeConstraint(value.trim()));
}

export function parseItemId(value: string): string {
  if (!isValidItemId(value)) {
    throw invalid(`Invalid item id '${value}'`, 'Ids use letters, digits and underscores only');
  }
  return value;
}

export function parseTags(value: string | undefined): string[] {
  const tags = splitList(value);
  const bad = tags.filter((tag) => !isValidTag(tag));
  if (bad.length > 0) {
    throw invalid(`Invalid tag(s): ${bad.join(', ')}`, 'Tags use lowercase letters, digits and underscores only');
  }
  return [...new Set(tags)];
}

/** Non-negative integer option. */
export function parseCount(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw invalid(`${name} must be a non-negative integer, got '${value}'`);
  }
  return n;
}

/** ISO date or date-time. */
export function parseDate(value: string, name: string): Date {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw invalid(`${name} must be an ISO date, got '${value}'`);
  }
  return new Date(time);
}
