/**
 * Symbol registry: single source of truth for status, priority and relation
 * enums and the glyphs they are written with in the item notation.
 *
 * Every table is a Record keyed by the enum union, so adding a member without
 * a glyph or a mirror fails to compile.
 */

// === ENUMS ===

export const ITEM_STATUSES = [
  'NOT_STARTED', 'IN_PROGRESS', 'BLOCKED', 'COMPLETED',
] as const;

/** Ordered from least to most urgent. */
export const PRIORITIES = [
  'LOWEST', 'LOW', 'NEUTRAL', 'UNSURE', 'MEDIUM', 'HIGH', 'CRITICAL',
] as const;

export const RELATION_TYPES = [
  'REQUIRES', 'ANYOF', 'SUPERCHARGES', 'INDICATES',
  'TOGETHER', 'CONFLICTS', 'BLOCKS', 'SUFFICIENT',
] as const;

export const DURATION_UNITS = ['s', 'min', 'h', 'd', 'w', 'mo', 'y'] as const;

// === DERIVED TYPES ===

export type ItemStatus   = typeof ITEM_STATUSES[number];
export type Priority     = typeof PRIORITIES[number];
export type RelationType = typeof RELATION_TYPES[number];
export type DurationUnit = typeof DURATION_UNITS[number];

// === GLYPHS ===

export const STATUS_SYMBOLS: Record<ItemStatus, string> = {
  NOT_STARTED: '○',
  IN_PROGRESS: '◑',
  BLOCKED: '⊘',
  COMPLETED: '●',
};

export const PRIORITY_SYMBOLS: Record<Priority, string> = {
  LOWEST: ',,,',
  LOW: '...',
  NEUTRAL: '',
  UNSURE: '?',
  MEDIUM: '!',
  HIGH: '!!',
  CRITICAL: '!!!',
};

export const RELATION_SYMBOLS: Record<RelationType, string> = {
  REQUIRES: '⊢',
  ANYOF: '⋲',
  SUPERCHARGES: '≫',
  INDICATES: '∴',
  TOGETHER: '∪',
  CONFLICTS: '⊟',
  BLOCKS: '►',
  SUFFICIENT: '≻',
};

/** Relation written on the target whenever a relation is written on the source. */
export const RELATION_MIRRORS: Record<RelationType, RelationType> = {
  REQUIRES: 'BLOCKS',
  BLOCKS: 'REQUIRES',
  ANYOF: 'SUFFICIENT',
  SUFFICIENT: 'ANYOF',
  SUPERCHARGES: 'SUPERCHARGES',
  INDICATES: 'INDICATES',
  TOGETHER: 'TOGETHER',
  CONFLICTS: 'CONFLICTS',
};

/** Edges that order items and must stay acyclic. */
export const STRICT_RELATIONS: ReadonlySet<RelationType> = new Set<RelationType>(['REQUIRES', 'ANYOF']);

export const UNIT_SECONDS: Record<DurationUnit, number> = {
  s: 1,
  min: 60,
  h: 3_600,
  d: 86_400,
  w: 604_800,
  mo: 2_592_000,
  y: 31_536_000,
};

// === LOOKUPS ===

function invert<K extends string>(table: Record<K, string>, keys: readonly K[]): Map<string, K> {
  const out = new Map<string, K>();
  for (const key of keys) out.set(table[key], key);
  return out;
}

const STATUS_BY_SYMBOL = invert(STATUS_SYMBOLS, ITEM_STATUSES);
const PRIORITY_BY_SYMBOL = invert(PRIORITY_SYMBOLS, PRIORITIES);
const RELATION_BY_SYMBOL = invert(RELATION_SYMBOLS, RELATION_TYPES);

export function statusFromSymbol(symbol: string): ItemStatus | undefined {
  return STATUS_BY_SYMBOL.get(symbol);
}

export function priorityFromSymbol(symbol: string): Priority | undefined {
  return PRIORITY_BY_SYMBOL.get(symbol);
}

export function relationFromSymbol(symbol: string): RelationType | undefined {
  return RELATION_BY_SYMBOL.get(symbol);
}

// === GUARDS ===

export function isItemStatus(value: string): value is ItemStatus {
  return ITEM_STATUSES.some((member) => member === value);
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((member) => member === value);
}

export function isRelationType(value: string): value is RelationType {
  return RELATION_TYPES.some((member) => member === value);
}

export function isDurationUnit(value: string): value is DurationUnit {
  return DURATION_UNITS.some((member) => member === value);
}

export function isStrictRelation(type: RelationType): boolean {
  return STRICT_RELATIONS.has(type);
}
