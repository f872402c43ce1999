/**
 * Human-readable renderers for item commands.
 *
 * Covers: add, show, list, set-status, relate, unrelate, insert, remove,
 * occlude, include.
 */

import type { Item, RelationType } from '../../types/item.js';
import { RELATION_SYMBOLS } from '../../core/model/registry.js';
import { formatDuration } from '../../core/model/duration.js';
import { relationEntries } from '../../core/model/item.js';
import { formatTimeConstraint } from '../../core/notation/constraint.js';
import {
  BOLD, DIM, NC, GREEN, YELLOW,
  statusSymbol, statusColor, priorityColor, hRule,
} from './colors.js';

export interface ItemResult {
  item: Item;
}

export interface ShowResult extends ItemResult {
  /** The item as written in the notation. */
  line: string;
}

export interface ListResult {
  items: Item[];
  total: number;
  occluded: boolean;
}

export interface RelationResult {
  from: string;
  type: RelationType;
  to: string;
}

export interface InsertResult extends ItemResult {
  before: string;
  after: string;
}

export interface RemoveResult {
  removed: Item;
  cascade: boolean;
}

export interface OcclusionChange {
  affected: string[];
  dryRun: boolean;
  occlude: boolean;
}

/** One-line summary: symbol, id, title, priority and tags. */
export function itemLine(item: Item): string {
  const priority = item.priority === 'NEUTRAL' ? '' : ` ${priorityColor(item.priority)}${item.priority.toLowerCase()}${NC}`;
  const tags = item.tags.length > 0 ? ` ${DIM}[${item.tags.join(', ')}]${NC}` : '';
  return `${statusColor(item.status)}${statusSymbol(item.status)}${NC} ${BOLD}${item.id}${NC} ${item.title}${priority}${tags}`;
}

export function renderAdd(data: ItemResult, quiet: boolean): string {
  if (quiet) return data.item.id;
  return `${GREEN}Added${NC} ${itemLine(data.item)}`;
}

export function renderShow(data: ShowResult, quiet: boolean): string {
  const { item } = data;
  if (quiet) return data.line;

  const lines: string[] = [itemLine(item), hRule(40)];
  lines.push(`  ${DIM}Status:${NC}   ${item.status}`);
  lines.push(`  ${DIM}Priority:${NC} ${item.priority}`);
  lines.push(`  ${DIM}Duration:${NC} ${formatDuration(item.duration)}`);
  if (item.charts.length > 0) lines.push(`  ${DIM}Charts:${NC}   ${item.charts.join(', ')}`);
  if (item.occlude) lines.push(`  ${YELLOW}Occluded${NC}`);

  const relations = relationEntries(item);
  if (relations.length > 0) {
    lines.push(`  ${DIM}Relations:${NC}`);
    for (const [type, targets] of relations) {
      lines.push(`    ${RELATION_SYMBOLS[type]} ${type.toLowerCase()}: ${targets.join(', ')}`);
    }
  }
  if (item.timeConstraints.length > 0) {
    lines.push(`  ${DIM}Constraints:${NC}`);
    for (const constraint of item.timeConstraints) {
      lines.push(`    ${formatTimeConstraint(constraint)}`);
    }
  }
  if (item.userComment) lines.push(`  ${DIM}#${NC} ${item.userComment}`);
  if (item.autoComment) lines.push(`  ${DIM}###${NC} ${item.autoComment}`);
  lines.push('');
  lines.push(`${DIM}${data.line}${NC}`);
  return lines.join('\n');
}

export function renderList(data: ListResult, quiet: boolean): string {
  if (quiet) return data.items.map((item) => item.id).join('\n');
  if (data.items.length === 0) {
    return data.occluded ? 'No occluded items.' : 'No items.';
  }
  const lines = data.items.map(itemLine);
  lines.push('');
  lines.push(`${DIM}${data.items.length} of ${data.total} item(s)${NC}`);
  return lines.join('\n');
}

export function renderStatus(data: ItemResult, quiet: boolean): string {
  if (quiet) return data.item.status;
  return itemLine(data.item);
}

export function renderRelate(data: RelationResult, quiet: boolean): string {
  if (quiet) return '';
  return `${GREEN}Related${NC} ${data.from} ${RELATION_SYMBOLS[data.type]} ${data.to}`;
}

export function renderUnrelate(data: RelationResult, quiet: boolean): string {
  if (quiet) return '';
  return `${YELLOW}Unrelated${NC} ${data.from} ${RELATION_SYMBOLS[data.type]} ${data.to}`;
}

export function renderInsert(data: InsertResult, quiet: boolean): string {
  if (quiet) return data.item.id;
  return `${GREEN}Inserted${NC} ${data.item.id} between ${data.after} and ${data.before}`;
}

export function renderRemove(data: RemoveResult, quiet: boolean): string {
  if (quiet) return data.removed.id;
  const how = data.cascade ? ' (references removed)' : '';
  return `${YELLOW}Removed${NC} ${data.removed.id}${how}`;
}

export function renderOcclusion(data: OcclusionChange, quiet: boolean): string {
  if (quiet) return data.affected.join('\n');
  const verb = data.occlude ? 'occluded' : 'included';
  if (data.affected.length === 0) return `Nothing ${verb}.`;
  const prefix = data.dryRun ? `Would be ${verb}` : data.occlude ? 'Occluded' : 'Included';
  return `${prefix}: ${data.affected.join(', ')}`;
}
