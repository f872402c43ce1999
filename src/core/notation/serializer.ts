/**
 * Item line serializer, the inverse of parseItem().
 */

import type { Item } from '../../types/item.js';
import { PRIORITY_SYMBOLS, RELATION_SYMBOLS, STATUS_SYMBOLS } from '../model/registry.js';
import { formatDuration } from '../model/duration.js';
import { relationEntries } from '../model/item.js';
import { formatTimeConstraint } from './constraint.js';
import { AUTO_COMMENT_MARKER, CONSTRAINTS_MARKER, RELATIONS_MARKER } from './parser.js';

export function serializeItem(item: Item): string {
  const charts = item.charts.map((chart) => JSON.stringify(chart)).join(',');
  const fields = [
    STATUS_SYMBOLS[item.status],
    `${item.id}${PRIORITY_SYMBOLS[item.priority]}`,
    formatDuration(item.duration),
    JSON.stringify(item.title),
    `{${charts}}`,
  ];

  if (item.tags.length > 0) {
    fields.push(item.tags.join(','));
  }

  const relations = relationEntries(item);
  if (relations.length > 0) {
    const entries = relations.map(([type, targets]) => `${RELATION_SYMBOLS[type]}[${targets.join(',')}]`);
    fields.push(RELATIONS_MARKER, ...entries);
  }

  if (item.timeConstraints.length > 0) {
    fields.push(CONSTRAINTS_MARKER, ...item.timeConstraints.map(formatTimeConstraint));
  }

  if (item.userComment) fields.push(`# ${item.userComment}`);
  if (item.autoComment) fields.push(`${AUTO_COMMENT_MARKER} ${item.autoComment}`);

  return fields.join(' ');
}
