/**
 * Structural graph checks.
 *
 * Two kinds of issue are detected:
 * - dangling reference: a relation names an id that is not in the graph;
 * - incomplete chain: a REQUIRES/BLOCKS or ANYOF/SUFFICIENT entry whose
 *   target does not carry the mirrored entry back.
 *
 * Both scans walk every relation target once, O(V+E).
 */

import type { Item, RelationType } from '../../../types/item.js';
import { RELATION_MIRRORS } from '../../model/registry.js';
import { relationEntries, relationTargets } from '../../model/item.js';
import type { ItemGraph } from '../../graph/item-graph.js';

// ============================================================================
// Types
// ============================================================================

export type IssueType = 'dangling_reference' | 'incomplete_chain';

interface IssueBase {
  itemId: string;
  relationType: RelationType;
  /** The other end of the offending relation. */
  relatedId: string;
  message: string;
  suggestedFix: string;
}

export interface DanglingReference extends IssueBase {
  type: 'dangling_reference';
  missingId: string;
}

export interface IncompleteChain extends IssueBase {
  type: 'incomplete_chain';
}

export type Issue = DanglingReference | IncompleteChain;

export interface IssueFilter {
  type?: IssueType;
  itemId?: string;
}

/** Relation types whose mirror must be present on the target. */
const CHAINED: ReadonlySet<RelationType> = new Set<RelationType>(['REQUIRES', 'BLOCKS', 'ANYOF', 'SUFFICIENT']);

interface ScanVisitor {
  dangling(item: Item, type: RelationType, missingId: string): void;
  incomplete(item: Item, type: RelationType, target: Item): void;
}

function scanGraph(graph: ItemGraph, visitor: ScanVisitor): void {
  for (const item of graph.all()) {
    for (const [type, targets] of relationEntries(item)) {
      for (const targetId of targets) {
        const target = graph.get(targetId);
        if (!target) {
          visitor.dangling(item, type, targetId);
        } else if (CHAINED.has(type) && !relationTargets(target, RELATION_MIRRORS[type]).includes(item.id)) {
          visitor.incomplete(item, type, target);
        }
      }
    }
  }
}

// ============================================================================
// Checks
// ============================================================================

/** Every issue in the graph, dangling references and incomplete chains interleaved by item. */
export function collectIssues(graph: ItemGraph): Issue[] {
  const issues: Issue[] = [];
  scanGraph(graph, {
    dangling(item, type, missingId) {
      issues.push({
        type: 'dangling_reference',
        itemId: item.id,
        relationType: type,
        relatedId: missingId,
        missingId,
        message: `${item.id} ${type} '${missingId}', which does not exist`,
        suggestedFix: `Remove '${missingId}' from ${item.id}'s ${type} relations`,
      });
    },
    incomplete(item, type, target) {
      const mirror = RELATION_MIRRORS[type];
      issues.push({
        type: 'incomplete_chain',
        itemId: item.id,
        relationType: type,
        relatedId: target.id,
        message: `${item.id} ${type} ${target.id}, but ${target.id} has no ${mirror} entry for ${item.id}`,
        suggestedFix: `Add ${item.id} to ${target.id}'s ${mirror} relations, or remove the ${type} entry`,
      });
    },
  });
  return issues;
}

/** Number of issues collectIssues() would report, without building them. */
export function countIssues(graph: ItemGraph): number {
  let count = 0;
  scanGraph(graph, {
    dangling() { count++; },
    incomplete() { count++; },
  });
  return count;
}

export function matchesFilter(issue: Issue, filter: IssueFilter = {}): boolean {
  if (filter.type !== undefined && issue.type !== filter.type) return false;
  if (filter.itemId !== undefined && issue.itemId !== filter.itemId) return false;
  return true;
}
