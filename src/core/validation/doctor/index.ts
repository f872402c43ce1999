/**
 * Graph doctor: diagnosis and bounded repair of a loaded graph.
 *
 * Only dangling references are repaired. Incomplete chains are reported but
 * never fixed, since either side could be the intended one.
 */

import { getLogger } from '../../logger.js';
import type { ItemGraph } from '../../graph/item-graph.js';
import {
  collectIssues,
  countIssues,
  matchesFilter,
  type DanglingReference,
  type Issue,
  type IssueFilter,
} from './checks.js';

export type { DanglingReference, IncompleteChain, Issue, IssueFilter, IssueType } from './checks.js';
export { collectIssues, countIssues } from './checks.js';

export class GraphDoctor {
  constructor(private readonly graph: ItemGraph) {}

  /** Every issue currently in the graph. */
  fullDiagnosis(): Issue[] {
    return collectIssues(this.graph);
  }

  /** Issue count only, for cheap health gating. */
  quickCheck(): number {
    return countIssues(this.graph);
  }

  /**
   * Diagnose the graph as it is now and remove every dangling target that
   * passes `filter`. Emptied buckets disappear. Returns the issues resolved.
   */
  fixIssues(filter: IssueFilter = {}): DanglingReference[] {
    const log = getLogger('doctor');
    const fixed: DanglingReference[] = [];
    for (const issue of this.fullDiagnosis()) {
      if (issue.type !== 'dangling_reference' || !matchesFilter(issue, filter)) continue;
      if (this.graph.pruneReference(issue.itemId, issue.relationType, issue.missingId)) {
        fixed.push(issue);
      }
    }
    log.debug({ fixed: fixed.length }, 'Dangling references removed');
    return fixed;
  }
}
