/**
 * Result Ranking
 *
 * Orders scored cases for output: retrieval score descending, then higher
 * importance, then more recent use. The case id settles whatever is left
 * so equal inputs always rank the same way.
 */

import type { ScoredCase } from '../types/index.js';

/**
 * Result ranker
 */
export class ResultRanker {
  /**
   * Rank scored cases
   */
  rank(scored: readonly ScoredCase[]): ScoredCase[] {
    return [...scored].sort(compareScored);
  }
}

export function compareScored(a: ScoredCase, b: ScoredCase): number {
  return (
    b.score - a.score ||
    b.case.importanceScore - a.case.importanceScore ||
    Date.parse(b.case.lastUsedAt) - Date.parse(a.case.lastUsedAt) ||
    (a.case.caseId < b.case.caseId ? -1 : a.case.caseId > b.case.caseId ? 1 : 0)
  );
}
