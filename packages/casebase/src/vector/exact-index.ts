/**
 * Exact Vector Index
 *
 * Brute-force cosine search computed in process over `case_vectors`.
 * Used when the sqlite-vec extension cannot be loaded.
 */

import { cosineDistance } from '../utils/vector.js';
import type { VectorMatch } from './interface.js';
import { SQLiteVectorTable, decodeVector } from './sqlite-table.js';

export class ExactVectorIndex extends SQLiteVectorTable {
  readonly name = 'exact';

  async query(vector: readonly number[], k: number): Promise<VectorMatch[]> {
    if (k <= 0) return [];

    const rows = this.client
      .prepare<{ case_id: string; embedding: Buffer }>('SELECT case_id, embedding FROM case_vectors')
      .all();

    const matches = rows.map((r) => ({
      caseId: r.case_id,
      distance: cosineDistance(vector, decodeVector(r.embedding)),
    }));

    matches.sort((a, b) => a.distance - b.distance || compareIds(a.caseId, b.caseId));
    return matches.slice(0, Math.floor(k));
  }
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
