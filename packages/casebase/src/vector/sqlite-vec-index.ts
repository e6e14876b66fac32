/**
 * sqlite-vec Index
 *
 * Exact k-NN inside SQLite using the sqlite-vec `vec_distance_cosine`
 * scalar function. Requires the extension to be loaded on the client.
 */

import type { VectorMatch } from './interface.js';
import { SQLiteVectorTable, encodeVector } from './sqlite-table.js';

export class SqliteVecIndex extends SQLiteVectorTable {
  readonly name = 'sqlite-vec';

  async query(vector: readonly number[], k: number): Promise<VectorMatch[]> {
    if (k <= 0) return [];

    const rows = this.client
      .prepare<{ case_id: string; distance: number }>(
        `SELECT case_id, vec_distance_cosine(embedding, ?) AS distance
         FROM case_vectors
         ORDER BY distance ASC, case_id ASC
         LIMIT ?`
      )
      .all(encodeVector(vector), Math.floor(k));

    return rows.map((r) => ({ caseId: r.case_id, distance: r.distance }));
  }
}
