/**
 * SQLite Vector Table
 *
 * Shared storage for the SQLite-backed indexes: one float32 blob per case
 * in `case_vectors`, living in the same database (and transactions) as
 * the cases themselves.
 */

import type { SQLiteClient } from '../storage/sqlite/client.js';
import { VECTOR_SCHEMA } from '../storage/sqlite/schema.js';
import type { IVectorIndex, VectorMatch } from './interface.js';

/**
 * Encode a vector as a little-endian float32 blob
 */
export function encodeVector(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Decode a float32 blob
 */
export function decodeVector(blob: Buffer): number[] {
  const floats = new Float32Array(blob.byteLength / 4);
  for (let i = 0; i < floats.length; i++) {
    floats[i] = blob.readFloatLE(i * 4);
  }
  return Array.from(floats);
}

/**
 * Base class for indexes stored in `case_vectors`
 */
export abstract class SQLiteVectorTable implements IVectorIndex {
  abstract readonly name: string;

  constructor(
    protected readonly client: SQLiteClient,
    readonly dimensions: number
  ) {}

  initialize(): void {
    this.client.exec(VECTOR_SCHEMA);
  }

  insert(caseId: string, vector: readonly number[]): void {
    this.client
      .prepare(
        `INSERT INTO case_vectors (case_id, embedding) VALUES (?, ?)
         ON CONFLICT(case_id) DO UPDATE SET embedding = excluded.embedding`
      )
      .run(caseId, encodeVector(vector));
  }

  remove(caseId: string): void {
    this.client.prepare('DELETE FROM case_vectors WHERE case_id = ?').run(caseId);
  }

  has(caseId: string): boolean {
    const row = this.client
      .prepare<{ found: number }>('SELECT 1 AS found FROM case_vectors WHERE case_id = ?')
      .get(caseId);
    return row !== undefined;
  }

  ids(): string[] {
    return this.client
      .prepare<{ case_id: string }>('SELECT case_id FROM case_vectors ORDER BY case_id')
      .all()
      .map((r) => r.case_id);
  }

  size(): number {
    const row = this.client.prepare<{ count: number }>('SELECT COUNT(*) AS count FROM case_vectors').get();
    return row?.count ?? 0;
  }

  abstract query(vector: readonly number[], k: number): Promise<VectorMatch[]>;
}
