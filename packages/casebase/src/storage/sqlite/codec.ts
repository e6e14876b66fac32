/**
 * Row Codec
 *
 * Maps `cases` rows to CaseRecord and back. JSON columns are parsed
 * through schemas so a corrupted row surfaces as an error instead of a
 * malformed record.
 */

import { z } from 'zod';
import type { CaseRecord } from '../../types/index.js';
import { MetadataSchema } from '../record-schema.js';

/**
 * Raw `cases` row
 */
export interface CaseRow {
  seq: number;
  case_id: string;
  problem_context: string;
  context_vector: string;
  solution_payload: string;
  outcome: string | null;
  owner_id: string;
  case_kind: string;
  success_score: number;
  importance_score: number;
  usage_count: number;
  tags: string;
  created_at: string;
  last_used_at: string;
  importance_updated_at: string;
  consolidation_group: string | null;
  scope: string;
  shared_at: string | null;
  metadata: string;
  payload_hash: string;
  version: number;
}

const StringListSchema = z.array(z.string());
const VectorSchema = z.array(z.number());
const ScopeSchema = z.enum(['personal', 'shared']);

/**
 * Parse a JSON column against a schema
 */
export function parseJsonColumn<T>(text: string, schema: z.ZodType<T>, column: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Column ${column} holds invalid JSON`, { cause: err });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Column ${column} has unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export function parseStringList(text: string, column: string): string[] {
  return parseJsonColumn(text, StringListSchema, column);
}

/**
 * Row → record
 */
export function rowToCase(row: CaseRow): CaseRecord {
  const record: CaseRecord = {
    caseId: row.case_id,
    problemContext: row.problem_context,
    contextVector: parseJsonColumn(row.context_vector, VectorSchema, 'context_vector'),
    solutionPayload: row.solution_payload,
    ownerId: row.owner_id,
    caseKind: row.case_kind,
    successScore: row.success_score,
    importanceScore: row.importance_score,
    usageCount: row.usage_count,
    tags: parseStringList(row.tags, 'tags'),
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
    importanceUpdatedAt: row.importance_updated_at,
    scope: ScopeSchema.parse(row.scope),
    metadata: parseJsonColumn(row.metadata, MetadataSchema, 'metadata'),
    payloadHash: row.payload_hash,
    version: row.version,
  };

  if (row.outcome !== null) record.outcome = row.outcome;
  if (row.consolidation_group !== null) record.consolidationGroup = row.consolidation_group;
  if (row.shared_at !== null) record.sharedAt = row.shared_at;

  return record;
}

/**
 * Record → bind parameters in INSERT_CASE column order
 */
export function caseToParams(record: CaseRecord): unknown[] {
  return [
    record.caseId,
    record.problemContext,
    JSON.stringify(record.contextVector),
    record.solutionPayload,
    record.outcome ?? null,
    record.ownerId,
    record.caseKind,
    record.successScore,
    record.importanceScore,
    record.usageCount,
    JSON.stringify(record.tags),
    record.createdAt,
    record.lastUsedAt,
    record.importanceUpdatedAt,
    record.consolidationGroup ?? null,
    record.scope,
    record.sharedAt ?? null,
    JSON.stringify(record.metadata),
    record.payloadHash,
    record.version,
  ];
}

/**
 * Record → bind parameters in UPDATE_CASE_FIELDS column order (without the WHERE clause)
 */
export function mutableFieldsToParams(record: CaseRecord): unknown[] {
  return [
    record.successScore,
    record.importanceScore,
    record.usageCount,
    JSON.stringify(record.tags),
    record.lastUsedAt,
    record.importanceUpdatedAt,
    record.consolidationGroup ?? null,
    record.scope,
    record.sharedAt ?? null,
    JSON.stringify(record.metadata),
    record.version,
  ];
}
