/**
 * Case Record Schemas
 *
 * Shape checks for case data arriving as untyped JSON: stored JSON columns
 * and imported records. Value ranges are left to the store, which raises
 * the typed validation errors.
 */

import { z } from 'zod';
import type { CaseMetadata, JsonValue } from '../types/index.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const MetadataSchema: z.ZodType<CaseMetadata> = z.record(JsonValueSchema);

export const CaseRecordSchema = z.object({
  caseId: z.string().min(1),
  problemContext: z.string(),
  contextVector: z.array(z.number()),
  solutionPayload: z.string(),
  outcome: z.string().optional(),
  ownerId: z.string(),
  caseKind: z.string().min(1),
  successScore: z.number(),
  importanceScore: z.number(),
  usageCount: z.number(),
  tags: z.array(z.string()),
  createdAt: z.string(),
  lastUsedAt: z.string(),
  importanceUpdatedAt: z.string(),
  consolidationGroup: z.string().optional(),
  scope: z.enum(['personal', 'shared']),
  sharedAt: z.string().optional(),
  metadata: MetadataSchema,
  payloadHash: z.string(),
  version: z.number().int().min(1),
});
