/**
 * Case Types
 *
 * A case is one recorded problem → solution → outcome episode. The record
 * carries the embedding of its problem context, the derived scores used for
 * ranking and eviction, and the bookkeeping needed for safe concurrent
 * maintenance (version, importance timestamp, consolidation group).
 */

/**
 * Categorical tag used as a retrieval filter.
 * Free-form; the well-known kinds are listed for convenience.
 */
export type CaseKind = 'decision' | 'observation' | 'error-fix' | (string & {});

/**
 * Sharing state of a case
 */
export type CaseScope = 'personal' | 'shared';

/**
 * Why a case left the store for good
 */
export type RetirementReason = 'consolidated' | 'evicted' | 'deleted';

/**
 * JSON-compatible metadata value
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Free-form audit metadata attached to a case
 */
export type CaseMetadata = { [key: string]: JsonValue };

/**
 * A stored case
 */
export interface CaseRecord {
  /** Unique, immutable identifier */
  caseId: string;
  /** Serialized description of the situation */
  problemContext: string;
  /** Embedding of the problem context */
  contextVector: number[];
  /** Opaque solution payload; never interpreted by the memory */
  solutionPayload: string;
  /** Optional free-text description of the outcome */
  outcome?: string;
  /** Agent or session that recorded the case */
  ownerId: string;
  /** Retrieval filter */
  caseKind: CaseKind;

  // Scores
  /** Outcome quality 0.0 - 1.0, EMA-updated */
  successScore: number;
  /** Derived relevance 0.0 - 1.0, decays over time */
  importanceScore: number;
  /** Number of retrievals that returned this case */
  usageCount: number;

  /** Keywords used for overlap scoring */
  tags: string[];

  // Timestamps (ISO 8601)
  createdAt: string;
  lastUsedAt: string;
  /** When importance was last recomputed or decayed */
  importanceUpdatedAt: string;

  // Consolidation & sharing
  /** Merge group this case represents, if any */
  consolidationGroup?: string;
  scope: CaseScope;
  sharedAt?: string;

  /** Audit metadata, e.g. `consolidatedFrom` */
  metadata: CaseMetadata;
  /** Short hash of the solution payload */
  payloadHash: string;
  /** Write counter used for compare-and-swap */
  version: number;
}

/**
 * Fields a partial update may touch.
 * Identity, context, vector and payload are immutable after insert.
 */
export type CaseFieldUpdate = Partial<
  Pick<
    CaseRecord,
    | 'successScore'
    | 'importanceScore'
    | 'usageCount'
    | 'lastUsedAt'
    | 'importanceUpdatedAt'
    | 'consolidationGroup'
    | 'scope'
    | 'sharedAt'
    | 'metadata'
    | 'tags'
  >
>;

/**
 * Computes a partial update from the current state of a case.
 * Returning `null` leaves the case untouched.
 */
export type CaseMutator = (current: Readonly<CaseRecord>) => CaseFieldUpdate | null;

/**
 * Scan/count filter
 */
export interface CaseFilter {
  caseKind?: CaseKind;
  ownerId?: string;
  scope?: CaseScope;
  /** Only cases created at or after this instant */
  createdAfter?: string;
  /** Only cases created at or before this instant */
  createdBefore?: string;
  minImportance?: number;
  maxImportance?: number;
  minSuccess?: number;
  maxSuccess?: number;
  /** Cases carrying at least one of these tags */
  anyTags?: string[];
  /** Visible to this owner: own personal cases plus all shared ones */
  visibleTo?: string;
}

/**
 * A retrieval hit
 */
export interface ScoredCase {
  case: CaseRecord;
  /** Final retrieval score used for ranking */
  score: number;
  /** Weighted blend before the success re-weighting */
  combinedScore: number;
  /** Cosine similarity between query and case vectors */
  similarity: number;
}

/**
 * Record of a terminal transition
 */
export interface Tombstone {
  caseId: string;
  reason: RetirementReason;
  consolidationGroup?: string;
  retiredAt: string;
}
