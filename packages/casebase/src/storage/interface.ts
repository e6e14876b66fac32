/**
 * Case Storage Interface
 *
 * Defines the contract for case store implementations: validated
 * insert/replace, point lookup, atomic partial update, version-checked
 * delete, lazy filtered scans, and the aggregates and maintenance history
 * used for insights.
 */

import type {
  CaseFilter,
  CaseMutator,
  CaseRecord,
  MaintenanceJob,
  MaintenanceTotals,
  RetirementReason,
  StoreAggregate,
  Tombstone,
} from '../types/index.js';
import type { IVectorIndex } from '../vector/interface.js';

/**
 * Options for `updateFields`
 */
export interface UpdateOptions {
  /** Only apply when the case is still at this version */
  expectedVersion?: number;
}

/**
 * Options for `delete`
 */
export interface DeleteOptions {
  /** Only delete when the case is still at this version */
  expectedVersion?: number;
  /** Recorded on the tombstone (default: deleted) */
  reason?: RetirementReason;
  /** Group that absorbed the case, for consolidation */
  consolidationGroup?: string;
}

/**
 * Options for `scan`
 */
export interface ScanOptions {
  /** Rows fetched per page (default: 100) */
  pageSize?: number;
  /** Insertion order (default: asc) */
  order?: 'asc' | 'desc';
  /** Stop after this many cases */
  limit?: number;
}

/**
 * Audit record of one consolidation merge
 */
export interface ConsolidationGroupRecord {
  groupId: string;
  representativeId: string;
  caseKind: string;
  memberIds: string[];
  createdAt: string;
}

/**
 * Outcome of one maintenance run
 */
export interface MaintenanceRunSummary {
  status: 'completed' | 'interrupted' | 'failed';
  completedAt: string;
  casesScanned: number;
  casesChanged: number;
  casesRemoved: number;
  groupsFormed: number;
  errors: number;
  error?: string;
}

/**
 * Store/Index membership comparison
 */
export interface ConsistencyReport {
  consistent: boolean;
  /** Cases without a vector */
  missingVectors: string[];
  /** Vectors without a case */
  orphanVectors: string[];
}

/**
 * Case storage interface
 */
export interface ICaseStore {
  /** Vector dimensionality fixed for this store */
  readonly dimensions: number;
  /** Index kept in lockstep with the stored cases */
  readonly vectorIndex: IVectorIndex;

  // Lifecycle
  /** Create tables, check the stored dimension */
  initialize(): Promise<void>;
  /** Close the storage connection */
  close(): Promise<void>;

  // Cases
  /** Insert or fully replace a case */
  put(record: CaseRecord): Promise<void>;
  /** Read a case; throws NotFoundError */
  get(caseId: string): Promise<CaseRecord>;
  /** Read a case or null */
  find(caseId: string): Promise<CaseRecord | null>;
  /** Atomic partial update under per-case mutual exclusion */
  updateFields(caseId: string, mutator: CaseMutator, options?: UpdateOptions): Promise<CaseRecord>;
  /** Remove a case and its vector; false when absent or at another version */
  delete(caseId: string, options?: DeleteOptions): Promise<boolean>;
  /** Lazy, restartable scan */
  scan(filter?: CaseFilter, options?: ScanOptions): AsyncIterable<CaseRecord>;
  /** Count matching cases */
  count(filter?: CaseFilter): Promise<number>;
  /** Distinct case kinds present */
  kinds(): Promise<string[]>;
  /** Terminal record of a retired case */
  tombstone(caseId: string): Promise<Tombstone | null>;

  // Aggregation & audit
  aggregate(): Promise<StoreAggregate>;
  recordConsolidationGroup(group: ConsolidationGroupRecord): Promise<void>;
  consolidationGroup(groupId: string): Promise<ConsolidationGroupRecord | null>;
  startMaintenanceRun(job: MaintenanceJob, startedAt: string): Promise<string>;
  finishMaintenanceRun(runId: string, summary: MaintenanceRunSummary): Promise<void>;
  maintenanceTotals(): Promise<MaintenanceTotals>;

  // Invariants
  checkConsistency(): Promise<ConsistencyReport>;
}
