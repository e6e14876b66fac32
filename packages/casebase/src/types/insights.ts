/**
 * Insight Types
 *
 * Aggregate statistics exposed for observability.
 */

import type { CaseScope } from './case.js';

/**
 * Maintenance job kinds
 */
export type MaintenanceJob = 'consolidation' | 'decay';

/**
 * Counters accumulated across maintenance runs
 */
export interface MaintenanceTotals {
  consolidationRuns: number;
  casesConsolidated: number;
  consolidationGroups: number;
  decayRuns: number;
  casesDecayed: number;
  casesEvicted: number;
  maintenanceErrors: number;
  lastConsolidationAt: string | null;
  lastDecayAt: string | null;
}

/**
 * Aggregates computed by the store
 */
export interface StoreAggregate {
  totalCases: number;
  byKind: Record<string, number>;
  byScope: Record<CaseScope, number>;
  averageSuccess: number;
  averageImportance: number;
  totalUsage: number;
  distinctSolutions: number;
  consolidatedCases: number;
  oldestCase: string | null;
  newestCase: string | null;
  topTags: string[];
}

/**
 * Everything `getInsights()` reports
 */
export interface CaseInsights extends StoreAggregate {
  maintenance: MaintenanceTotals;
  retrievals: {
    /** Retrieval calls served since the memory was opened */
    calls: number;
    /** Cases returned across those calls */
    casesReturned: number;
    /** Calls that returned nothing */
    misses: number;
  };
  vectorIndex: string;
  dimensions: number;
}
