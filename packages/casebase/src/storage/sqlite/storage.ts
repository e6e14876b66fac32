/**
 * SQLite Case Store
 *
 * Full implementation of ICaseStore on better-sqlite3. Cases and their
 * vectors live in one database so every write touching both runs in one
 * transaction. Per-case writes are serialized in process by a keyed mutex
 * and guarded across processes by a version compare-and-swap.
 */

import {
  CaseMemoryError,
  CaseRetiredError,
  ConcurrentModificationError,
  ConfigError,
  DimensionMismatchError,
  IndexUnavailableError,
  InvalidRecordError,
  InvalidScoreError,
  NotFoundError,
} from '../../errors.js';
import type {
  CaseFieldUpdate,
  CaseFilter,
  CaseMutator,
  CaseRecord,
  MaintenanceJob,
  MaintenanceTotals,
  RetirementReason,
  StoreAggregate,
  Tombstone,
} from '../../types/index.js';
import { generateRunId } from '../../utils/id-generator.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { latest, systemClock, type Clock } from '../../utils/time.js';
import { assertVector } from '../../utils/vector.js';
import { ExactVectorIndex } from '../../vector/exact-index.js';
import type { IVectorIndex } from '../../vector/interface.js';
import { SqliteVecIndex } from '../../vector/sqlite-vec-index.js';
import type {
  ConsistencyReport,
  ConsolidationGroupRecord,
  DeleteOptions,
  ICaseStore,
  MaintenanceRunSummary,
  ScanOptions,
  UpdateOptions,
} from '../interface.js';
import { SQLiteClient } from './client.js';
import { caseToParams, mutableFieldsToParams, parseStringList, rowToCase, type CaseRow } from './codec.js';
import * as Q from './queries.js';
import { SCHEMA, SCHEMA_VERSION } from './schema.js';

/** Compare-and-swap attempts before giving up on an update */
const MAX_CAS_ATTEMPTS = 3;
const DEFAULT_PAGE_SIZE = 100;
const TOP_TAG_COUNT = 5;

/**
 * SQLite case store configuration
 */
export interface SQLiteCaseStoreConfig {
  /** Path to the database file, or ':memory:' */
  dbPath: string;
  /** Vector dimensionality; fixed for the lifetime of the database */
  dimensions: number;
  /** Use sqlite-vec when the extension loads (default: true) */
  vectorSearch?: boolean;
  /** Milliseconds to wait on a database locked by another process */
  busyTimeoutMs?: number;
  logger?: Logger;
  clock?: Clock;
}

interface TombstoneRow {
  case_id: string;
  reason: string;
  consolidation_group: string | null;
  retired_at: string;
}

interface GroupRow {
  group_id: string;
  representative_id: string;
  case_kind: string;
  member_ids: string;
  created_at: string;
}

interface TotalsRow {
  job: string;
  runs: number;
  changed: number;
  removed: number;
  groups_formed: number;
  errors: number;
  last_completed: string | null;
}

type UpdateAttempt =
  | { kind: 'done'; record: CaseRecord }
  | { kind: 'conflict' };

/**
 * SQLite implementation of case storage
 */
export class SQLiteCaseStore implements ICaseStore {
  readonly dimensions: number;
  readonly vectorIndex: IVectorIndex;

  private readonly client: SQLiteClient;
  private readonly mutex = new KeyedMutex();
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(config: SQLiteCaseStoreConfig) {
    if (!Number.isInteger(config.dimensions) || config.dimensions <= 0) {
      throw new ConfigError([`dimensions: must be a positive integer, got ${config.dimensions}`]);
    }

    this.dimensions = config.dimensions;
    this.logger = config.logger ?? silentLogger;
    this.clock = config.clock ?? systemClock;
    this.client = new SQLiteClient({
      dbPath: config.dbPath,
      vectorSearch: config.vectorSearch ?? true,
      ...(config.busyTimeoutMs !== undefined && { busyTimeoutMs: config.busyTimeoutMs }),
      logger: this.logger,
    });

    this.vectorIndex = this.client.vecEnabled
      ? new SqliteVecIndex(this.client, this.dimensions)
      : new ExactVectorIndex(this.client, this.dimensions);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async initialize(): Promise<void> {
    const operation = 'store.initialize';
    try {
      this.guard(operation, undefined, () => {
        this.client.exec(SCHEMA);
        this.vectorIndex.initialize();
        this.client.transaction(() => this.checkDimensions(operation));
      });
    } catch (err) {
      this.client.close();
      throw err;
    }

    if (this.vectorIndex.name !== 'sqlite-vec') {
      this.logger.info(`Using in-process ${this.vectorIndex.name} vector search`);
    }
    this.logger.debug(
      `Case store ready at ${this.client.path} (${this.vectorIndex.name}, ${this.dimensions} dimensions)`
    );
  }

  async close(): Promise<void> {
    this.client.close();
  }

  // ==========================================================================
  // Cases
  // ==========================================================================

  async put(record: CaseRecord): Promise<void> {
    const operation = 'store.put';
    const candidate = this.validateRecord(record, operation);

    await this.mutex.runExclusive(candidate.caseId, () =>
      this.guard(operation, candidate.caseId, () =>
        this.client.transaction(() => {
          const stone = this.client.prepare<TombstoneRow>(Q.GET_TOMBSTONE).get(candidate.caseId);
          if (stone !== undefined) {
            throw new CaseRetiredError(candidate.caseId, stone.reason, operation);
          }

          const existing = this.client.prepare<{ version: number }>(Q.GET_CASE_VERSION).get(candidate.caseId);
          const version = existing !== undefined ? existing.version + 1 : candidate.version;

          this.client.prepare(Q.UPSERT_CASE).run(...caseToParams({ ...candidate, version }));
          this.vectorIndex.insert(candidate.caseId, candidate.contextVector);
        })
      )
    );
  }

  async get(caseId: string): Promise<CaseRecord> {
    const found = await this.find(caseId);
    if (found === null) {
      throw new NotFoundError(caseId, 'store.get');
    }
    return found;
  }

  async find(caseId: string): Promise<CaseRecord | null> {
    return this.guard('store.get', caseId, () => this.readCase(caseId));
  }

  async updateFields(caseId: string, mutator: CaseMutator, options: UpdateOptions = {}): Promise<CaseRecord> {
    const operation = 'store.updateFields';

    return this.mutex.runExclusive(caseId, () => {
      for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
        const result = this.guard(operation, caseId, () =>
          this.client.transaction((): UpdateAttempt => {
            const current = this.readCase(caseId);
            if (current === null) {
              throw new NotFoundError(caseId, operation);
            }
            if (options.expectedVersion !== undefined && current.version !== options.expectedVersion) {
              throw new ConcurrentModificationError(caseId, attempt, operation);
            }

            const patch = mutator(current);
            if (patch === null) {
              return { kind: 'done', record: current };
            }

            const next = this.applyPatch(current, patch, operation);
            const info = this.client
              .prepare(Q.UPDATE_CASE_FIELDS)
              .run(...mutableFieldsToParams(next), caseId, current.version);

            return info.changes === 0 ? { kind: 'conflict' } : { kind: 'done', record: next };
          })
        );

        if (result.kind === 'done') {
          return result.record;
        }
        this.logger.debug(`Version conflict updating ${caseId} (attempt ${attempt})`);
      }

      throw new ConcurrentModificationError(caseId, MAX_CAS_ATTEMPTS, operation);
    });
  }

  async delete(caseId: string, options: DeleteOptions = {}): Promise<boolean> {
    const operation = 'store.delete';

    return this.mutex.runExclusive(caseId, () =>
      this.guard(operation, caseId, () =>
        this.client.transaction(() => {
          const existing = this.client.prepare<{ version: number }>(Q.GET_CASE_VERSION).get(caseId);
          if (existing === undefined) return false;
          if (options.expectedVersion !== undefined && existing.version !== options.expectedVersion) {
            return false;
          }

          this.client.prepare(Q.DELETE_CASE).run(caseId);
          this.vectorIndex.remove(caseId);
          this.client
            .prepare(Q.INSERT_TOMBSTONE)
            .run(
              caseId,
              options.reason ?? 'deleted',
              options.consolidationGroup ?? null,
              this.clock().toISOString()
            );
          return true;
        })
      )
    );
  }

  scan(filter: CaseFilter = {}, options: ScanOptions = {}): AsyncIterable<CaseRecord> {
    const { where, params } = buildFilter(filter);
    const pageSize = Math.max(1, Math.floor(options.pageSize ?? DEFAULT_PAGE_SIZE));
    const order = options.order ?? 'asc';
    const limit = options.limit ?? Infinity;

    return {
      [Symbol.asyncIterator]: () => this.pages(where, params, pageSize, order, limit),
    };
  }

  async count(filter: CaseFilter = {}): Promise<number> {
    const { where, params } = buildFilter(filter);
    return this.guard('store.count', undefined, () => {
      const row = this.client.prepare<{ count: number }>(Q.countCases(where)).get(...params);
      return row?.count ?? 0;
    });
  }

  async kinds(): Promise<string[]> {
    return this.guard('store.kinds', undefined, () =>
      this.client
        .prepare<{ case_kind: string }>(Q.DISTINCT_KINDS)
        .all()
        .map((r) => r.case_kind)
    );
  }

  async tombstone(caseId: string): Promise<Tombstone | null> {
    return this.guard('store.tombstone', caseId, () => {
      const row = this.client.prepare<TombstoneRow>(Q.GET_TOMBSTONE).get(caseId);
      if (row === undefined) return null;

      const stone: Tombstone = {
        caseId: row.case_id,
        reason: toRetirementReason(row.reason),
        retiredAt: row.retired_at,
      };
      if (row.consolidation_group !== null) stone.consolidationGroup = row.consolidation_group;
      return stone;
    });
  }

  // ==========================================================================
  // Aggregation & audit
  // ==========================================================================

  async aggregate(): Promise<StoreAggregate> {
    return this.guard('store.aggregate', undefined, () => {
      const totals = this.client
        .prepare<{
          total: number;
          avg_success: number;
          avg_importance: number;
          total_usage: number;
          distinct_solutions: number;
          consolidated: number;
          oldest: string | null;
          newest: string | null;
        }>(Q.CASE_TOTALS)
        .get();

      const byKind: Record<string, number> = {};
      for (const row of this.client.prepare<{ key: string; count: number }>(Q.COUNT_BY_KIND).all()) {
        byKind[row.key] = row.count;
      }

      const byScope = { personal: 0, shared: 0 };
      for (const row of this.client.prepare<{ key: string; count: number }>(Q.COUNT_BY_SCOPE).all()) {
        if (row.key === 'personal' || row.key === 'shared') byScope[row.key] = row.count;
      }

      const topTags = this.client
        .prepare<{ tag: string; count: number }>(Q.TOP_TAGS)
        .all(TOP_TAG_COUNT)
        .map((r) => r.tag);

      return {
        totalCases: totals?.total ?? 0,
        byKind,
        byScope,
        averageSuccess: totals?.avg_success ?? 0,
        averageImportance: totals?.avg_importance ?? 0,
        totalUsage: totals?.total_usage ?? 0,
        distinctSolutions: totals?.distinct_solutions ?? 0,
        consolidatedCases: totals?.consolidated ?? 0,
        oldestCase: totals?.oldest ?? null,
        newestCase: totals?.newest ?? null,
        topTags,
      };
    });
  }

  async recordConsolidationGroup(group: ConsolidationGroupRecord): Promise<void> {
    this.guard('store.recordConsolidationGroup', group.representativeId, () => {
      this.client
        .prepare(Q.INSERT_CONSOLIDATION_GROUP)
        .run(group.groupId, group.representativeId, group.caseKind, JSON.stringify(group.memberIds), group.createdAt);
    });
  }

  async consolidationGroup(groupId: string): Promise<ConsolidationGroupRecord | null> {
    return this.guard('store.consolidationGroup', undefined, () => {
      const row = this.client.prepare<GroupRow>(Q.GET_CONSOLIDATION_GROUP).get(groupId);
      if (row === undefined) return null;
      return {
        groupId: row.group_id,
        representativeId: row.representative_id,
        caseKind: row.case_kind,
        memberIds: parseStringList(row.member_ids, 'member_ids'),
        createdAt: row.created_at,
      };
    });
  }

  async startMaintenanceRun(job: MaintenanceJob, startedAt: string): Promise<string> {
    const id = generateRunId(job);
    this.guard('store.startMaintenanceRun', undefined, () => {
      this.client.prepare(Q.INSERT_MAINTENANCE_RUN).run(id, job, startedAt);
    });
    return id;
  }

  async finishMaintenanceRun(runId: string, summary: MaintenanceRunSummary): Promise<void> {
    this.guard('store.finishMaintenanceRun', undefined, () => {
      this.client
        .prepare(Q.FINISH_MAINTENANCE_RUN)
        .run(
          summary.completedAt,
          summary.status,
          summary.casesScanned,
          summary.casesChanged,
          summary.casesRemoved,
          summary.groupsFormed,
          summary.errors,
          summary.error ?? null,
          runId
        );
    });
  }

  async maintenanceTotals(): Promise<MaintenanceTotals> {
    return this.guard('store.maintenanceTotals', undefined, () => {
      const totals: MaintenanceTotals = {
        consolidationRuns: 0,
        casesConsolidated: 0,
        consolidationGroups: 0,
        decayRuns: 0,
        casesDecayed: 0,
        casesEvicted: 0,
        maintenanceErrors: 0,
        lastConsolidationAt: null,
        lastDecayAt: null,
      };

      for (const row of this.client.prepare<TotalsRow>(Q.MAINTENANCE_TOTALS).all()) {
        totals.maintenanceErrors += row.errors;
        if (row.job === 'consolidation') {
          totals.consolidationRuns = row.runs;
          totals.casesConsolidated = row.removed;
          totals.consolidationGroups = row.groups_formed;
          totals.lastConsolidationAt = row.last_completed;
        } else if (row.job === 'decay') {
          totals.decayRuns = row.runs;
          totals.casesDecayed = row.changed;
          totals.casesEvicted = row.removed;
          totals.lastDecayAt = row.last_completed;
        }
      }

      return totals;
    });
  }

  // ==========================================================================
  // Invariants
  // ==========================================================================

  async checkConsistency(): Promise<ConsistencyReport> {
    return this.guard('store.checkConsistency', undefined, () => {
      const caseIds = this.client
        .prepare<{ case_id: string }>(Q.ALL_CASE_IDS)
        .all()
        .map((r) => r.case_id);
      const indexed = new Set(this.vectorIndex.ids());
      const stored = new Set(caseIds);

      const missingVectors = caseIds.filter((id) => !indexed.has(id));
      const orphanVectors = [...indexed].filter((id) => !stored.has(id)).sort();

      return {
        consistent: missingVectors.length === 0 && orphanVectors.length === 0,
        missingVectors,
        orphanVectors,
      };
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async *pages(
    where: string,
    params: unknown[],
    pageSize: number,
    order: 'asc' | 'desc',
    limit: number
  ): AsyncGenerator<CaseRecord> {
    const operation = 'store.scan';
    const bound = this.guard(operation, undefined, () => {
      const row = this.client.prepare<{ max_seq: number }>(Q.MAX_SEQ).get();
      return row?.max_seq ?? 0;
    });

    const sql = Q.scanPage(where, order);
    let cursor = order === 'asc' ? 0 : bound + 1;
    let yielded = 0;

    while (yielded < limit) {
      const take = Math.min(pageSize, limit - yielded);
      const keyset = order === 'asc' ? [cursor, bound] : [cursor];
      const records = this.guard(operation, undefined, () =>
        this.client
          .prepare<CaseRow>(sql)
          .all(...keyset, ...params, take)
          .map((row) => ({ seq: row.seq, record: rowToCase(row) }))
      );

      for (const { seq, record } of records) {
        cursor = seq;
        yielded++;
        yield record;
      }

      if (records.length < take) break;
    }
  }

  private readCase(caseId: string): CaseRecord | null {
    const row = this.client.prepare<CaseRow>(Q.GET_CASE).get(caseId);
    return row === undefined ? null : rowToCase(row);
  }

  private checkDimensions(operation: string): void {
    const stored = this.client.prepare<{ value: string }>(Q.GET_META).get('dimensions');
    if (stored === undefined) {
      this.client.prepare(Q.SET_META).run('dimensions', String(this.dimensions));
      this.client.prepare(Q.SET_META).run('schema_version', String(SCHEMA_VERSION));
      return;
    }

    const expected = Number(stored.value);
    if (expected !== this.dimensions) {
      throw new DimensionMismatchError(expected, this.dimensions, { operation });
    }
  }

  /**
   * Reject malformed records and normalize timestamps
   */
  private validateRecord(record: CaseRecord, operation: string): CaseRecord {
    const context = { operation, caseId: record.caseId };

    if (record.caseId.trim() === '') {
      throw new InvalidRecordError('caseId', 'must not be empty', { operation });
    }
    assertVector(record.contextVector, this.dimensions, context);
    assertUnit('successScore', record.successScore, context);
    assertUnit('importanceScore', record.importanceScore, context);
    assertUsage(record.usageCount, context);
    if (!Number.isInteger(record.version) || record.version < 1) {
      throw new InvalidRecordError('version', `must be a positive integer, got ${record.version}`, context);
    }

    const createdAt = normalizeTimestamp('createdAt', record.createdAt, context);
    const lastUsedAt = latest(normalizeTimestamp('lastUsedAt', record.lastUsedAt, context), createdAt);
    const importanceUpdatedAt = normalizeTimestamp('importanceUpdatedAt', record.importanceUpdatedAt, context);

    const normalized: CaseRecord = {
      ...record,
      contextVector: [...record.contextVector],
      tags: [...new Set(record.tags)],
      createdAt,
      lastUsedAt,
      importanceUpdatedAt,
    };
    if (record.sharedAt !== undefined) {
      normalized.sharedAt = normalizeTimestamp('sharedAt', record.sharedAt, context);
    }
    return normalized;
  }

  /**
   * Merge a partial update into the current record, validating the result
   */
  private applyPatch(current: CaseRecord, patch: CaseFieldUpdate, operation: string): CaseRecord {
    const context = { operation, caseId: current.caseId };
    const next: CaseRecord = { ...current, ...patch, version: current.version + 1 };

    // Optional fields set to undefined in the patch are cleared
    if ('consolidationGroup' in patch && patch.consolidationGroup === undefined) delete next.consolidationGroup;
    if ('sharedAt' in patch && patch.sharedAt === undefined) delete next.sharedAt;

    assertUnit('successScore', next.successScore, context);
    assertUnit('importanceScore', next.importanceScore, context);
    assertUsage(next.usageCount, context);

    next.lastUsedAt = latest(normalizeTimestamp('lastUsedAt', next.lastUsedAt, context), next.createdAt);
    next.importanceUpdatedAt = normalizeTimestamp('importanceUpdatedAt', next.importanceUpdatedAt, context);
    if (next.sharedAt !== undefined) {
      next.sharedAt = normalizeTimestamp('sharedAt', next.sharedAt, context);
    }
    next.tags = [...new Set(next.tags)];

    return next;
  }

  /**
   * Run a synchronous database step, wrapping driver errors with context
   */
  private guard<T>(operation: string, caseId: string | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof CaseMemoryError) throw err;
      throw new IndexUnavailableError(err, { operation, ...(caseId !== undefined && { caseId }) });
    }
  }
}

// ============================================================================
// Filters & validation
// ============================================================================

function buildFilter(filter: CaseFilter): { where: string; params: unknown[] } {
  const clauses: string[] = [];
  const params: unknown[] = [];

  if (filter.caseKind !== undefined) {
    clauses.push('case_kind = ?');
    params.push(filter.caseKind);
  }
  if (filter.ownerId !== undefined) {
    clauses.push('owner_id = ?');
    params.push(filter.ownerId);
  }
  if (filter.scope !== undefined) {
    clauses.push('scope = ?');
    params.push(filter.scope);
  }
  if (filter.visibleTo !== undefined) {
    clauses.push("(scope = 'shared' OR owner_id = ?)");
    params.push(filter.visibleTo);
  }
  if (filter.createdAfter !== undefined) {
    clauses.push('created_at >= ?');
    params.push(normalizeTimestamp('createdAfter', filter.createdAfter, { operation: 'store.scan' }));
  }
  if (filter.createdBefore !== undefined) {
    clauses.push('created_at <= ?');
    params.push(normalizeTimestamp('createdBefore', filter.createdBefore, { operation: 'store.scan' }));
  }
  if (filter.minImportance !== undefined) {
    clauses.push('importance_score >= ?');
    params.push(filter.minImportance);
  }
  if (filter.maxImportance !== undefined) {
    clauses.push('importance_score <= ?');
    params.push(filter.maxImportance);
  }
  if (filter.minSuccess !== undefined) {
    clauses.push('success_score >= ?');
    params.push(filter.minSuccess);
  }
  if (filter.maxSuccess !== undefined) {
    clauses.push('success_score <= ?');
    params.push(filter.maxSuccess);
  }
  if (filter.anyTags !== undefined && filter.anyTags.length > 0) {
    const placeholders = filter.anyTags.map(() => '?').join(', ');
    clauses.push(`EXISTS (SELECT 1 FROM json_each(cases.tags) WHERE json_each.value IN (${placeholders}))`);
    params.push(...filter.anyTags);
  }

  return { where: clauses.join(' AND '), params };
}

function assertUnit(field: string, value: number, context: { operation: string; caseId: string }): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidScoreError(field, value, context);
  }
}

function assertUsage(value: number, context: { operation: string; caseId: string }): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidRecordError('usageCount', `must be a non-negative integer, got ${value}`, context);
  }
}

function normalizeTimestamp(field: string, value: string, context: { operation: string; caseId?: string }): string {
  const time = new Date(value).getTime();
  if (Number.isNaN(time)) {
    throw new InvalidRecordError(field, `'${value}' is not a timestamp`, context);
  }
  return new Date(time).toISOString();
}

function toRetirementReason(value: string): RetirementReason {
  if (value === 'consolidated' || value === 'evicted' || value === 'deleted') return value;
  return 'deleted';
}
