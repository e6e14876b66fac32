/**
 * Case Memory
 *
 * Main entry point for the case-based solution memory.
 * Records problem → solution → outcome episodes and retrieves the most
 * relevant ones for a new problem, with consolidation and decay running
 * in the background.
 */

import { resolveConfig, type CaseMemoryConfig, type CaseMemoryConfigInput } from './config/config.js';
import {
  ConsolidationManager,
  type ConsolidationOptions,
  type ConsolidationResult,
} from './consolidation/engine.js';
import { DecayManager, type DecayOptions, type DecayResult } from './decay/manager.js';
import {
  autoDetectEmbeddingProvider,
  createEmbeddingProvider,
  type EmbeddingConfig,
} from './embeddings/factory.js';
import { embedWithin } from './embeddings/guarded.js';
import type { IEmbeddingProvider } from './embeddings/interface.js';
import {
  DimensionMismatchError,
  InvalidRecordError,
  InvalidScoreError,
  type ErrorContext,
} from './errors.js';
import { MaintenanceScheduler, type JobStatus } from './maintenance/scheduler.js';
import { RetrievalEngine, type RetrievalQuery } from './retrieval/engine.js';
import { collectTags, normalizeTags } from './retrieval/tags.js';
import { ImportanceScorer } from './scoring/importance.js';
import type { NoveltyHeuristic } from './scoring/novelty.js';
import { createCaseStore } from './storage/factory.js';
import type { ICaseStore } from './storage/interface.js';
import { CaseRecordSchema } from './storage/record-schema.js';
import type {
  CaseInsights,
  CaseKind,
  CaseMetadata,
  CaseRecord,
  CaseScope,
  MaintenanceJob,
  ScoredCase,
} from './types/index.js';
import { Deadline } from './utils/deadline.js';
import { hashPayload } from './utils/hash.js';
import { generateCaseId } from './utils/id-generator.js';
import { createConsoleLogger, errorMessage, type Logger } from './utils/logger.js';
import { subtractDays, systemClock, type Clock } from './utils/time.js';
import { clamp01 } from './utils/vector.js';

const MAX_RECENT_CASES = 20;

/**
 * Case memory options
 */
export interface CaseMemoryOptions {
  /** Tunables; validated, defaults filled in */
  config?: CaseMemoryConfigInput;
  /** Embedding provider, or configuration to create one (default: auto-detect) */
  embeddings?: IEmbeddingProvider | EmbeddingConfig;
  /** Case store (default: SQLite at config.dbPath) */
  store?: ICaseStore;
  logger?: Logger;
  clock?: Clock;
  /** Novelty heuristic for importance (default: markedNovelty) */
  novelty?: NoveltyHeuristic;
  /** Start the maintenance timers right away (default: false) */
  startMaintenance?: boolean;
}

/**
 * A new case
 */
export interface StoreCaseInput {
  /** Problem context; embedded and tagged */
  context: string;
  /** Opaque solution payload */
  solution: string;
  /** Initial outcome quality in [0, 1] */
  successScore: number;
  ownerId: string;
  caseKind: CaseKind;
  /** Tags added to those extracted from the context */
  tags?: string[];
  outcome?: string;
  metadata?: CaseMetadata;
  /** Default: personal */
  scope?: CaseScope;
}

/**
 * Retrieval options
 */
export type RetrieveOptions = Omit<RetrievalQuery, 'context'>;

export interface StoreOptions {
  /** Deadline for embedding the context (default: config.operationTimeoutMs) */
  deadlineMs?: number;
}

export interface RecentCasesOptions {
  /** Look-back window (default: 7) */
  days?: number;
  /** Maximum cases, at most 20 (default: 10) */
  limit?: number;
  /** Only cases visible to this owner */
  ownerId?: string;
}

export interface TagSearchOptions {
  /** Maximum cases (default: 5) */
  limit?: number;
  caseKind?: CaseKind;
  /** Only cases visible to this owner */
  ownerId?: string;
}

/**
 * Outcome of `importCases`
 */
export interface ImportResult {
  imported: number;
  failed: number;
  errors: Array<{ index: number; caseId?: string; message: string }>;
}

/**
 * Case memory instance
 */
export class CaseMemory {
  /** Validated configuration */
  readonly config: CaseMemoryConfig;
  /** Case store */
  readonly store: ICaseStore;
  /** Embedding provider */
  readonly embeddings: IEmbeddingProvider;
  /** Retrieval engine */
  readonly retrieval: RetrievalEngine;
  /** Consolidation manager */
  readonly consolidation: ConsolidationManager;
  /** Decay manager */
  readonly decayManager: DecayManager;
  /** Maintenance scheduler */
  readonly scheduler: MaintenanceScheduler;

  private readonly importance: ImportanceScorer;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private constructor(
    config: CaseMemoryConfig,
    store: ICaseStore,
    embeddings: IEmbeddingProvider,
    logger: Logger,
    clock: Clock,
    novelty?: NoveltyHeuristic
  ) {
    this.config = config;
    this.store = store;
    this.embeddings = embeddings;
    this.logger = logger;
    this.clock = clock;

    this.importance = new ImportanceScorer(config.importanceWeights, config.usageSaturation, novelty);
    this.retrieval = new RetrievalEngine({ store, embedder: embeddings, importance: this.importance, config, logger, clock });
    this.consolidation = new ConsolidationManager({ store, config, logger, clock });
    this.decayManager = new DecayManager({ store, config, logger, clock });
    this.scheduler = new MaintenanceScheduler(
      {
        consolidation: () => this.consolidation.consolidate(),
        decay: () => this.decayManager.decay(),
      },
      { consolidationIntervalMs: config.consolidationIntervalMs, decayIntervalMs: config.decayIntervalMs },
      logger
    );
  }

  /**
   * Create a new case memory
   */
  static async create(options: CaseMemoryOptions = {}): Promise<CaseMemory> {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? createConsoleLogger({ level: 'warn' });
    const clock = options.clock ?? systemClock;

    const embeddings = await resolveEmbeddings(options.embeddings, logger);

    const store =
      options.store ??
      (await createCaseStore({ sqlitePath: config.dbPath, dimensions: embeddings.dimensions, logger, clock }));
    if (store.dimensions !== embeddings.dimensions) {
      await store.close();
      throw new DimensionMismatchError(store.dimensions, embeddings.dimensions, { operation: 'memory.create' });
    }

    const memory = new CaseMemory(config, store, embeddings, logger, clock, options.novelty);
    if (options.startMaintenance) {
      memory.startMaintenance();
    }
    return memory;
  }

  // ==========================================================================
  // Write path
  // ==========================================================================

  /**
   * Record a new case; returns its id
   */
  async storeCase(input: StoreCaseInput, options: StoreOptions = {}): Promise<string> {
    const context: ErrorContext = { operation: 'memory.storeCase' };
    if (input.context.trim() === '') {
      throw new InvalidRecordError('context', 'must not be empty', context);
    }
    if (input.ownerId.trim() === '') {
      throw new InvalidRecordError('ownerId', 'must not be empty', context);
    }
    if (input.caseKind.trim() === '') {
      throw new InvalidRecordError('caseKind', 'must not be empty', context);
    }
    assertUnitScore('successScore', input.successScore, context);

    const deadline = new Deadline(options.deadlineMs ?? this.config.operationTimeoutMs);
    const vector = await embedWithin(this.embeddings, input.context, this.store.dimensions, deadline, context);

    const now = this.clock();
    const timestamp = now.toISOString();
    const scope = input.scope ?? 'personal';
    const record: CaseRecord = {
      caseId: generateCaseId(),
      problemContext: input.context,
      contextVector: vector,
      solutionPayload: input.solution,
      ownerId: input.ownerId,
      caseKind: input.caseKind,
      successScore: input.successScore,
      importanceScore: 0,
      usageCount: 0,
      tags: collectTags(input.context, input.tags),
      createdAt: timestamp,
      lastUsedAt: timestamp,
      importanceUpdatedAt: timestamp,
      scope,
      metadata: input.metadata ?? {},
      payloadHash: hashPayload(input.solution),
      version: 1,
    };
    if (input.outcome !== undefined) record.outcome = input.outcome;
    if (scope === 'shared') record.sharedAt = timestamp;
    record.importanceScore = this.importance.score(record, now);

    await this.store.put(record);
    this.logger.debug(`Stored case ${record.caseId} (${record.caseKind})`);
    return record.caseId;
  }

  /**
   * Blend an observed outcome into the success score (EMA)
   */
  async updateSuccess(caseId: string, observed: number): Promise<CaseRecord> {
    assertUnitScore('observed', observed, { operation: 'memory.updateSuccess', caseId });
    const alpha = this.config.learningRate;

    return this.store.updateFields(caseId, (current) => {
      const now = this.clock();
      const successScore = clamp01((1 - alpha) * current.successScore + alpha * observed);
      return {
        successScore,
        importanceScore: this.importance.score({ ...current, successScore }, now),
        importanceUpdatedAt: now.toISOString(),
      };
    });
  }

  /**
   * Make a case visible to every owner
   */
  async shareCase(caseId: string): Promise<CaseRecord> {
    return this.store.updateFields(caseId, (current) => {
      if (current.scope === 'shared') return null;
      return { scope: 'shared', sharedAt: this.clock().toISOString() };
    });
  }

  /**
   * Delete a case; false when it did not exist
   */
  async forgetCase(caseId: string): Promise<boolean> {
    return this.store.delete(caseId, { reason: 'deleted' });
  }

  // ==========================================================================
  // Read path
  // ==========================================================================

  /**
   * Ranked cases similar to `context`; records usage on those returned
   */
  async retrieveSimilar(context: string, options: RetrieveOptions = {}): Promise<ScoredCase[]> {
    return this.retrieval.retrieve({ ...options, context });
  }

  /**
   * Retrieval for callers that must never fail: errors degrade to no guidance
   */
  async guidance(context: string, options: RetrieveOptions = {}): Promise<ScoredCase[]> {
    try {
      return await this.retrieveSimilar(context, options);
    } catch (err) {
      this.logger.warn(`No guidance available: ${errorMessage(err)}`);
      return [];
    }
  }

  /**
   * Read a case; throws NotFoundError
   */
  async getCase(caseId: string): Promise<CaseRecord> {
    return this.store.get(caseId);
  }

  /**
   * Most recently stored cases
   */
  async recentCases(options: RecentCasesOptions = {}): Promise<CaseRecord[]> {
    const days = options.days ?? 7;
    const limit = Math.min(Math.max(1, Math.floor(options.limit ?? 10)), MAX_RECENT_CASES);

    const cases: CaseRecord[] = [];
    const scan = this.store.scan(
      {
        createdAfter: subtractDays(this.clock(), days),
        ...(options.ownerId !== undefined && { visibleTo: options.ownerId }),
      },
      { order: 'desc', limit }
    );
    for await (const record of scan) {
      cases.push(record);
    }
    return cases;
  }

  /**
   * Cases sharing any of `tags`, by number of shared tags then success
   */
  async searchByTags(tags: string[], options: TagSearchOptions = {}): Promise<CaseRecord[]> {
    const wanted = normalizeTags(tags);
    if (wanted.length === 0) return [];
    const limit = Math.max(1, Math.floor(options.limit ?? 5));

    const matches: Array<{ record: CaseRecord; overlap: number }> = [];
    const scan = this.store.scan({
      anyTags: wanted,
      ...(options.caseKind !== undefined && { caseKind: options.caseKind }),
      ...(options.ownerId !== undefined && { visibleTo: options.ownerId }),
    });
    for await (const record of scan) {
      const overlap = record.tags.filter((t) => wanted.includes(t)).length;
      matches.push({ record, overlap });
    }

    return matches
      .sort(
        (a, b) =>
          b.overlap - a.overlap ||
          b.record.successScore - a.record.successScore ||
          (a.record.caseId < b.record.caseId ? -1 : 1)
      )
      .slice(0, limit)
      .map((m) => m.record);
  }

  /**
   * Aggregate statistics
   */
  async getInsights(): Promise<CaseInsights> {
    const [aggregate, maintenance] = await Promise.all([this.store.aggregate(), this.store.maintenanceTotals()]);
    return {
      ...aggregate,
      maintenance,
      retrievals: this.retrieval.stats(),
      vectorIndex: this.store.vectorIndex.name,
      dimensions: this.store.dimensions,
    };
  }

  // ==========================================================================
  // Export / import
  // ==========================================================================

  /**
   * Every stored case as plain records
   */
  async exportCases(): Promise<CaseRecord[]> {
    const cases: CaseRecord[] = [];
    for await (const record of this.store.scan()) {
      cases.push(record);
    }
    return cases;
  }

  /**
   * Insert exported records, keeping their ids and scores.
   * Each record is validated on its own; failures are counted, not thrown.
   */
  async importCases(records: readonly unknown[]): Promise<ImportResult> {
    const result: ImportResult = { imported: 0, failed: 0, errors: [] };

    for (const [index, raw] of records.entries()) {
      const parsed = CaseRecordSchema.safeParse(raw);
      if (!parsed.success) {
        result.failed++;
        const issue = parsed.error.issues[0];
        result.errors.push({
          index,
          message: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid record',
        });
        continue;
      }

      const record: CaseRecord = parsed.data;
      try {
        await this.store.put(record);
        result.imported++;
      } catch (err) {
        result.failed++;
        result.errors.push({ index, caseId: record.caseId, message: errorMessage(err) });
      }
    }

    if (result.failed > 0) {
      this.logger.warn(`Imported ${result.imported} cases, ${result.failed} failed`);
    }
    return result;
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Run consolidation now
   */
  async consolidate(options: ConsolidationOptions = {}): Promise<ConsolidationResult> {
    return this.consolidation.consolidate(options);
  }

  /**
   * Run a decay cycle now
   */
  async decay(options: DecayOptions = {}): Promise<DecayResult> {
    return this.decayManager.decay(options);
  }

  startMaintenance(): void {
    this.scheduler.start();
  }

  async stopMaintenance(): Promise<void> {
    await this.scheduler.stop();
  }

  maintenanceStatus(): Record<MaintenanceJob, JobStatus> {
    return this.scheduler.stats();
  }

  /**
   * Stop maintenance and close the store
   */
  async close(): Promise<void> {
    await this.scheduler.stop();
    await this.store.close();
  }
}

async function resolveEmbeddings(
  embeddings: IEmbeddingProvider | EmbeddingConfig | undefined,
  logger: Logger
): Promise<IEmbeddingProvider> {
  if (embeddings === undefined) {
    return autoDetectEmbeddingProvider(process.env, logger);
  }
  if ('embed' in embeddings) {
    await embeddings.initialize();
    return embeddings;
  }
  return createEmbeddingProvider(embeddings);
}

function assertUnitScore(field: string, value: number, context: ErrorContext): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidScoreError(field, value, context);
  }
}
