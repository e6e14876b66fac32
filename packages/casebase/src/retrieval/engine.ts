/**
 * Retrieval Engine
 *
 * Turns a query context into ranked similar cases:
 * 1. Embed the query and over-fetch nearest neighbours from the index
 * 2. Drop candidates below the similarity gate or outside the filters
 * 3. Score and rank the rest
 * 4. Record usage on the cases actually returned
 */

import type { CaseMemoryConfig } from '../config/config.js';
import { embedWithin } from '../embeddings/guarded.js';
import type { IEmbeddingProvider } from '../embeddings/interface.js';
import {
  CaseMemoryError,
  IndexUnavailableError,
  InvalidRecordError,
  InvalidScoreError,
  isCaseMemoryError,
  type ErrorContext,
} from '../errors.js';
import type { ImportanceScorer } from '../scoring/importance.js';
import type { ICaseStore } from '../storage/interface.js';
import type { CaseKind, CaseRecord, ScoredCase } from '../types/index.js';
import { Deadline } from '../utils/deadline.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import type { Clock } from '../utils/time.js';
import type { VectorMatch } from '../vector/interface.js';
import { ResultRanker } from './ranking.js';
import { RetrievalScorer } from './scoring.js';
import { collectTags } from './tags.js';

/**
 * A retrieval request
 */
export interface RetrievalQuery {
  /** Problem context to match */
  context: string;
  /** Only cases of this kind */
  caseKind?: CaseKind;
  /** Maximum results (default: config.topK) */
  topK?: number;
  /** Minimum cosine similarity (default: config.similarityThreshold) */
  similarityThreshold?: number;
  /** Extra query tags, merged with those extracted from the context */
  tags?: string[];
  /** Restrict to cases visible to this owner */
  ownerId?: string;
  /** Deadline for embedding and index work (default: config.operationTimeoutMs) */
  deadlineMs?: number;
}

/**
 * Counters since the engine was created
 */
export interface RetrievalStats {
  calls: number;
  casesReturned: number;
  misses: number;
}

export interface RetrievalEngineDeps {
  store: ICaseStore;
  embedder: IEmbeddingProvider;
  importance: ImportanceScorer;
  config: CaseMemoryConfig;
  logger: Logger;
  clock: Clock;
}

/**
 * Retrieval engine
 */
export class RetrievalEngine {
  private readonly scorer: RetrievalScorer;
  private readonly ranker = new ResultRanker();
  private readonly counters: RetrievalStats = { calls: 0, casesReturned: 0, misses: 0 };

  constructor(private readonly deps: RetrievalEngineDeps) {
    this.scorer = new RetrievalScorer({
      weights: deps.config.retrievalWeights,
      successWeight: deps.config.successWeight,
      retentionDays: deps.config.retentionDays,
      usageSaturation: deps.config.usageSaturation,
    });
  }

  /**
   * Ranked cases similar to the query context
   */
  async retrieve(query: RetrievalQuery): Promise<ScoredCase[]> {
    const { store, embedder, config } = this.deps;
    const context: ErrorContext = { operation: 'retrieval.retrieve' };

    const topK = query.topK ?? config.topK;
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidRecordError('topK', `must be a positive integer, got ${topK}`, context);
    }
    const threshold = query.similarityThreshold ?? config.similarityThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new InvalidScoreError('similarityThreshold', threshold, context);
    }

    this.counters.calls++;
    const deadline = new Deadline(query.deadlineMs ?? config.operationTimeoutMs);

    if (this.indexSize(context) === 0) {
      this.counters.misses++;
      return [];
    }

    const vector = await embedWithin(embedder, query.context, store.dimensions, deadline, context);
    const matches = await this.queryIndex(vector, topK * config.overFetchFactor, deadline, context);

    const queryTags = collectTags(query.context, query.tags);
    const now = this.deps.clock();
    const scored: ScoredCase[] = [];

    for (const match of matches) {
      const similarity = Math.max(-1, Math.min(1, 1 - match.distance));
      if (similarity < threshold) continue;

      const record = await this.lookup(match.caseId);
      if (record === null) continue;
      if (query.caseKind !== undefined && record.caseKind !== query.caseKind) continue;
      if (query.ownerId !== undefined && !isVisibleTo(record, query.ownerId)) continue;

      scored.push(this.scorer.score(record, similarity, queryTags, now));
    }

    const results: ScoredCase[] = [];
    for (const candidate of this.ranker.rank(scored)) {
      if (results.length >= topK) break;
      const updated = await this.recordUsage(candidate.case.caseId);
      if (updated !== null) {
        results.push({ ...candidate, case: updated });
      }
    }

    this.counters.casesReturned += results.length;
    if (results.length === 0) this.counters.misses++;
    return results;
  }

  stats(): RetrievalStats {
    return { ...this.counters };
  }

  private indexSize(context: ErrorContext): number {
    try {
      return this.deps.store.vectorIndex.size();
    } catch (err) {
      throw new IndexUnavailableError(err, context);
    }
  }

  private async queryIndex(
    vector: number[],
    k: number,
    deadline: Deadline,
    context: ErrorContext
  ): Promise<VectorMatch[]> {
    try {
      return await deadline.race(() => this.deps.store.vectorIndex.query(vector, k), context);
    } catch (err) {
      if (err instanceof CaseMemoryError) throw err;
      throw new IndexUnavailableError(err, context);
    }
  }

  /**
   * Fetch a candidate; a failed lookup skips the candidate
   */
  private async lookup(caseId: string): Promise<CaseRecord | null> {
    try {
      return await this.deps.store.find(caseId);
    } catch (err) {
      this.deps.logger.warn(`Skipping candidate ${caseId}: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Bump usage and recompute importance. Null when the bump failed: a case
   * is only returned once its use is recorded, and the cases already bumped
   * stay bumped because they are returned.
   */
  private async recordUsage(caseId: string): Promise<CaseRecord | null> {
    const { store, importance, clock, logger } = this.deps;
    try {
      return await store.updateFields(caseId, (current) => {
        const now = clock();
        const usageCount = current.usageCount + 1;
        return {
          usageCount,
          lastUsedAt: now.toISOString(),
          importanceScore: importance.score({ ...current, usageCount }, now),
          importanceUpdatedAt: now.toISOString(),
        };
      });
    } catch (err) {
      if (isCaseMemoryError(err, 'NOT_FOUND')) {
        logger.info(`Case ${caseId} disappeared before its usage was recorded; dropped from results`);
      } else {
        logger.warn(`Could not record usage of ${caseId}; dropped from results: ${errorMessage(err)}`);
      }
      return null;
    }
  }
}

/**
 * Own personal cases and every shared case
 */
export function isVisibleTo(record: CaseRecord, ownerId: string): boolean {
  return record.scope === 'shared' || record.ownerId === ownerId;
}
