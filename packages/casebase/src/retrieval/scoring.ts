/**
 * Retrieval Scoring
 *
 * Blends similarity, recency, success, importance, usage and tag overlap
 * into a combined score, then re-weights it by raw success into the
 * retrieval score used for ranking.
 */

import type { RetrievalWeights } from '../config/config.js';
import { usageFactor } from '../scoring/importance.js';
import type { CaseRecord, ScoredCase } from '../types/index.js';
import { daysBetween } from '../utils/time.js';
import { clamp01 } from '../utils/vector.js';
import { jaccard } from './tags.js';

/**
 * Per-candidate inputs of the blend, each in [0, 1]
 */
export interface RetrievalSignals {
  similarity: number;
  recency: number;
  success: number;
  importance: number;
  usage: number;
  tagOverlap: number;
}

export interface RetrievalScorerConfig {
  weights: RetrievalWeights;
  successWeight: number;
  retentionDays: number;
  usageSaturation: number;
}

/**
 * Retrieval scorer
 */
export class RetrievalScorer {
  constructor(private readonly config: RetrievalScorerConfig) {}

  /**
   * Score a candidate against the query
   */
  score(record: CaseRecord, similarity: number, queryTags: readonly string[], now: Date): ScoredCase {
    const signals = this.signals(record, similarity, queryTags, now);
    const combinedScore = this.combine(signals);
    return {
      case: record,
      score: this.retrievalScore(combinedScore, record.successScore),
      combinedScore,
      similarity,
    };
  }

  signals(record: CaseRecord, similarity: number, queryTags: readonly string[], now: Date): RetrievalSignals {
    const ageDays = daysBetween(record.createdAt, now);
    return {
      similarity: clamp01(similarity),
      recency: Math.max(0, 1 - ageDays / this.config.retentionDays),
      success: record.successScore,
      importance: record.importanceScore,
      usage: usageFactor(record.usageCount, this.config.usageSaturation),
      tagOverlap: jaccard(queryTags, record.tags),
    };
  }

  combine(signals: RetrievalSignals): number {
    const w = this.config.weights;
    return (
      w.similarity * signals.similarity +
      w.recency * signals.recency +
      w.success * signals.success +
      w.importance * signals.importance +
      w.usage * signals.usage +
      w.tagOverlap * signals.tagOverlap
    );
  }

  /**
   * combined·(1 - successWeight) + success·successWeight
   */
  retrievalScore(combined: number, success: number): number {
    const sw = this.config.successWeight;
    return combined * (1 - sw) + success * sw;
  }
}
