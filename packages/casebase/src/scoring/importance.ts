/**
 * Importance Scorer
 *
 * Importance is a pure function of a case: a base value plus weighted
 * success, saturating usage, one-year recency and novelty, clamped to
 * [0, 1]. It is recomputed after every mutation that feeds it and never
 * cached.
 */

import type { ImportanceWeights } from '../config/config.js';
import type { CaseRecord } from '../types/index.js';
import { daysBetween } from '../utils/time.js';
import { clamp01 } from '../utils/vector.js';
import { markedNovelty, type NoveltyHeuristic } from './novelty.js';

const RECENCY_HORIZON_DAYS = 365;

/**
 * Fields the scorer reads
 */
export type ScorableCase = Pick<CaseRecord, 'successScore' | 'usageCount' | 'createdAt' | 'solutionPayload'>;

/**
 * Importance factors breakdown
 */
export interface ImportanceFactors {
  /** Saturating usage factor in [0, 1] */
  usage: number;
  /** One-year linear recency in [0, 1] */
  recency: number;
  /** Novelty heuristic output in [0, 1] */
  novelty: number;
  /** Final clamped importance */
  importance: number;
}

/**
 * Importance scorer
 */
export class ImportanceScorer {
  constructor(
    private readonly weights: ImportanceWeights,
    private readonly usageSaturation: number,
    private readonly novelty: NoveltyHeuristic = markedNovelty
  ) {}

  /**
   * Importance of a case at `now`
   */
  score(record: ScorableCase, now: Date): number {
    return this.calculate(record, now).importance;
  }

  /**
   * Importance with its factors
   */
  calculate(record: ScorableCase, now: Date): ImportanceFactors {
    const usage = usageFactor(record.usageCount, this.usageSaturation);
    const ageDays = daysBetween(record.createdAt, now);
    const recency = Math.max(0, 1 - ageDays / RECENCY_HORIZON_DAYS);
    const novelty = clamp01(this.novelty(record.solutionPayload));

    const importance = clamp01(
      this.weights.base +
        clamp01(record.successScore) * this.weights.success +
        usage * this.weights.usage +
        recency * this.weights.recency +
        novelty * this.weights.novelty
    );

    return { usage, recency, novelty, importance };
  }
}

/**
 * min(usage / saturation, 1)
 */
export function usageFactor(usageCount: number, saturation: number): number {
  if (saturation <= 0) return 1;
  return Math.min(Math.max(usageCount, 0) / saturation, 1);
}
