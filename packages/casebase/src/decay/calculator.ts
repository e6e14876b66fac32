/**
 * Decay Calculator
 *
 * Exponential importance decay with a floor, and the eviction rule for
 * cases that are old, fully decayed and never used.
 */

import type { CaseRecord } from '../types/index.js';
import { daysBetween } from '../utils/time.js';
import { clamp01 } from '../utils/vector.js';

/** Decay rate is expressed per 30 days */
const DECAY_PERIOD_DAYS = 30;

export interface DecayConfig {
  decayRate: number;
  minImportanceFloor: number;
  retentionDays: number;
}

/**
 * Decay outcome for one case
 */
export interface DecayDecision {
  /** Days since creation */
  ageDays: number;
  /** Days since importance was last written */
  elapsedDays: number;
  /** Multiplier applied to importance */
  factor: number;
  newImportance: number;
  /** Remove the case instead of persisting the new importance */
  evict: boolean;
}

/**
 * Decay calculator
 */
export class DecayCalculator {
  constructor(private readonly config: DecayConfig) {}

  /**
   * Decide how a case decays at `now`
   */
  calculate(
    record: Pick<CaseRecord, 'createdAt' | 'importanceUpdatedAt' | 'importanceScore' | 'usageCount'>,
    now: Date
  ): DecayDecision {
    const { decayRate, minImportanceFloor, retentionDays } = this.config;

    const ageDays = daysBetween(record.createdAt, now);
    const elapsedDays = daysBetween(record.importanceUpdatedAt, now);
    const factor = Math.exp((-decayRate * elapsedDays) / DECAY_PERIOD_DAYS);
    const newImportance = clamp01(Math.max(record.importanceScore * factor, minImportanceFloor));

    const evict = ageDays > retentionDays && newImportance <= minImportanceFloor && record.usageCount === 0;

    return { ageDays, elapsedDays, factor, newImportance, evict };
  }
}
