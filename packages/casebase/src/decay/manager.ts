/**
 * Decay Manager
 *
 * Ages the importance of every case and evicts the ones that were never
 * useful. Each write is conditional on the version the decision was made
 * from; on a conflict the case is re-read and decided again. A case that
 * keeps failing is logged and skipped so one bad case cannot stall the
 * cycle.
 */

import type { CaseMemoryConfig } from '../config/config.js';
import { ConcurrentModificationError, DeadlineExceededError, isCaseMemoryError } from '../errors.js';
import type { ICaseStore } from '../storage/interface.js';
import type { CaseRecord } from '../types/index.js';
import { Deadline } from '../utils/deadline.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import type { Clock } from '../utils/time.js';
import { DecayCalculator } from './calculator.js';

/** Attempts per case before it is skipped for this cycle */
const MAX_ATTEMPTS = 3;

export interface DecayOptions {
  /** Deadline for the whole cycle (default: config.maintenanceTimeoutMs) */
  deadlineMs?: number;
}

/**
 * Result of a decay cycle
 */
export interface DecayResult {
  casesScanned: number;
  /** Importance written */
  casesDecayed: number;
  casesEvicted: number;
  /** Already at the decayed value */
  casesUnchanged: number;
  /** Cases skipped after an error */
  errors: number;
  interrupted: boolean;
  /** Duration in ms */
  duration: number;
}

type CaseOutcome = 'decayed' | 'evicted' | 'unchanged' | 'gone';

export interface DecayDeps {
  store: ICaseStore;
  config: CaseMemoryConfig;
  logger: Logger;
  clock: Clock;
}

/**
 * Decay manager
 */
export class DecayManager {
  private readonly calculator: DecayCalculator;
  private inFlight: Promise<DecayResult> | null = null;

  constructor(private readonly deps: DecayDeps) {
    this.calculator = new DecayCalculator({
      decayRate: deps.config.decayRate,
      minImportanceFloor: deps.config.minImportanceFloor,
      retentionDays: deps.config.retentionDays,
    });
  }

  /**
   * Run a decay cycle, or join the one in progress
   */
  decay(options: DecayOptions = {}): Promise<DecayResult> {
    if (this.inFlight !== null) return this.inFlight;

    const run = this.run(options).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  private async run(options: DecayOptions): Promise<DecayResult> {
    const { store, config, logger, clock } = this.deps;
    const startTime = Date.now();
    const deadline = new Deadline(options.deadlineMs ?? config.maintenanceTimeoutMs);
    const result: DecayResult = {
      casesScanned: 0,
      casesDecayed: 0,
      casesEvicted: 0,
      casesUnchanged: 0,
      errors: 0,
      interrupted: false,
      duration: 0,
    };

    const runId = await store.startMaintenanceRun('decay', clock().toISOString());
    const finish = async (status: 'completed' | 'interrupted' | 'failed', error?: string): Promise<void> => {
      result.duration = Date.now() - startTime;
      await store.finishMaintenanceRun(runId, {
        status,
        completedAt: clock().toISOString(),
        casesScanned: result.casesScanned,
        casesChanged: result.casesDecayed,
        casesRemoved: result.casesEvicted,
        groupsFormed: 0,
        errors: result.errors + (status === 'failed' ? 1 : 0),
        ...(error !== undefined && { error }),
      });
    };

    try {
      for await (const record of store.scan()) {
        if (deadline.expired) {
          result.interrupted = true;
          break;
        }
        result.casesScanned++;

        try {
          const outcome = await this.processCase(record);
          if (outcome === 'decayed') result.casesDecayed++;
          else if (outcome === 'evicted') result.casesEvicted++;
          else if (outcome === 'unchanged') result.casesUnchanged++;
        } catch (err) {
          result.errors++;
          logger.warn(`Decay skipped case ${record.caseId}: ${errorMessage(err)}`);
        }
      }
    } catch (err) {
      await finish('failed', errorMessage(err));
      throw err;
    }

    await finish(result.interrupted ? 'interrupted' : 'completed');

    if (result.interrupted) {
      logger.warn(`Decay stopped at its deadline after ${result.casesScanned} cases`);
    } else {
      logger.debug(
        `Decay: ${result.casesDecayed} decayed, ${result.casesEvicted} evicted, ${result.errors} errors`
      );
    }
    return result;
  }

  /**
   * Decay or evict one case, re-deciding from fresh state on conflict
   */
  private async processCase(snapshot: CaseRecord): Promise<CaseOutcome> {
    const { store, clock } = this.deps;
    const operation = 'decay.run';
    let current: CaseRecord | null = snapshot;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      if (current === null) return 'gone';

      const now = clock();
      const decision = this.calculator.calculate(current, now);

      if (decision.evict) {
        const removed = await store.delete(current.caseId, {
          expectedVersion: current.version,
          reason: 'evicted',
        });
        if (removed) return 'evicted';
      } else if (decision.newImportance === current.importanceScore) {
        return 'unchanged';
      } else {
        try {
          await store.updateFields(
            current.caseId,
            () => ({ importanceScore: decision.newImportance, importanceUpdatedAt: now.toISOString() }),
            { expectedVersion: current.version }
          );
          return 'decayed';
        } catch (err) {
          if (err instanceof DeadlineExceededError) throw err;
          if (!isCaseMemoryError(err, 'CONCURRENT_MODIFICATION') && !isCaseMemoryError(err, 'NOT_FOUND')) {
            throw err;
          }
        }
      }

      current = await store.find(snapshot.caseId);
    }

    throw new ConcurrentModificationError(snapshot.caseId, MAX_ATTEMPTS, operation);
  }
}
