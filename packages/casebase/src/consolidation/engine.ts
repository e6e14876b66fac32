/**
 * Consolidation Manager
 *
 * Periodically merges near-duplicate cases. Per case kind:
 * 1. Snapshot the most recent window of cases
 * 2. Cluster them by vector similarity
 * 3. Keep one representative per cluster and retire the rest
 *
 * Members are deleted only at the version captured in the snapshot, so a
 * case touched by a caller or by decay in the meantime is left for the
 * next run. Concurrent calls share one in-flight run.
 */

import type { CaseMemoryConfig } from '../config/config.js';
import { DeadlineExceededError, isCaseMemoryError } from '../errors.js';
import type { ICaseStore } from '../storage/interface.js';
import type { CaseKind, CaseMetadata, CaseRecord, JsonValue } from '../types/index.js';
import { Deadline } from '../utils/deadline.js';
import { generateGroupId } from '../utils/id-generator.js';
import { errorMessage, type Logger } from '../utils/logger.js';
import type { Clock } from '../utils/time.js';
import { chooseRepresentative, clusterBySimilarity } from './clustering.js';

/**
 * Consolidation options
 */
export interface ConsolidationOptions {
  /** Only this kind (default: every kind present) */
  caseKind?: CaseKind;
  /** Report clusters without writing */
  dryRun?: boolean;
  /** Deadline for the whole run (default: config.maintenanceTimeoutMs) */
  deadlineMs?: number;
}

/**
 * One merged (or, in a dry run, mergeable) cluster
 */
export interface ConsolidationCluster {
  caseKind: CaseKind;
  /** Fresh group id; absent in a dry run */
  groupId?: string;
  representativeId: string;
  /** Cases retired into the representative */
  absorbedIds: string[];
  /** Members left alone because they changed or vanished since the snapshot */
  skippedIds: string[];
}

/**
 * Result of consolidation
 */
export interface ConsolidationResult {
  /** Kinds whose window was examined */
  kindsProcessed: number;
  /** Cases read into snapshots */
  casesScanned: number;
  clusters: ConsolidationCluster[];
  /** Groups written */
  groupsFormed: number;
  /** Cases retired */
  casesRemoved: number;
  /** Clusters that failed */
  errors: number;
  /** Stopped early on its deadline */
  interrupted: boolean;
  dryRun: boolean;
  /** Duration in ms */
  duration: number;
}

export interface ConsolidationDeps {
  store: ICaseStore;
  config: CaseMemoryConfig;
  logger: Logger;
  clock: Clock;
}

/**
 * Consolidation manager
 */
export class ConsolidationManager {
  private inFlight: Promise<ConsolidationResult> | null = null;

  constructor(private readonly deps: ConsolidationDeps) {}

  /**
   * Run consolidation, or join the run already in progress
   */
  consolidate(options: ConsolidationOptions = {}): Promise<ConsolidationResult> {
    if (this.inFlight !== null) {
      this.deps.logger.debug('Consolidation already running; joining the in-flight run');
      return this.inFlight;
    }

    const run = this.run(options).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /** Whether a run is in progress */
  get running(): boolean {
    return this.inFlight !== null;
  }

  private async run(options: ConsolidationOptions): Promise<ConsolidationResult> {
    const { store, config, logger, clock } = this.deps;
    const startTime = Date.now();
    const dryRun = options.dryRun ?? false;
    const deadline = new Deadline(options.deadlineMs ?? config.maintenanceTimeoutMs);

    const result: ConsolidationResult = {
      kindsProcessed: 0,
      casesScanned: 0,
      clusters: [],
      groupsFormed: 0,
      casesRemoved: 0,
      errors: 0,
      interrupted: false,
      dryRun,
      duration: 0,
    };

    const runId = dryRun ? null : await store.startMaintenanceRun('consolidation', clock().toISOString());

    try {
      const kinds = options.caseKind !== undefined ? [options.caseKind] : await store.kinds();

      for (const kind of kinds) {
        if (deadline.expired) {
          result.interrupted = true;
          break;
        }
        await this.consolidateKind(kind, deadline, result);
        if (result.interrupted) break;
      }
    } catch (err) {
      result.duration = Date.now() - startTime;
      if (runId !== null) {
        await store.finishMaintenanceRun(runId, {
          status: 'failed',
          completedAt: clock().toISOString(),
          casesScanned: result.casesScanned,
          casesChanged: result.groupsFormed,
          casesRemoved: result.casesRemoved,
          groupsFormed: result.groupsFormed,
          errors: result.errors + 1,
          error: errorMessage(err),
        });
      }
      throw err;
    }

    result.duration = Date.now() - startTime;
    if (runId !== null) {
      await store.finishMaintenanceRun(runId, {
        status: result.interrupted ? 'interrupted' : 'completed',
        completedAt: clock().toISOString(),
        casesScanned: result.casesScanned,
        casesChanged: result.groupsFormed,
        casesRemoved: result.casesRemoved,
        groupsFormed: result.groupsFormed,
        errors: result.errors,
      });
    }

    if (result.interrupted) {
      logger.warn(
        `Consolidation stopped at its deadline after ${result.groupsFormed} groups; the rest waits for the next run`
      );
    } else if (result.groupsFormed > 0) {
      logger.info(`Consolidated ${result.casesRemoved} cases into ${result.groupsFormed} groups`);
    }

    return result;
  }

  private async consolidateKind(kind: CaseKind, deadline: Deadline, result: ConsolidationResult): Promise<void> {
    const { store, config, logger } = this.deps;

    const snapshot: CaseRecord[] = [];
    for await (const record of store.scan({ caseKind: kind }, { order: 'desc', limit: config.consolidationWindow })) {
      snapshot.push(record);
    }

    result.kindsProcessed++;
    result.casesScanned += snapshot.length;
    if (snapshot.length < config.consolidationMinPopulation) {
      logger.debug(
        `Skipping consolidation of '${kind}': ${snapshot.length} cases, need ${config.consolidationMinPopulation}`
      );
      return;
    }

    const groups = await clusterBySimilarity(
      snapshot.map((r) => r.contextVector),
      config.consolidationThreshold,
      { deadline }
    );
    if (groups === null) {
      result.interrupted = true;
      return;
    }

    for (const indices of groups) {
      if (deadline.expired) {
        result.interrupted = true;
        return;
      }

      const members = indices.flatMap((i) => {
        const record = snapshot[i];
        return record === undefined ? [] : [record];
      });
      const representative = chooseRepresentative(members);
      if (representative === undefined) continue;
      const others = members.filter((m) => m.caseId !== representative.caseId);

      if (result.dryRun) {
        result.clusters.push({
          caseKind: kind,
          representativeId: representative.caseId,
          absorbedIds: others.map((m) => m.caseId),
          skippedIds: [],
        });
        continue;
      }

      try {
        const cluster = await this.merge(kind, representative, others);
        if (cluster === null) continue;
        result.clusters.push(cluster);
        result.groupsFormed++;
        result.casesRemoved += cluster.absorbedIds.length;
      } catch (err) {
        if (err instanceof DeadlineExceededError) throw err;
        result.errors++;
        logger.warn(`Failed to consolidate cluster around ${representative.caseId}: ${errorMessage(err)}`);
      }
    }
  }

  /**
   * Claim the representative, retire the others at their snapshot versions,
   * then record what was absorbed. Null when nothing was merged.
   */
  private async merge(
    kind: CaseKind,
    representative: CaseRecord,
    others: CaseRecord[]
  ): Promise<ConsolidationCluster | null> {
    const { store, logger, clock } = this.deps;
    const groupId = generateGroupId();

    // The representative must still exist before anything is retired into it
    let previousGroup: string | undefined;
    try {
      await store.updateFields(representative.caseId, (current) => {
        previousGroup = current.consolidationGroup;
        return { consolidationGroup: groupId };
      });
    } catch (err) {
      if (isCaseMemoryError(err, 'NOT_FOUND')) {
        logger.debug(`Representative ${representative.caseId} vanished; cluster left for the next run`);
        return null;
      }
      throw err;
    }

    const absorbedIds: string[] = [];
    const skippedIds: string[] = [];
    for (const member of others) {
      const removed = await store.delete(member.caseId, {
        expectedVersion: member.version,
        reason: 'consolidated',
        consolidationGroup: groupId,
      });
      (removed ? absorbedIds : skippedIds).push(member.caseId);
    }

    if (absorbedIds.length === 0) {
      await store.updateFields(representative.caseId, () => ({ consolidationGroup: previousGroup }));
      return null;
    }

    await store.updateFields(representative.caseId, (current) => ({
      metadata: withConsolidatedFrom(current.metadata, absorbedIds),
    }));
    await store.recordConsolidationGroup({
      groupId,
      representativeId: representative.caseId,
      caseKind: kind,
      memberIds: absorbedIds,
      createdAt: clock().toISOString(),
    });

    if (skippedIds.length > 0) {
      logger.debug(`Group ${groupId}: ${skippedIds.length} members changed since the snapshot and were kept`);
    }

    return { caseKind: kind, groupId, representativeId: representative.caseId, absorbedIds, skippedIds };
  }
}

/**
 * Append absorbed ids to `metadata.consolidatedFrom`
 */
function withConsolidatedFrom(metadata: CaseMetadata, absorbedIds: string[]): CaseMetadata {
  const existing: JsonValue | undefined = metadata['consolidatedFrom'];
  const previous = Array.isArray(existing)
    ? existing.filter((id): id is string => typeof id === 'string')
    : [];
  return { ...metadata, consolidatedFrom: [...new Set([...previous, ...absorbedIds])] };
}
