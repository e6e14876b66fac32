/**
 * SQLite Case Store Tests
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  CaseRetiredError,
  ConcurrentModificationError,
  DimensionMismatchError,
  InvalidRecordError,
  InvalidScoreError,
  InvalidVectorError,
  NotFoundError,
} from '../../errors.js';
import { assertConsistent } from '../../storage/consistency.js';
import { SQLiteCaseStore } from '../../storage/sqlite/storage.js';
import type { CaseRecord } from '../../types/index.js';
import { collect, daysBefore, makeCase, ManualClock, NOW, openStore } from '../helpers.js';

describe('SQLiteCaseStore', () => {
  let clock: ManualClock;
  let store: SQLiteCaseStore;

  beforeEach(async () => {
    clock = new ManualClock();
    store = await openStore(clock);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('put / get', () => {
    it('should round-trip every field', async () => {
      const record: CaseRecord = makeCase({
        caseId: 'full',
        contextVector: [0.6, 0.8, 0, 0],
        outcome: 'heap raised, build green',
        successScore: 0.75,
        importanceScore: 0.4,
        usageCount: 3,
        tags: ['build', 'oom'],
        createdAt: '2026-02-01T10:00:00.000Z',
        lastUsedAt: '2026-02-10T10:00:00.000Z',
        importanceUpdatedAt: '2026-02-10T10:00:00.000Z',
        consolidationGroup: 'grp_1',
        scope: 'shared',
        sharedAt: '2026-02-02T00:00:00.000Z',
        metadata: { source: 'ci', attempts: 2, nested: { ok: true, list: [1, null] } },
      });

      await store.put(record);

      expect(await store.get('full')).toEqual(record);
    });

    it('should leave optional fields absent', async () => {
      await store.put(makeCase());

      const got = await store.get('case-1');
      expect('outcome' in got).toBe(false);
      expect('consolidationGroup' in got).toBe(false);
      expect('sharedAt' in got).toBe(false);
    });

    it('should replace an existing case and bump its version', async () => {
      await store.put(makeCase());
      await store.put(makeCase({ successScore: 0.2 }));

      const got = await store.get('case-1');
      expect(got.successScore).toBe(0.2);
      expect(got.version).toBe(2);
      expect(await store.count()).toBe(1);
    });

    it('should normalize timestamps and keep lastUsedAt at or after createdAt', async () => {
      await store.put(
        makeCase({
          createdAt: '2026-02-01T10:00:00+02:00',
          lastUsedAt: '2026-01-01T00:00:00.000Z',
        })
      );

      const got = await store.get('case-1');
      expect(got.createdAt).toBe('2026-02-01T08:00:00.000Z');
      expect(got.lastUsedAt).toBe('2026-02-01T08:00:00.000Z');
    });

    it('should dedupe tags', async () => {
      await store.put(makeCase({ tags: ['a', 'b', 'a'] }));

      expect((await store.get('case-1')).tags).toEqual(['a', 'b']);
    });

    it('should throw NotFoundError for a missing case', async () => {
      await expect(store.get('missing')).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.find('missing')).resolves.toBeNull();
    });
  });

  describe('validation', () => {
    it.each<[string, Partial<CaseRecord>, new (...args: never[]) => Error]>([
      ['success above 1', { successScore: 1.5 }, InvalidScoreError],
      ['negative importance', { importanceScore: -0.1 }, InvalidScoreError],
      ['NaN success', { successScore: Number.NaN }, InvalidScoreError],
      ['fractional usage', { usageCount: 1.5 }, InvalidRecordError],
      ['negative usage', { usageCount: -1 }, InvalidRecordError],
      ['empty id', { caseId: '  ' }, InvalidRecordError],
      ['unparsable timestamp', { createdAt: 'yesterday' }, InvalidRecordError],
      ['wrong dimension', { contextVector: [1, 0, 0] }, DimensionMismatchError],
      ['zero vector', { contextVector: [0, 0, 0, 0] }, InvalidVectorError],
      ['non-finite vector', { contextVector: [1, Number.POSITIVE_INFINITY, 0, 0] }, InvalidVectorError],
    ])('should reject %s', async (_, overrides, errorType) => {
      await expect(store.put(makeCase(overrides))).rejects.toBeInstanceOf(errorType);
      expect(await store.count()).toBe(0);
      expect(store.vectorIndex.size()).toBe(0);
    });
  });

  describe('updateFields', () => {
    beforeEach(async () => {
      await store.put(makeCase());
    });

    it('should apply the patch and bump the version', async () => {
      const updated = await store.updateFields('case-1', () => ({ successScore: 0.9 }));

      expect(updated.successScore).toBe(0.9);
      expect(updated.version).toBe(2);
      expect(await store.get('case-1')).toEqual(updated);
    });

    it('should leave the case untouched when the mutator returns null', async () => {
      const result = await store.updateFields('case-1', () => null);

      expect(result.version).toBe(1);
      expect((await store.get('case-1')).version).toBe(1);
    });

    it('should hand the mutator the current state', async () => {
      await store.updateFields('case-1', (c) => ({ usageCount: c.usageCount + 1 }));
      const second = await store.updateFields('case-1', (c) => ({ usageCount: c.usageCount + 1 }));

      expect(second.usageCount).toBe(2);
    });

    it('should serialize concurrent updates of one case', async () => {
      await Promise.all(
        Array.from({ length: 20 }, () => store.updateFields('case-1', (c) => ({ usageCount: c.usageCount + 1 })))
      );

      const got = await store.get('case-1');
      expect(got.usageCount).toBe(20);
      expect(got.version).toBe(21);
    });

    it('should refuse a stale expected version', async () => {
      await store.updateFields('case-1', () => ({ successScore: 0.6 }));

      await expect(
        store.updateFields('case-1', () => ({ successScore: 0.1 }), { expectedVersion: 1 })
      ).rejects.toBeInstanceOf(ConcurrentModificationError);
      expect((await store.get('case-1')).successScore).toBe(0.6);
    });

    it('should reject an invalid patch without writing', async () => {
      await expect(store.updateFields('case-1', () => ({ importanceScore: 2 }))).rejects.toBeInstanceOf(
        InvalidScoreError
      );

      const got = await store.get('case-1');
      expect(got.importanceScore).toBe(0.5);
      expect(got.version).toBe(1);
    });

    it('should clear an optional field patched to undefined', async () => {
      await store.updateFields('case-1', () => ({ consolidationGroup: 'grp_x' }));
      await store.updateFields('case-1', () => ({ consolidationGroup: undefined }));

      expect((await store.get('case-1')).consolidationGroup).toBeUndefined();
    });

    it('should throw NotFoundError for a missing case', async () => {
      await expect(store.updateFields('nope', () => ({ usageCount: 1 }))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    beforeEach(async () => {
      await store.put(makeCase());
    });

    it('should remove the case and its vector and leave a tombstone', async () => {
      expect(await store.delete('case-1')).toBe(true);

      await expect(store.get('case-1')).rejects.toBeInstanceOf(NotFoundError);
      expect(store.vectorIndex.has('case-1')).toBe(false);
      expect(await store.tombstone('case-1')).toEqual({
        caseId: 'case-1',
        reason: 'deleted',
        retiredAt: NOW.toISOString(),
      });
    });

    it('should return false for a missing case', async () => {
      await store.delete('case-1');

      expect(await store.delete('case-1')).toBe(false);
    });

    it('should keep a case whose version moved on', async () => {
      await store.updateFields('case-1', () => ({ usageCount: 1 }));

      expect(await store.delete('case-1', { expectedVersion: 1 })).toBe(false);
      expect(await store.find('case-1')).not.toBeNull();
    });

    it('should record the reason and group', async () => {
      await store.delete('case-1', { reason: 'consolidated', consolidationGroup: 'grp_9' });

      expect(await store.tombstone('case-1')).toMatchObject({ reason: 'consolidated', consolidationGroup: 'grp_9' });
    });

    it('should never accept a retired id again', async () => {
      await store.delete('case-1');

      await expect(store.put(makeCase())).rejects.toBeInstanceOf(CaseRetiredError);
      expect(await store.count()).toBe(0);
    });
  });

  describe('scan', () => {
    beforeEach(async () => {
      for (const id of ['c1', 'c2', 'c3', 'c4', 'c5']) {
        await store.put(makeCase({ caseId: id }));
      }
    });

    const ids = (records: CaseRecord[]): string[] => records.map((r) => r.caseId);

    it('should yield cases in insertion order across pages', async () => {
      expect(ids(await collect(store.scan({}, { pageSize: 2 })))).toEqual(['c1', 'c2', 'c3', 'c4', 'c5']);
    });

    it('should yield newest first in descending order', async () => {
      expect(ids(await collect(store.scan({}, { order: 'desc', pageSize: 2 })))).toEqual([
        'c5',
        'c4',
        'c3',
        'c2',
        'c1',
      ]);
    });

    it('should stop at the limit', async () => {
      expect(ids(await collect(store.scan({}, { order: 'desc', limit: 3 })))).toEqual(['c5', 'c4', 'c3']);
    });

    it('should exclude cases inserted after iteration starts and reflect later writes', async () => {
      const seen: CaseRecord[] = [];

      for await (const record of store.scan({}, { pageSize: 2 })) {
        seen.push(record);
        if (record.caseId === 'c1') {
          await store.put(makeCase({ caseId: 'c6' }));
          await store.delete('c4');
          await store.updateFields('c3', () => ({ successScore: 0.9 }));
        }
      }

      expect(ids(seen)).toEqual(['c1', 'c2', 'c3', 'c5']);
      expect(seen[2]?.successScore).toBe(0.9);
    });

    it('should restart from the beginning on each iteration', async () => {
      const scan = store.scan({}, { pageSize: 2 });

      expect(ids(await collect(scan))).toEqual(['c1', 'c2', 'c3', 'c4', 'c5']);
      expect(ids(await collect(scan))).toEqual(['c1', 'c2', 'c3', 'c4', 'c5']);
    });
  });

  describe('filters', () => {
    beforeEach(async () => {
      await store.put(
        makeCase({ caseId: 'a', caseKind: 'decision', ownerId: 'alice', tags: ['db'], importanceScore: 0.9 })
      );
      await store.put(
        makeCase({ caseId: 'b', caseKind: 'error-fix', ownerId: 'bob', tags: ['db', 'cache'], scope: 'shared' })
      );
      await store.put(
        makeCase({ caseId: 'c', caseKind: 'error-fix', ownerId: 'bob', tags: ['ui'], createdAt: daysBefore(NOW, 10) })
      );
    });

    const idsFor = async (filter: Parameters<SQLiteCaseStore['scan']>[0]): Promise<string[]> =>
      (await collect(store.scan(filter))).map((r) => r.caseId);

    it('should filter by kind', async () => {
      expect(await idsFor({ caseKind: 'error-fix' })).toEqual(['b', 'c']);
    });

    it('should show own and shared cases to an owner', async () => {
      expect(await idsFor({ visibleTo: 'alice' })).toEqual(['a', 'b']);
    });

    it('should match any of the given tags', async () => {
      expect(await idsFor({ anyTags: ['cache', 'ui'] })).toEqual(['b', 'c']);
    });

    it('should filter by creation time', async () => {
      expect(await idsFor({ createdAfter: daysBefore(NOW, 1) })).toEqual(['a', 'b']);
      expect(await idsFor({ createdBefore: daysBefore(NOW, 5) })).toEqual(['c']);
    });

    it('should filter by importance', async () => {
      expect(await store.count({ minImportance: 0.8 })).toBe(1);
    });

    it('should list distinct kinds', async () => {
      expect(await store.kinds()).toEqual(['decision', 'error-fix']);
    });
  });

  describe('aggregate', () => {
    it('should summarize the stored cases', async () => {
      await store.put(makeCase({ caseId: 'a', successScore: 0.2, tags: ['db', 'cache'], usageCount: 1 }));
      await store.put(makeCase({ caseId: 'b', successScore: 0.4, tags: ['db'], scope: 'shared' }));
      await store.put(
        makeCase({ caseId: 'c', successScore: 0.6, caseKind: 'decision', tags: ['ui'], payloadHash: 'other' })
      );

      const stats = await store.aggregate();

      expect(stats.totalCases).toBe(3);
      expect(stats.byKind).toEqual({ 'error-fix': 2, decision: 1 });
      expect(stats.byScope).toEqual({ personal: 2, shared: 1 });
      expect(stats.averageSuccess).toBeCloseTo(0.4, 10);
      expect(stats.totalUsage).toBe(1);
      expect(stats.distinctSolutions).toBe(2);
      expect(stats.topTags).toEqual(['db', 'cache', 'ui']);
    });

    it('should report an empty store', async () => {
      const stats = await store.aggregate();

      expect(stats.totalCases).toBe(0);
      expect(stats.byScope).toEqual({ personal: 0, shared: 0 });
      expect(stats.oldestCase).toBeNull();
      expect(stats.topTags).toEqual([]);
    });
  });

  describe('maintenance history', () => {
    it('should total finished runs per job', async () => {
      const decayRun = await store.startMaintenanceRun('decay', NOW.toISOString());
      await store.finishMaintenanceRun(decayRun, {
        status: 'completed',
        completedAt: NOW.toISOString(),
        casesScanned: 10,
        casesChanged: 4,
        casesRemoved: 2,
        groupsFormed: 0,
        errors: 1,
      });
      const merge = await store.startMaintenanceRun('consolidation', NOW.toISOString());
      await store.finishMaintenanceRun(merge, {
        status: 'completed',
        completedAt: NOW.toISOString(),
        casesScanned: 10,
        casesChanged: 1,
        casesRemoved: 3,
        groupsFormed: 1,
        errors: 0,
      });
      await store.startMaintenanceRun('decay', NOW.toISOString());

      expect(await store.maintenanceTotals()).toEqual({
        consolidationRuns: 1,
        casesConsolidated: 3,
        consolidationGroups: 1,
        decayRuns: 1,
        casesDecayed: 4,
        casesEvicted: 2,
        maintenanceErrors: 1,
        lastConsolidationAt: NOW.toISOString(),
        lastDecayAt: NOW.toISOString(),
      });
    });
  });

  describe('consistency', () => {
    it('should keep cases and vectors in lockstep', async () => {
      await store.put(makeCase({ caseId: 'a' }));
      await store.put(makeCase({ caseId: 'b' }));
      await store.delete('a');

      expect(await store.checkConsistency()).toEqual({ consistent: true, missingVectors: [], orphanVectors: [] });
      await expect(assertConsistent(store)).resolves.toBeUndefined();
      expect(store.vectorIndex.ids()).toEqual(['b']);
    });
  });
});

describe('SQLiteCaseStore on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'casebase-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should persist cases across reopen', async () => {
    const dbPath = join(dir, 'nested', 'cases.db');
    const first = new SQLiteCaseStore({ dbPath, dimensions: 4 });
    await first.initialize();
    await first.put(makeCase());
    await first.close();

    const second = new SQLiteCaseStore({ dbPath, dimensions: 4 });
    await second.initialize();
    expect((await second.get('case-1')).solutionPayload).toBe('raise the heap limit');
    await second.close();
  });

  it('should refuse to open with a different dimension', async () => {
    const dbPath = join(dir, 'cases.db');
    const first = new SQLiteCaseStore({ dbPath, dimensions: 4 });
    await first.initialize();
    await first.close();

    const second = new SQLiteCaseStore({ dbPath, dimensions: 8 });
    const error = await second.initialize().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DimensionMismatchError);
    expect(error).toMatchObject({ expected: 4, actual: 8 });
  });
});
