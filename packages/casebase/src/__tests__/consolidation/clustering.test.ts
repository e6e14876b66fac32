/**
 * Clustering Tests
 */

import { describe, it, expect } from 'vitest';
import { chooseRepresentative, clusterBySimilarity } from '../../consolidation/clustering.js';
import { Deadline } from '../../utils/deadline.js';
import { makeCase, vectorAt } from '../helpers.js';

/** Deterministic pseudo-random vectors; pairwise similarity stays far below 0.99 */
function scatter(count: number, dimensions: number): number[][] {
  return Array.from({ length: count }, (_, i) =>
    Array.from({ length: dimensions }, (_, d) => {
      const x = Math.sin((i + 1) * 12.9898 + (d + 1) * 78.233) * 43758.5453;
      return x - Math.floor(x) - 0.5;
    })
  );
}

async function maxEventLoopGap(work: Promise<unknown>): Promise<number> {
  let done = false;
  let last = performance.now();
  let max = 0;
  const tick = (): void => {
    const now = performance.now();
    max = Math.max(max, now - last);
    last = now;
    if (!done) setImmediate(tick);
  };
  setImmediate(tick);

  await work;
  done = true;
  return max;
}

describe('clusterBySimilarity', () => {
  it('should join vectors transitively', async () => {
    // 0 and 4 reach only 0.73 with each other, 0.93 each with 2
    const groups = await clusterBySimilarity(
      [[1, 0, 0, 0], [0, 0, 1, 0], vectorAt(0.93), [0, 0, 0, 1], vectorAt(0.7298)],
      0.9
    );

    expect(groups).toEqual([[0, 2, 4]]);
  });

  it('should let other callbacks run between rows', async () => {
    const order: string[] = [];

    const work = clusterBySimilarity(scatter(4, 8), 0.9, { sliceMs: 0 }).then(() => order.push('clustered'));
    setImmediate(() => order.push('caller'));
    await work;

    expect(order).toEqual(['caller', 'clustered']);
  });

  it('should resolve to null once the deadline has passed', async () => {
    let now = 0;
    const deadline = new Deadline(10, () => now);
    now = 20;

    expect(await clusterBySimilarity([[1, 0], [1, 0]], 0.9, { deadline })).toBeNull();
  });

  it('should keep the event loop responsive on a large window', async () => {
    const work = clusterBySimilarity(scatter(2000, 64), 0.99);

    const gap = await maxEventLoopGap(work);

    expect(await work).toEqual([]);
    expect(gap).toBeLessThan(100);
  });
});

describe('chooseRepresentative', () => {
  it('should prefer importance × success, then usage', () => {
    const chosen = chooseRepresentative([
      makeCase({ caseId: 'a', importanceScore: 0.5, successScore: 0.5 }),
      makeCase({ caseId: 'b', importanceScore: 0.9, successScore: 0.5 }),
      makeCase({ caseId: 'c', importanceScore: 0.9, successScore: 0.5, usageCount: 3 }),
    ]);

    expect(chosen?.caseId).toBe('c');
  });

  it('should return undefined for no members', () => {
    expect(chooseRepresentative([])).toBeUndefined();
  });
});
