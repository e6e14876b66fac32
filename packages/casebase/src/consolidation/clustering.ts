/**
 * Similarity Clustering
 *
 * Groups vectors whose pairwise cosine similarity reaches a threshold,
 * transitively, with a union-find over the pair graph.
 */

import type { CaseRecord } from '../types/index.js';
import type { Deadline } from '../utils/deadline.js';

/**
 * Disjoint sets over 0..size-1 with path halving and union by size
 */
export class UnionFind {
  private readonly parent: number[];
  private readonly sizes: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.sizes = new Array<number>(size).fill(1);
  }

  find(x: number): number {
    let node = x;
    for (;;) {
      const parent = this.parent[node] ?? node;
      if (parent === node) return node;
      const grandparent = this.parent[parent] ?? parent;
      this.parent[node] = grandparent;
      node = grandparent;
    }
  }

  union(a: number, b: number): void {
    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) return;

    if ((this.sizes[rootA] ?? 1) < (this.sizes[rootB] ?? 1)) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent[rootB] = rootA;
    this.sizes[rootA] = (this.sizes[rootA] ?? 1) + (this.sizes[rootB] ?? 1);
  }
}

export interface ClusterOptions {
  /** Stop comparing once this deadline passes */
  deadline?: Deadline;
  /** Longest stretch of comparisons before yielding to the event loop (default: 10ms) */
  sliceMs?: number;
}

/**
 * Index groups (size >= 2) of vectors connected by similarity >= threshold.
 * Members are ascending and groups are ordered by their first member.
 *
 * The pairwise pass yields between rows whenever a slice is used up, so
 * callers sharing the event loop keep running. Resolves to null when the
 * deadline passes before every pair was compared.
 */
export async function clusterBySimilarity(
  vectors: readonly (readonly number[])[],
  threshold: number,
  options: ClusterOptions = {}
): Promise<number[][] | null> {
  const sliceMs = options.sliceMs ?? 10;
  const unit = vectors.map(normalize);
  const sets = new UnionFind(unit.length);
  let sliceStart = Date.now();

  for (let i = 0; i < unit.length; i++) {
    if (options.deadline?.expired) return null;

    const a = unit[i];
    if (a === undefined) continue;
    for (let j = i + 1; j < unit.length; j++) {
      const b = unit[j];
      if (b === undefined) continue;
      if (dot(a, b) >= threshold) sets.union(i, j);
    }

    if (Date.now() - sliceStart >= sliceMs) {
      await yieldToEventLoop();
      sliceStart = Date.now();
    }
  }
  if (options.deadline?.expired) return null;

  const groups = new Map<number, number[]>();
  for (let i = 0; i < unit.length; i++) {
    const root = sets.find(i);
    const members = groups.get(root);
    if (members) members.push(i);
    else groups.set(root, [i]);
  }

  return [...groups.values()]
    .filter((members) => members.length >= 2)
    .sort((a, b) => (a[0] ?? 0) - (b[0] ?? 0));
}

/**
 * The case kept for a cluster: highest importance × success, then higher
 * usage, then older, then smaller id
 */
export function chooseRepresentative(members: readonly CaseRecord[]): CaseRecord | undefined {
  let best: CaseRecord | undefined;
  for (const candidate of members) {
    if (best === undefined || outranks(candidate, best)) best = candidate;
  }
  return best;
}

function outranks(a: CaseRecord, b: CaseRecord): boolean {
  const merit = a.importanceScore * a.successScore - b.importanceScore * b.successScore;
  if (merit !== 0) return merit > 0;
  if (a.usageCount !== b.usageCount) return a.usageCount > b.usageCount;
  const age = Date.parse(a.createdAt) - Date.parse(b.createdAt);
  if (age !== 0) return age < 0;
  return a.caseId < b.caseId;
}

function normalize(vector: readonly number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0 || !isFinite(magnitude)) return vector.map(() => 0);
  return vector.map((v) => v / magnitude);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
