/**
 * Shared test fixtures
 */

import type { IEmbeddingProvider } from '../embeddings/interface.js';
import { SQLiteCaseStore } from '../storage/sqlite/storage.js';
import type { CaseRecord } from '../types/index.js';

export const DIMS = 4;
export const NOW = new Date('2026-03-01T00:00:00.000Z');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Clock the test moves by hand
 */
export class ManualClock {
  current: Date;

  constructor(start: Date = NOW) {
    this.current = start;
  }

  readonly now = (): Date => this.current;

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * MS_PER_DAY);
  }
}

export function daysBefore(date: Date, days: number): string {
  return new Date(date.getTime() - days * MS_PER_DAY).toISOString();
}

/**
 * Unit vector whose cosine similarity to [1, 0, 0, 0] is `similarity`
 */
export function vectorAt(similarity: number): number[] {
  return [similarity, Math.sqrt(1 - similarity * similarity), 0, 0];
}

export const QUERY_VECTOR = [1, 0, 0, 0];

/**
 * Embedder backed by a fixed text → vector table
 */
export class StubEmbedder implements IEmbeddingProvider {
  readonly name = 'stub';

  calls = 0;
  failWith: Error | null = null;
  delayMs = 0;

  private readonly vectors = new Map<string, number[]>();

  constructor(readonly dimensions: number = DIMS) {}

  set(text: string, vector: number[]): this {
    this.vectors.set(text, vector);
    return this;
  }

  async initialize(): Promise<void> {}

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    if (this.failWith !== null) {
      throw this.failWith;
    }
    const vector = this.vectors.get(text);
    if (vector === undefined) {
      throw new Error(`no vector registered for '${text}'`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embed(t)));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * A valid case created at NOW
 */
export function makeCase(overrides: Partial<CaseRecord> = {}): CaseRecord {
  const createdAt = overrides.createdAt ?? NOW.toISOString();
  return {
    caseId: 'case-1',
    problemContext: 'build fails with OOM',
    contextVector: QUERY_VECTOR,
    solutionPayload: 'raise the heap limit',
    ownerId: 'agent-a',
    caseKind: 'error-fix',
    successScore: 0.5,
    importanceScore: 0.5,
    usageCount: 0,
    tags: [],
    createdAt,
    lastUsedAt: createdAt,
    importanceUpdatedAt: createdAt,
    scope: 'personal',
    metadata: {},
    payloadHash: 'hash',
    version: 1,
    ...overrides,
  };
}

export async function openStore(clock: ManualClock, dimensions: number = DIMS): Promise<SQLiteCaseStore> {
  const store = new SQLiteCaseStore({ dbPath: ':memory:', dimensions, clock: clock.now });
  await store.initialize();
  return store;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Promise resolved from outside
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
