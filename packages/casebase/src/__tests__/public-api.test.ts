/**
 * Public API Tests
 *
 * Drives the package entry point the way a consumer would, with the
 * offline embedder and an in-memory database.
 */

import { describe, it, expect } from 'vitest';
import {
  CaseMemory,
  ExactVectorIndex,
  HashingEmbeddingProvider,
  NotFoundError,
  SqliteVecIndex,
  resolveConfig,
  silentLogger,
} from '../index.js';

describe('package entry point', () => {
  it('should expose the defaults', () => {
    expect(resolveConfig()).toMatchObject({ similarityThreshold: 0.7, topK: 5, successWeight: 0.3 });
  });

  it('should store and recall a case with the hashing embedder', async () => {
    const memory = await CaseMemory.create({
      config: { dbPath: ':memory:' },
      embeddings: { type: 'hashing', dimensions: 64 },
      logger: silentLogger,
    });

    try {
      expect(memory.embeddings).toBeInstanceOf(HashingEmbeddingProvider);
      expect([ExactVectorIndex, SqliteVecIndex].some((Index) => memory.store.vectorIndex instanceof Index)).toBe(
        true
      );

      const caseId = await memory.storeCase({
        context: 'database connection pool exhausted under load',
        solution: 'cap concurrent queries and raise the pool size',
        successScore: 0.8,
        ownerId: 'agent-a',
        caseKind: 'error-fix',
      });

      const [match] = await memory.retrieveSimilar('database connection pool exhausted under load');

      expect(match?.case.caseId).toBe(caseId);
      expect(match?.similarity).toBeCloseTo(1, 5);
      await expect(memory.getCase('case_missing')).rejects.toBeInstanceOf(NotFoundError);
    } finally {
      await memory.close();
    }
  });
});
