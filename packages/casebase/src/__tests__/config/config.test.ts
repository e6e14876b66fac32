/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, resolveConfig } from '../../config/config.js';
import { ConfigError } from '../../errors.js';
import { MAX_TIMER_DELAY_MS } from '../../utils/deadline.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig();

    expect(config.similarityThreshold).toBe(0.7);
    expect(config.successWeight).toBe(0.3);
    expect(config.topK).toBe(5);
    expect(config.retentionDays).toBe(30);
    expect(config.decayRate).toBe(0.1);
    expect(config.minImportanceFloor).toBe(0.1);
    expect(config.consolidationThreshold).toBe(0.9);
    expect(config.consolidationMinPopulation).toBe(10);
    expect(config.consolidationIntervalMs).toBe(6 * 60 * 60 * 1000);
    expect(config.decayIntervalMs).toBe(60 * 60 * 1000);
    expect(config.learningRate).toBe(0.3);
  });

  it('should normalize retrieval weights to sum 1', () => {
    const config = resolveConfig({
      retrievalWeights: { similarity: 1, recency: 1, success: 1, importance: 1, usage: 0, tagOverlap: 0 },
    });

    expect(config.retrievalWeights).toEqual({
      similarity: 0.25,
      recency: 0.25,
      success: 0.25,
      importance: 0.25,
      usage: 0,
      tagOverlap: 0,
    });
  });

  it('should keep the default retrieval weights', () => {
    const w = resolveConfig().retrievalWeights;

    expect(w.similarity).toBeCloseTo(0.35, 10);
    expect(w.tagOverlap).toBeCloseTo(0.05, 10);
  });

  it('should reject all-zero retrieval weights', () => {
    expect(() =>
      resolveConfig({
        retrievalWeights: { similarity: 0, recency: 0, success: 0, importance: 0, usage: 0, tagOverlap: 0 },
      })
    ).toThrow(ConfigError);
  });

  it('should name the offending key', () => {
    try {
      resolveConfig({ similarityThreshold: 1.5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^similarityThreshold: /);
      }
    }
  });

  it('should reject importance components summing above 1', () => {
    expect(() => resolveConfig({ importanceWeights: { success: 0.5, usage: 0.5, recency: 0.5 } })).toThrow(
      ConfigError
    );
  });

  it('should reject a consolidation population below 2', () => {
    expect(() => resolveConfig({ consolidationMinPopulation: 1 })).toThrow(ConfigError);
  });

  it('should reject intervals and timeouts that timers cannot represent', () => {
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;

    try {
      resolveConfig({
        decayIntervalMs: thirtyDays,
        consolidationIntervalMs: thirtyDays,
        operationTimeoutMs: thirtyDays,
        maintenanceTimeoutMs: thirtyDays,
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((issue) => issue.split(':')[0])).toEqual([
          'consolidationIntervalMs',
          'decayIntervalMs',
          'operationTimeoutMs',
          'maintenanceTimeoutMs',
        ]);
      }
    }
  });

  it('should accept the largest timer delay', () => {
    expect(resolveConfig({ decayIntervalMs: MAX_TIMER_DELAY_MS }).decayIntervalMs).toBe(MAX_TIMER_DELAY_MS);
  });
});

describe('loadConfigFromEnv', () => {
  it('should read CASEBASE_* variables', () => {
    const config = loadConfigFromEnv({
      CASEBASE_TOP_K: '8',
      CASEBASE_SIMILARITY_THRESHOLD: '0.5',
      CASEBASE_DB_PATH: ' /tmp/cases.db ',
    });

    expect(config.topK).toBe(8);
    expect(config.similarityThreshold).toBe(0.5);
    expect(config.dbPath).toBe('/tmp/cases.db');
  });

  it('should layer the environment over the base config', () => {
    const config = loadConfigFromEnv({ CASEBASE_TOP_K: '3' }, { topK: 9, retentionDays: 10 });

    expect(config.topK).toBe(3);
    expect(config.retentionDays).toBe(10);
  });

  it('should ignore blank variables', () => {
    expect(loadConfigFromEnv({ CASEBASE_TOP_K: '  ' }).topK).toBe(5);
  });

  it('should reject non-numeric values', () => {
    try {
      loadConfigFromEnv({ CASEBASE_TOP_K: 'many' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(["CASEBASE_TOP_K: expected a number, got 'many'"]);
      }
    }
  });
});
