/**
 * Case Memory Configuration
 *
 * One validated structure holds every tunable of the memory: retrieval
 * gates and weights, importance weights, decay and consolidation
 * parameters, maintenance intervals and deadlines.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { MAX_TIMER_DELAY_MS } from '../utils/deadline.js';

const unit = z.number().min(0).max(1);
const positive = z.number().positive().finite();
const positiveInt = z.number().int().positive();
/** Delays handed to setTimeout/setInterval */
const timerMs = positive.max(MAX_TIMER_DELAY_MS, {
  message: `must be at most ${MAX_TIMER_DELAY_MS}ms (about 24.8 days)`,
});

/**
 * Weights of the retrieval blend. Normalized to sum 1 after validation.
 */
export const RetrievalWeightsSchema = z
  .object({
    similarity: unit.default(0.35),
    recency: unit.default(0.15),
    success: unit.default(0.2),
    importance: unit.default(0.15),
    usage: unit.default(0.1),
    tagOverlap: unit.default(0.05),
  })
  .refine((w) => sumOf(w) > 0, { message: 'retrieval weights must not all be zero' })
  .transform((w) => {
    const total = sumOf(w);
    return {
      similarity: w.similarity / total,
      recency: w.recency / total,
      success: w.success / total,
      importance: w.importance / total,
      usage: w.usage / total,
      tagOverlap: w.tagOverlap / total,
    };
  });

/**
 * Importance formula: base plus weighted components, at most 1 before clamping
 */
export const ImportanceWeightsSchema = z
  .object({
    base: unit.default(0.1),
    success: unit.default(0.35),
    usage: unit.default(0.2),
    recency: unit.default(0.15),
    novelty: unit.default(0.2),
  })
  .refine((w) => w.success + w.usage + w.recency + w.novelty <= 1 + 1e-9, {
    message: 'importance component weights must sum to at most 1',
  });

export const CaseMemoryConfigSchema = z.object({
  /** SQLite database path; ':memory:' for an ephemeral store */
  dbPath: z.string().min(1).default('.casebase/cases.db'),

  // Retrieval
  /** Hard gate on cosine similarity */
  similarityThreshold: unit.default(0.7),
  /** Share of the final score taken by raw success */
  successWeight: unit.default(0.3),
  /** Default number of cases returned */
  topK: positiveInt.default(5),
  /** Index over-fetch multiplier compensating for post-filtering */
  overFetchFactor: positiveInt.default(3),
  retrievalWeights: RetrievalWeightsSchema.default({}),

  // Scoring
  importanceWeights: ImportanceWeightsSchema.default({}),
  /** Usage count at which the usage component saturates */
  usageSaturation: positive.default(10),
  /** EMA learning rate for success updates */
  learningRate: z.number().gt(0).max(1).default(0.3),

  // Decay & retention
  /** Recency horizon for retrieval and eviction age */
  retentionDays: positive.default(30),
  decayRate: z.number().min(0).finite().default(0.1),
  minImportanceFloor: unit.default(0.1),

  // Consolidation
  consolidationThreshold: unit.default(0.9),
  /** Minimum cases of one kind before consolidation runs */
  consolidationMinPopulation: z.number().int().min(2).default(10),
  /** Most recent cases per kind considered in one run */
  consolidationWindow: z.number().int().min(2).default(1000),

  // Maintenance & deadlines
  consolidationIntervalMs: timerMs.default(6 * 60 * 60 * 1000),
  decayIntervalMs: timerMs.default(60 * 60 * 1000),
  /** Deadline for operations touching the embedding function or the index */
  operationTimeoutMs: timerMs.default(5000),
  /** Deadline for one maintenance run */
  maintenanceTimeoutMs: timerMs.default(5 * 60 * 1000),
});

export type CaseMemoryConfig = z.output<typeof CaseMemoryConfigSchema>;
export type CaseMemoryConfigInput = z.input<typeof CaseMemoryConfigSchema>;
export type RetrievalWeights = CaseMemoryConfig['retrievalWeights'];
export type ImportanceWeights = CaseMemoryConfig['importanceWeights'];

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: CaseMemoryConfigInput = {}): CaseMemoryConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): CaseMemoryConfig {
  const result = CaseMemoryConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Environment variable → config key
 */
const ENV_KEYS = {
  CASEBASE_DB_PATH: 'dbPath',
  CASEBASE_SIMILARITY_THRESHOLD: 'similarityThreshold',
  CASEBASE_SUCCESS_WEIGHT: 'successWeight',
  CASEBASE_TOP_K: 'topK',
  CASEBASE_RETENTION_DAYS: 'retentionDays',
  CASEBASE_CONSOLIDATION_THRESHOLD: 'consolidationThreshold',
  CASEBASE_DECAY_RATE: 'decayRate',
  CASEBASE_MIN_IMPORTANCE_FLOOR: 'minImportanceFloor',
  CASEBASE_CONSOLIDATION_INTERVAL_MS: 'consolidationIntervalMs',
  CASEBASE_DECAY_INTERVAL_MS: 'decayIntervalMs',
  CASEBASE_OPERATION_TIMEOUT_MS: 'operationTimeoutMs',
} as const;

/**
 * Read configuration from CASEBASE_* environment variables, layered over `base`
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: CaseMemoryConfigInput = {}
): CaseMemoryConfig {
  const fromEnv: Record<string, string | number> = {};
  const issues: string[] = [];

  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;

    if (key === 'dbPath') {
      fromEnv[key] = raw.trim();
      continue;
    }

    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push(`${name}: expected a number, got '${raw}'`);
      continue;
    }
    fromEnv[key] = value;
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return parseConfig({ ...base, ...fromEnv });
}

function sumOf(weights: Record<string, number>): number {
  return Object.values(weights).reduce((acc, w) => acc + w, 0);
}
