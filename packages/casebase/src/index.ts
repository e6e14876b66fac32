/**
 * Casebase - Case Memory for Agents
 *
 * Records problem → solution → outcome episodes and retrieves the most
 * relevant past cases for a new problem, while keeping the store bounded
 * by consolidating near-duplicates and decaying what is never used.
 *
 * @packageDocumentation
 */

// Main CaseMemory class
export {
  CaseMemory,
  type CaseMemoryOptions,
  type StoreCaseInput,
  type StoreOptions,
  type RetrieveOptions,
  type RecentCasesOptions,
  type TagSearchOptions,
  type ImportResult,
} from './case-memory.js';

// Types & errors
export * from './types/index.js';
export * from './errors.js';

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Vector index
export * from './vector/index.js';

// Embeddings
export * from './embeddings/index.js';

// Scoring
export * from './scoring/index.js';

// Retrieval
export * from './retrieval/index.js';

// Consolidation
export * from './consolidation/index.js';

// Decay
export * from './decay/index.js';

// Maintenance
export * from './maintenance/index.js';

// Logging
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
export type { Clock } from './utils/time.js';
