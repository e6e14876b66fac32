/**
 * Storage Factory
 *
 * Creates case store instances based on configuration.
 */

import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/time.js';
import type { ICaseStore } from './interface.js';
import { SQLiteCaseStore } from './sqlite/storage.js';

/**
 * Default SQLite path
 */
export const DEFAULT_SQLITE_PATH = '.casebase/cases.db';

/**
 * Storage configuration
 */
export interface StorageConfig {
  /** SQLite database path, or ':memory:' */
  sqlitePath?: string;
  /** Vector dimensionality */
  dimensions: number;
  /** Use sqlite-vec when available (default: true) */
  vectorSearch?: boolean;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Create and initialize a case store
 */
export async function createCaseStore(config: StorageConfig): Promise<ICaseStore> {
  const store = new SQLiteCaseStore({
    dbPath: config.sqlitePath || DEFAULT_SQLITE_PATH,
    dimensions: config.dimensions,
    ...(config.vectorSearch !== undefined && { vectorSearch: config.vectorSearch }),
    ...(config.logger !== undefined && { logger: config.logger }),
    ...(config.clock !== undefined && { clock: config.clock }),
  });
  await store.initialize();
  return store;
}
