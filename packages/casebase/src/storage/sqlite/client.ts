/**
 * SQLite Client
 *
 * One better-sqlite3 connection per store. File databases run in WAL mode
 * with a busy timeout so a second process can read while this one writes;
 * sqlite-vec is loaded when available and its absence is reported, not
 * thrown.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { errorMessage, silentLogger, type Logger } from '../../utils/logger.js';

export interface SQLiteClientConfig {
  /** Path to the database file, or ':memory:' */
  dbPath: string;
  /** Enable WAL mode for file databases (default: true) */
  walMode?: boolean;
  /** Enforce foreign keys (default: true) */
  foreignKeys?: boolean;
  /** Try to load sqlite-vec (default: true) */
  vectorSearch?: boolean;
  /** Milliseconds to wait on a locked database (default: 5000) */
  busyTimeoutMs?: number;
  logger?: Logger;
}

const IN_MEMORY = ':memory:';

export class SQLiteClient {
  private readonly db: DatabaseType;
  private readonly vectorSearch: boolean;

  constructor(config: SQLiteClientConfig) {
    const logger = config.logger ?? silentLogger;
    const inMemory = config.dbPath === IN_MEMORY;

    if (!inMemory) {
      mkdirSync(dirname(config.dbPath), { recursive: true });
    }
    this.db = new Database(config.dbPath);

    if ((config.walMode ?? true) && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma(`foreign_keys = ${(config.foreignKeys ?? true) ? 'ON' : 'OFF'}`);
    this.db.pragma(`busy_timeout = ${Math.floor(config.busyTimeoutMs ?? 5000)}`);

    this.vectorSearch = (config.vectorSearch ?? true) && loadVectorExtension(this.db, logger);
  }

  /** Whether sqlite-vec functions are available on this connection */
  get vecEnabled(): boolean {
    return this.vectorSearch;
  }

  /** Database file path, or ':memory:' */
  get path(): string {
    return this.db.name;
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  prepare<Row = unknown>(sql: string): Database.Statement<unknown[], Row> {
    return this.db.prepare<unknown[], Row>(sql);
  }

  /**
   * Run `fn` in a transaction that takes the write lock up front, so a
   * read-modify-write inside it cannot interleave with another writer.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function loadVectorExtension(db: DatabaseType, logger: Logger): boolean {
  try {
    sqliteVec.load(db);
    return true;
  } catch (err) {
    logger.warn(`sqlite-vec not available, falling back to exact search: ${errorMessage(err)}`);
    return false;
  }
}
