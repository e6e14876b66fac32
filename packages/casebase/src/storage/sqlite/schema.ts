/**
 * SQLite Schema Definition
 *
 * - Cases with their scores, sharing state and write version
 * - Case vectors (owned by the vector index, cascade with the case)
 * - Tombstones of retired cases
 * - Consolidation groups (audit)
 * - Maintenance run history
 */

/**
 * Main schema SQL
 */
export const SCHEMA = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

-- seq orders cases by insertion and bounds scans; never reused
CREATE TABLE IF NOT EXISTS cases (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  case_id TEXT NOT NULL UNIQUE,
  problem_context TEXT NOT NULL,
  context_vector TEXT NOT NULL,  -- JSON array
  solution_payload TEXT NOT NULL,
  outcome TEXT,
  owner_id TEXT NOT NULL,
  case_kind TEXT NOT NULL,

  success_score REAL NOT NULL CHECK (success_score >= 0 AND success_score <= 1),
  importance_score REAL NOT NULL CHECK (importance_score >= 0 AND importance_score <= 1),
  usage_count INTEGER NOT NULL DEFAULT 0 CHECK (usage_count >= 0),
  tags TEXT NOT NULL DEFAULT '[]',  -- JSON array

  created_at TEXT NOT NULL,
  last_used_at TEXT NOT NULL,
  importance_updated_at TEXT NOT NULL,

  consolidation_group TEXT,
  scope TEXT NOT NULL DEFAULT 'personal' CHECK (scope IN ('personal', 'shared')),
  shared_at TEXT,

  metadata TEXT NOT NULL DEFAULT '{}',  -- JSON object
  payload_hash TEXT NOT NULL,
  version INTEGER NOT NULL DEFAULT 1
);

CREATE TABLE IF NOT EXISTS case_tombstones (
  case_id TEXT PRIMARY KEY,
  reason TEXT NOT NULL CHECK (reason IN ('consolidated', 'evicted', 'deleted')),
  consolidation_group TEXT,
  retired_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS consolidation_groups (
  group_id TEXT PRIMARY KEY,
  representative_id TEXT NOT NULL,
  case_kind TEXT NOT NULL,
  member_ids TEXT NOT NULL,  -- JSON array of absorbed case ids
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS maintenance_runs (
  id TEXT PRIMARY KEY,
  job TEXT NOT NULL CHECK (job IN ('consolidation', 'decay')),
  started_at TEXT NOT NULL,
  completed_at TEXT,
  cases_scanned INTEGER DEFAULT 0,
  cases_changed INTEGER DEFAULT 0,
  cases_removed INTEGER DEFAULT 0,
  groups_formed INTEGER DEFAULT 0,
  errors INTEGER DEFAULT 0,
  status TEXT DEFAULT 'running' CHECK (status IN ('running', 'completed', 'interrupted', 'failed')),
  error TEXT
);

CREATE INDEX IF NOT EXISTS idx_cases_kind ON cases(case_kind);
CREATE INDEX IF NOT EXISTS idx_cases_owner ON cases(owner_id);
CREATE INDEX IF NOT EXISTS idx_cases_scope ON cases(scope);
CREATE INDEX IF NOT EXISTS idx_cases_created_at ON cases(created_at);
CREATE INDEX IF NOT EXISTS idx_cases_importance ON cases(importance_score);
CREATE INDEX IF NOT EXISTS idx_maintenance_job ON maintenance_runs(job, status);
`;

/**
 * Vector table. Embeddings are little-endian float32 blobs, the format
 * sqlite-vec reads natively.
 */
export const VECTOR_SCHEMA = `
CREATE TABLE IF NOT EXISTS case_vectors (
  case_id TEXT PRIMARY KEY,
  embedding BLOB NOT NULL,
  FOREIGN KEY (case_id) REFERENCES cases(case_id) ON DELETE CASCADE
);
`;

/**
 * Schema version for migrations
 */
export const SCHEMA_VERSION = 1;
