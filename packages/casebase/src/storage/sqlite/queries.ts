/**
 * SQLite Prepared Statements
 *
 * Pre-defined SQL queries for common operations.
 */

const CASE_COLUMNS = `
  seq, case_id, problem_context, context_vector, solution_payload, outcome,
  owner_id, case_kind, success_score, importance_score, usage_count, tags,
  created_at, last_used_at, importance_updated_at, consolidation_group,
  scope, shared_at, metadata, payload_hash, version
`;

/**
 * Insert a case, or fully replace the one with the same id.
 * An upsert keeps `seq` stable so the vector row's foreign key is not cascaded.
 */
export const UPSERT_CASE = `
  INSERT INTO cases (
    case_id, problem_context, context_vector, solution_payload, outcome,
    owner_id, case_kind, success_score, importance_score, usage_count, tags,
    created_at, last_used_at, importance_updated_at, consolidation_group,
    scope, shared_at, metadata, payload_hash, version
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT(case_id) DO UPDATE SET
    problem_context = excluded.problem_context,
    context_vector = excluded.context_vector,
    solution_payload = excluded.solution_payload,
    outcome = excluded.outcome,
    owner_id = excluded.owner_id,
    case_kind = excluded.case_kind,
    success_score = excluded.success_score,
    importance_score = excluded.importance_score,
    usage_count = excluded.usage_count,
    tags = excluded.tags,
    created_at = excluded.created_at,
    last_used_at = excluded.last_used_at,
    importance_updated_at = excluded.importance_updated_at,
    consolidation_group = excluded.consolidation_group,
    scope = excluded.scope,
    shared_at = excluded.shared_at,
    metadata = excluded.metadata,
    payload_hash = excluded.payload_hash,
    version = excluded.version
`;

/**
 * Get a case by ID
 */
export const GET_CASE = `
  SELECT ${CASE_COLUMNS} FROM cases WHERE case_id = ?
`;

/**
 * Current version of a case
 */
export const GET_CASE_VERSION = `
  SELECT version FROM cases WHERE case_id = ?
`;

/**
 * Compare-and-swap update of the mutable fields
 */
export const UPDATE_CASE_FIELDS = `
  UPDATE cases SET
    success_score = ?,
    importance_score = ?,
    usage_count = ?,
    tags = ?,
    last_used_at = ?,
    importance_updated_at = ?,
    consolidation_group = ?,
    scope = ?,
    shared_at = ?,
    metadata = ?,
    version = ?
  WHERE case_id = ? AND version = ?
`;

/**
 * Delete a case
 */
export const DELETE_CASE = `
  DELETE FROM cases WHERE case_id = ?
`;

/**
 * Scan page (keyset on seq); the filter clause is spliced in
 */
export function scanPage(where: string, order: 'asc' | 'desc'): string {
  const keyset = order === 'asc' ? 'seq > ? AND seq <= ?' : 'seq < ?';
  const clause = where ? `${keyset} AND ${where}` : keyset;
  return `
    SELECT ${CASE_COLUMNS} FROM cases
    WHERE ${clause}
    ORDER BY seq ${order === 'asc' ? 'ASC' : 'DESC'}
    LIMIT ?
  `;
}

/**
 * Highest sequence number assigned so far
 */
export const MAX_SEQ = `
  SELECT COALESCE(MAX(seq), 0) AS max_seq FROM cases
`;

/**
 * Count cases; the filter clause is spliced in
 */
export function countCases(where: string): string {
  return `SELECT COUNT(*) AS count FROM cases${where ? ` WHERE ${where}` : ''}`;
}

/**
 * Distinct kinds
 */
export const DISTINCT_KINDS = `
  SELECT DISTINCT case_kind FROM cases ORDER BY case_kind
`;

// ============================================================================
// Tombstones
// ============================================================================

export const INSERT_TOMBSTONE = `
  INSERT INTO case_tombstones (case_id, reason, consolidation_group, retired_at)
  VALUES (?, ?, ?, ?)
  ON CONFLICT(case_id) DO NOTHING
`;

export const GET_TOMBSTONE = `
  SELECT case_id, reason, consolidation_group, retired_at
  FROM case_tombstones WHERE case_id = ?
`;

// ============================================================================
// Aggregates
// ============================================================================

export const CASE_TOTALS = `
  SELECT
    COUNT(*) AS total,
    COALESCE(AVG(success_score), 0) AS avg_success,
    COALESCE(AVG(importance_score), 0) AS avg_importance,
    COALESCE(SUM(usage_count), 0) AS total_usage,
    COUNT(DISTINCT payload_hash) AS distinct_solutions,
    COALESCE(SUM(CASE WHEN consolidation_group IS NOT NULL THEN 1 ELSE 0 END), 0) AS consolidated,
    MIN(created_at) AS oldest,
    MAX(created_at) AS newest
  FROM cases
`;

export const COUNT_BY_KIND = `
  SELECT case_kind AS key, COUNT(*) AS count FROM cases GROUP BY case_kind
`;

export const COUNT_BY_SCOPE = `
  SELECT scope AS key, COUNT(*) AS count FROM cases GROUP BY scope
`;

export const TOP_TAGS = `
  SELECT je.value AS tag, COUNT(*) AS count
  FROM cases, json_each(cases.tags) AS je
  GROUP BY je.value
  ORDER BY count DESC, tag ASC
  LIMIT ?
`;

// ============================================================================
// Consolidation groups
// ============================================================================

export const INSERT_CONSOLIDATION_GROUP = `
  INSERT INTO consolidation_groups (group_id, representative_id, case_kind, member_ids, created_at)
  VALUES (?, ?, ?, ?, ?)
`;

export const GET_CONSOLIDATION_GROUP = `
  SELECT group_id, representative_id, case_kind, member_ids, created_at
  FROM consolidation_groups WHERE group_id = ?
`;

// ============================================================================
// Maintenance runs
// ============================================================================

export const INSERT_MAINTENANCE_RUN = `
  INSERT INTO maintenance_runs (id, job, started_at, status) VALUES (?, ?, ?, 'running')
`;

export const FINISH_MAINTENANCE_RUN = `
  UPDATE maintenance_runs SET
    completed_at = ?, status = ?, cases_scanned = ?, cases_changed = ?,
    cases_removed = ?, groups_formed = ?, errors = ?, error = ?
  WHERE id = ?
`;

export const MAINTENANCE_TOTALS = `
  SELECT
    job,
    COUNT(*) AS runs,
    COALESCE(SUM(cases_changed), 0) AS changed,
    COALESCE(SUM(cases_removed), 0) AS removed,
    COALESCE(SUM(groups_formed), 0) AS groups_formed,
    COALESCE(SUM(errors), 0) AS errors,
    MAX(completed_at) AS last_completed
  FROM maintenance_runs
  WHERE status != 'running'
  GROUP BY job
`;

// ============================================================================
// Consistency
// ============================================================================

export const ALL_CASE_IDS = `
  SELECT case_id FROM cases ORDER BY case_id
`;

// ============================================================================
// Schema meta
// ============================================================================

export const GET_META = `SELECT value FROM schema_meta WHERE key = ?`;
export const SET_META = `
  INSERT INTO schema_meta (key, value) VALUES (?, ?)
  ON CONFLICT(key) DO UPDATE SET value = excluded.value
`;
