/**
 * Store/Index Consistency
 *
 * Every stored case has exactly one vector and every vector belongs to a
 * stored case. A divergence is a bug, so this only asserts; nothing repairs.
 */

import { InvariantViolationError } from '../errors.js';
import type { ICaseStore } from './interface.js';

/**
 * Throw InvariantViolationError when store and index membership differ
 */
export async function assertConsistent(store: ICaseStore): Promise<void> {
  const report = await store.checkConsistency();
  if (report.consistent) return;

  const parts: string[] = [];
  if (report.missingVectors.length > 0) {
    parts.push(`cases without vectors: ${report.missingVectors.join(', ')}`);
  }
  if (report.orphanVectors.length > 0) {
    parts.push(`vectors without cases: ${report.orphanVectors.join(', ')}`);
  }
  throw new InvariantViolationError(`Case store and vector index diverged (${parts.join('; ')})`);
}
