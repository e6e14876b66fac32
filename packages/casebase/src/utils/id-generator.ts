/**
 * ID Generator
 *
 * Generates unique IDs for cases and consolidation groups.
 * Uses a combination of timestamp and random bytes.
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a unique case ID
 * Format: case_<timestamp>_<random>
 */
export function generateCaseId(): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(6).toString('hex');
  return `case_${timestamp}_${random}`;
}

/**
 * Generate a unique consolidation group ID
 */
export function generateGroupId(): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString('hex');
  return `grp_${timestamp}_${random}`;
}

/**
 * Generate a unique maintenance run ID
 */
export function generateRunId(job: string): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString('hex');
  return `${job.slice(0, 5)}_${timestamp}_${random}`;
}
