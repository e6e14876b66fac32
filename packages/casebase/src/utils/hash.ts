/**
 * Hashing Utilities
 */

import { createHash } from 'node:crypto';

/**
 * Hash an opaque payload.
 * Returns first 16 characters of SHA-256 hash
 */
export function hashPayload(payload: string): string {
  return createHash('sha256').update(payload).digest('hex').slice(0, 16);
}
