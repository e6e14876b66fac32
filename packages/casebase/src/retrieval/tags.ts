/**
 * Tag Extraction
 *
 * Tags are the distinctive words of a problem context. The same extractor
 * runs at store time and at query time so overlap is measured on equal
 * terms.
 */

import { tokenize } from '../utils/text.js';

const MAX_TAGS = 16;
const MIN_TAG_LENGTH = 3;

const STOPWORDS = new Set([
  'the', 'and', 'for', 'with', 'that', 'this', 'from', 'was', 'were', 'are',
  'but', 'not', 'has', 'have', 'had', 'its', 'into', 'when', 'then', 'than',
  'there', 'their', 'which', 'while', 'after', 'before', 'about', 'over',
  'under', 'again', 'all', 'any', 'can', 'could', 'should', 'would', 'will',
]);

/**
 * Distinctive words of `text`, in order of first appearance
 */
export function extractTags(text: string, limit: number = MAX_TAGS): string[] {
  const tags = new Set<string>();
  for (const token of tokenize(text)) {
    if (tags.size >= limit) break;
    if (token.length < MIN_TAG_LENGTH || STOPWORDS.has(token) || /^\d+$/.test(token)) continue;
    tags.add(token);
  }
  return [...tags];
}

/**
 * Trim, lowercase and dedupe caller-supplied tags
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const out = new Set<string>();
  for (const tag of tags) {
    const clean = tag.trim().toLowerCase();
    if (clean) out.add(clean);
  }
  return [...out];
}

/**
 * Extracted tags followed by explicit ones, without duplicates
 */
export function collectTags(text: string, explicit: readonly string[] = []): string[] {
  return [...new Set([...extractTags(text), ...normalizeTags(explicit)])];
}

/**
 * Jaccard similarity of two tag sets; 0 when both are empty
 */
export function jaccard(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a);
  const right = new Set(b);
  const union = new Set([...left, ...right]);
  if (union.size === 0) return 0;

  let intersection = 0;
  for (const tag of left) {
    if (right.has(tag)) intersection++;
  }
  return intersection / union.size;
}
