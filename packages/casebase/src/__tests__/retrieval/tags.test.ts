/**
 * Tag Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import { collectTags, extractTags, jaccard, normalizeTags } from '../../retrieval/tags.js';

describe('extractTags', () => {
  it('should keep distinctive words in order of appearance', () => {
    expect(extractTags('The build failed with OOM errors in the build step 42')).toEqual([
      'build',
      'failed',
      'oom',
      'errors',
      'step',
    ]);
  });

  it('should stop at the limit', () => {
    expect(extractTags('alpha beta gamma delta', 2)).toEqual(['alpha', 'beta']);
  });

  it('should return nothing for text without words', () => {
    expect(extractTags('-- !! 12 ::')).toEqual([]);
  });
});

describe('normalizeTags', () => {
  it('should trim, lowercase and dedupe', () => {
    expect(normalizeTags([' DB ', 'db', '', 'Cache'])).toEqual(['db', 'cache']);
  });
});

describe('collectTags', () => {
  it('should append explicit tags after extracted ones', () => {
    expect(collectTags('cache miss', ['Redis', 'cache'])).toEqual(['cache', 'miss', 'redis']);
  });
});

describe('jaccard', () => {
  it('should divide the intersection by the union', () => {
    expect(jaccard(['a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3, 10);
    expect(jaccard(['a'], ['a'])).toBe(1);
    expect(jaccard(['a'], ['b'])).toBe(0);
  });

  it('should be 0 for two empty sets', () => {
    expect(jaccard([], [])).toBe(0);
  });
});
