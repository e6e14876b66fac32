/**
 * Hashing Embedding Provider
 *
 * Offline embeddings by feature hashing: word unigrams and bigrams are
 * projected onto a fixed number of dimensions with a signed djb2 hash,
 * weighted by sublinear term frequency and normalized to unit length.
 * Texts sharing vocabulary land close together; there is no semantics
 * beyond that.
 */

import { tokenize } from '../utils/text.js';
import type { IEmbeddingProvider } from './interface.js';

export interface HashingEmbeddingOptions {
  /** Output dimensions (default: 256) */
  dimensions?: number;
  /** Include word bigrams (default: true) */
  bigrams?: boolean;
}

/**
 * Feature hashing embedding provider
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'hashing';
  readonly dimensions: number;

  private readonly bigrams: boolean;

  constructor(options: HashingEmbeddingOptions = {}) {
    this.dimensions = options.dimensions ?? 256;
    this.bigrams = options.bigrams ?? true;
  }

  /**
   * Initialize the provider
   */
  async initialize(): Promise<void> {
    // Nothing to load
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  /**
   * Generate embeddings for multiple texts
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorize(t));
  }

  /**
   * Check if the provider is available
   */
  async isAvailable(): Promise<boolean> {
    return true;
  }

  /**
   * Synchronous embedding; the zero vector for text without tokens
   */
  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const [feature, count] of this.features(text)) {
      const hash = hashFeature(feature);
      const index = Math.abs(hash) % this.dimensions;
      const sign = hash >= 0 ? 1 : -1;
      vector[index] = (vector[index] ?? 0) + sign * (1 + Math.log(count));
    }

    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (magnitude === 0) return vector;
    return vector.map((v) => v / magnitude);
  }

  private features(text: string): Map<string, number> {
    const tokens = tokenize(text);
    const counts = new Map<string, number>();
    const add = (feature: string): void => {
      counts.set(feature, (counts.get(feature) ?? 0) + 1);
    };

    tokens.forEach((token, i) => {
      add(token);
      const next = tokens[i + 1];
      if (this.bigrams && next !== undefined) add(`${token} ${next}`);
    });

    return counts;
  }
}

/**
 * djb2 over the feature text, as a signed 32-bit integer
 */
function hashFeature(feature: string): number {
  let hash = 5381;
  for (let i = 0; i < feature.length; i++) {
    hash = (hash << 5) + hash + feature.charCodeAt(i);
    hash = hash | 0;
  }
  return hash;
}
