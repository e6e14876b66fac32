/**
 * OpenAI Embedding Provider
 *
 * Calls the OpenAI-compatible `/embeddings` endpoint. Batches go out as a
 * single request; results are put back in input order by `index`.
 */

import { z } from 'zod';
import type { IEmbeddingProvider } from './interface.js';

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().optional(), embedding: z.array(z.number()) })),
});

export interface OpenAIEmbeddingOptions {
  /** Model name (default: text-embedding-3-small) */
  model?: string;
  /** Output dimensions (default: 1536) */
  dimensions?: number;
  /** API base URL (default: https://api.openai.com/v1) */
  baseUrl?: string;
}

/**
 * OpenAI embedding provider
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'openai';
  readonly dimensions: number;

  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, options: OpenAIEmbeddingOptions = {}) {
    this.apiKey = apiKey;
    this.model = options.model ?? 'text-embedding-3-small';
    this.dimensions = options.dimensions ?? 1536;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
  }

  /**
   * Initialize the provider
   */
  async initialize(): Promise<void> {
    const available = await this.isAvailable();
    if (!available) {
      throw new Error('OpenAI API key is invalid or API is unavailable');
    }
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.request(text);
    if (embedding === undefined) {
      throw new Error('OpenAI API returned no embedding');
    }
    return embedding;
  }

  /**
   * Generate embeddings for multiple texts
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.request(texts);
  }

  /** Lists models; any non-2xx or network error means unavailable */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private async request(input: string | string[]): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        input,
        dimensions: this.dimensions,
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${error}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`OpenAI API returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return [...parsed.data.data]
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map((d) => d.embedding);
  }
}
