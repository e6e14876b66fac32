/**
 * Ollama Embedding Provider
 *
 * Local embeddings from an Ollama server (`/api/embeddings`). The API takes
 * one prompt per request, so batches fan out.
 */

import { z } from 'zod';
import type { IEmbeddingProvider } from './interface.js';

const EmbeddingResponseSchema = z.object({ embedding: z.array(z.number()) });

export interface OllamaEmbeddingOptions {
  /** Server URL (default: http://localhost:11434) */
  baseUrl?: string;
  /** Model name (default: nomic-embed-text) */
  model?: string;
  /** Output dimensions of the model (default: 768) */
  dimensions?: number;
}

/**
 * Ollama embedding provider
 */
export class OllamaEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'ollama';
  readonly dimensions: number;

  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: OllamaEmbeddingOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.model = options.model ?? 'nomic-embed-text';
    this.dimensions = options.dimensions ?? 768;
  }

  /**
   * Initialize the provider
   */
  async initialize(): Promise<void> {
    const available = await this.isAvailable();
    if (!available) {
      throw new Error('Ollama is not reachable');
    }
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Ollama error: ${response.status} ${error}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Ollama returned a body without an embedding');
    }
    return parsed.data.embedding;
  }

  /**
   * Generate embeddings for multiple texts
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embed(t)));
  }

  /**
   * Check if the provider is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
