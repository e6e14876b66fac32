/**
 * Embedding Factory
 *
 * Creates embedding providers from configuration, or picks one from the
 * environment.
 */

import { silentLogger, type Logger } from '../utils/logger.js';
import { HashingEmbeddingProvider } from './hashing.js';
import type { IEmbeddingProvider } from './interface.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';

/**
 * Embedding provider type
 */
export type EmbeddingProviderType = 'openai' | 'ollama' | 'hashing';

/**
 * Embedding configuration
 */
export interface EmbeddingConfig {
  /** Provider type */
  type: EmbeddingProviderType;
  /** API key (for openai) */
  apiKey?: string;
  /** Model name (for openai and ollama) */
  model?: string;
  /** Server or API base URL (for openai and ollama) */
  baseUrl?: string;
  /** Output dimensions */
  dimensions?: number;
}

/**
 * Create and initialize an embedding provider
 */
export async function createEmbeddingProvider(config: EmbeddingConfig): Promise<IEmbeddingProvider> {
  const provider = buildProvider(config);
  await provider.initialize();
  return provider;
}

function buildProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.type) {
    case 'openai': {
      if (!config.apiKey) {
        throw new Error('OpenAI embeddings require an API key');
      }
      return new OpenAIEmbeddingProvider(config.apiKey, {
        ...(config.model !== undefined && { model: config.model }),
        ...(config.dimensions !== undefined && { dimensions: config.dimensions }),
        ...(config.baseUrl !== undefined && { baseUrl: config.baseUrl }),
      });
    }

    case 'ollama':
      return new OllamaEmbeddingProvider({
        ...(config.baseUrl !== undefined && { baseUrl: config.baseUrl }),
        ...(config.model !== undefined && { model: config.model }),
        ...(config.dimensions !== undefined && { dimensions: config.dimensions }),
      });

    case 'hashing':
      return new HashingEmbeddingProvider({
        ...(config.dimensions !== undefined && { dimensions: config.dimensions }),
      });
  }
}

/**
 * Pick the best available provider:
 * OpenAI when OPENAI_API_KEY is set, then a reachable Ollama server, then hashing
 */
export async function autoDetectEmbeddingProvider(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = silentLogger
): Promise<IEmbeddingProvider> {
  const apiKey = env['OPENAI_API_KEY'];
  if (apiKey) {
    return createEmbeddingProvider({ type: 'openai', apiKey });
  }

  const ollamaUrl = env['CASEBASE_OLLAMA_URL'];
  const ollama = new OllamaEmbeddingProvider(ollamaUrl ? { baseUrl: ollamaUrl } : {});
  if (await ollama.isAvailable()) {
    return ollama;
  }

  logger.info('No remote embedding provider available, using offline hashing embeddings');
  return createEmbeddingProvider({ type: 'hashing' });
}
