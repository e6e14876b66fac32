/**
 * Embedding Providers
 *
 * - OpenAI - High quality, requires API key
 * - Ollama - Local server, requires Ollama running
 * - Hashing - Offline feature hashing, always available
 */

export * from './interface.js';
export * from './openai.js';
export * from './ollama.js';
export * from './hashing.js';
export * from './factory.js';
export * from './guarded.js';
