/**
 * Retrieval Exports
 */

export * from './engine.js';
export * from './scoring.js';
export * from './ranking.js';
export * from './tags.js';
