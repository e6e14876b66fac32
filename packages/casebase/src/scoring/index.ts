/**
 * Scoring Exports
 */

export * from './importance.js';
export * from './novelty.js';
