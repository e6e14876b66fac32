/**
 * Consolidation Exports
 */

export * from './engine.js';
export * from './clustering.js';
