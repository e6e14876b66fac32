/**
 * Vector Index Exports
 */

export * from './interface.js';
export * from './sqlite-table.js';
export * from './sqlite-vec-index.js';
export * from './exact-index.js';
