/**
 * Storage Layer Exports
 *
 * Provides the case store abstraction with SQLite as the implementation.
 */

export * from './interface.js';
export * from './sqlite/index.js';
export * from './factory.js';
export * from './consistency.js';
export * from './record-schema.js';
