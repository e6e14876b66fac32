/**
 * Maintenance Exports
 */

export * from './scheduler.js';
