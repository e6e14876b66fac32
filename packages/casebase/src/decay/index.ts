/**
 * Decay Exports
 */

export * from './calculator.js';
export * from './manager.js';
