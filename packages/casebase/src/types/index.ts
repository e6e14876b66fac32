/**
 * Type Exports
 */

export * from './case.js';
export * from './insights.js';
