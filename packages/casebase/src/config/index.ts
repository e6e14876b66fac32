/**
 * Configuration Exports
 */

export * from './config.js';
