/**
 * Common type exports
 */

export * from './errors.js';
export * from './decimal.js';
export * from './table.js';
