/**
 * BigQuery references.
 * @module references
 */

export * from './types.js';
export * from './format.js';
export * from './parse.js';
export * from './location.js';
