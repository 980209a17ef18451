/**
 * Type exports.
 * @module types
 */

export * from './operation.js';
export * from './poll.js';
