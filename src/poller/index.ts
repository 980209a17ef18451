/**
 * Poller exports.
 * @module poller
 */

export { OperationPoller, pollOperation, type OperationPollerOptions } from './poller.js';
export { SystemClock, type Clock } from './clock.js';
export { calculateBackoff, applyJitter } from './backoff.js';
