/**
 * Poll options and results.
 * @module types/poll
 */

import type { OperationHandle, OperationResource } from './operation.js';

/**
 * Fetches one snapshot of an operation. The poller validates whatever
 * this resolves to, so raw JSON bodies are accepted.
 */
export type GetOperationFn = (handle: OperationHandle) => Promise<unknown>;

/**
 * Progress event emitted for every snapshot that is not done.
 */
export interface PollEvent {
  handle: OperationHandle;
  operation: OperationResource;
  /** Number of status calls made so far */
  pollCount: number;
  elapsedMs: number;
  /** Delay before the next status call */
  nextDelayMs: number;
  /** Caller's display text, untouched */
  message?: string;
}

/**
 * Per-call poll options. Unset fields fall back to the poller's defaults.
 */
export interface PollOptions {
  /** Delay before the first status call */
  initialDelayMs?: number;
  /** Delay between the first and second status calls */
  pollIntervalMs?: number;
  /** Growth factor applied to the delay after each call */
  multiplier?: number;
  /** Ceiling for the delay between calls */
  maxIntervalMs?: number;
  /** Overall deadline measured from the start of the wait; Infinity waits forever */
  maxWaitMs?: number;
  /** Random spread applied to each delay, as a fraction between 0 and 1 */
  jitter?: number;
  /** Display text passed through to progress events and logs */
  message?: string;
  /** Aborting stops the wait with a CancelledError */
  signal?: AbortSignal;
  onPoll?: (event: PollEvent) => void;
}

/**
 * Result of a wait that ended in success.
 */
export interface PollSuccess {
  /** Response payload of the finished operation; undefined when the server sent none */
  response: unknown;
  /** Final snapshot */
  operation: OperationResource;
  pollCount: number;
  durationMs: number;
}

/**
 * Settled outcome of one wait in a fan-out.
 */
export type PollOutcome =
  | { status: 'fulfilled'; handle: OperationHandle; value: PollSuccess }
  | { status: 'rejected'; handle: OperationHandle; error: unknown };
