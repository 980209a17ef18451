/**
 * Long-running operation poller.
 *
 * Calls a status function on a backoff schedule until the operation is
 * done, the deadline passes, or the caller aborts. Each `poll` call owns
 * its loop state; the poller instance only holds collaborators.
 * @module poller/poller
 */

import { DEFAULT_POLL_DEFAULTS, validatePollDefaults, type PollDefaults } from '../config.js';
import {
  CancelledError,
  ConfigurationError,
  DeadlineExceededError,
  OperationFailedError,
  TransportError,
  isOperationError,
} from '../errors.js';
import {
  MetricNames,
  NoOpLogger,
  NoOpMetricCollector,
  type Logger,
  type MetricCollector,
} from '../observability/index.js';
import { parseOperationResource, type OperationHandle, type OperationResource } from '../types/operation.js';
import type { GetOperationFn, PollOptions, PollOutcome, PollSuccess } from '../types/poll.js';
import { applyJitter, calculateBackoff } from './backoff.js';
import { SystemClock, type Clock } from './clock.js';

/**
 * Collaborators and defaults for a poller.
 */
export interface OperationPollerOptions {
  clock?: Clock;
  logger?: Logger;
  metrics?: MetricCollector;
  /** Timing used where a poll call leaves a field unset */
  defaults?: Partial<PollDefaults>;
  /** Random source for jitter, values in [0, 1) */
  random?: () => number;
}

type Outcome = 'success' | 'failed' | 'deadline_exceeded' | 'cancelled' | 'transport_error' | 'error';

interface LoopState {
  pollCount: number;
}

function resolveTiming(base: PollDefaults, overrides: Partial<PollDefaults>): PollDefaults {
  return {
    initialDelayMs: overrides.initialDelayMs ?? base.initialDelayMs,
    pollIntervalMs: overrides.pollIntervalMs ?? base.pollIntervalMs,
    multiplier: overrides.multiplier ?? base.multiplier,
    maxIntervalMs: overrides.maxIntervalMs ?? base.maxIntervalMs,
    maxWaitMs: overrides.maxWaitMs ?? base.maxWaitMs,
    jitter: overrides.jitter ?? base.jitter,
  };
}

function outcomeOf(error: unknown): Outcome {
  if (error instanceof OperationFailedError) {
    return 'failed';
  }
  if (error instanceof DeadlineExceededError) {
    return 'deadline_exceeded';
  }
  if (error instanceof CancelledError) {
    return 'cancelled';
  }
  if (error instanceof TransportError) {
    return 'transport_error';
  }
  return 'error';
}

/**
 * Waits for long-running operations.
 *
 * @example
 * ```typescript
 * const poller = new OperationPoller({ logger: new ConsoleLogger() });
 * const handle = createOperationHandle('operation-123', { project: 'my-project' });
 * const { response } = await poller.poll(handle, (h) => client.get(h), { maxWaitMs: 60000 });
 * ```
 */
export class OperationPoller {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: MetricCollector;
  private readonly defaults: PollDefaults;
  private readonly random: () => number;

  constructor(options: OperationPollerOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? new NoOpLogger();
    this.metrics = options.metrics ?? new NoOpMetricCollector();
    this.random = options.random ?? Math.random;
    this.defaults = resolveTiming(DEFAULT_POLL_DEFAULTS, options.defaults ?? {});
    validatePollDefaults(this.defaults);
  }

  /**
   * Polls `getFn` until the operation is done.
   *
   * @returns the response of the finished operation
   * @throws {ConfigurationError} for a blank handle name or invalid timing, before any call
   * @throws {OperationFailedError} when the operation finished with an error
   * @throws {DeadlineExceededError} when `maxWaitMs` passed first
   * @throws {CancelledError} when `signal` aborted
   * @throws {TransportError} when a status call failed; it is not retried
   */
  async poll(handle: OperationHandle, getFn: GetOperationFn, options: PollOptions = {}): Promise<PollSuccess> {
    if (handle.name.trim() === '') {
      throw ConfigurationError.invalidHandle('Operation handle name must not be empty');
    }
    const timing = resolveTiming(this.defaults, options);
    validatePollDefaults(timing);

    const startedAt = this.clock.now();
    const state: LoopState = { pollCount: 0 };
    this.logger.debug('Waiting for operation', {
      operation: handle.name,
      message: options.message,
      maxWaitMs: timing.maxWaitMs,
    });

    try {
      const result = await this.run(handle, getFn, options, timing, startedAt, state);
      this.recordOutcome('success', startedAt);
      this.logger.info('Operation finished', {
        operation: handle.name,
        pollCount: result.pollCount,
        durationMs: result.durationMs,
      });
      return result;
    } catch (error) {
      const outcome = outcomeOf(error);
      this.recordOutcome(outcome, startedAt);
      this.logger.warn('Operation wait ended without success', {
        operation: handle.name,
        outcome,
        pollCount: state.pollCount,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Polls each handle independently and concurrently.
   *
   * Never rejects; each handle gets its own settled outcome, in input order.
   */
  async pollMany(
    handles: readonly OperationHandle[],
    getFn: GetOperationFn,
    options: PollOptions = {}
  ): Promise<PollOutcome[]> {
    return Promise.all(
      handles.map(async (handle): Promise<PollOutcome> => {
        try {
          const value = await this.poll(handle, getFn, options);
          return { status: 'fulfilled', handle, value };
        } catch (error) {
          return { status: 'rejected', handle, error };
        }
      })
    );
  }

  private async run(
    handle: OperationHandle,
    getFn: GetOperationFn,
    options: PollOptions,
    timing: PollDefaults,
    startedAt: number,
    state: LoopState
  ): Promise<PollSuccess> {
    const { signal } = options;
    const deadline = startedAt + timing.maxWaitMs;

    if (timing.initialDelayMs > 0) {
      await this.clock.sleep(timing.initialDelayMs, signal);
    }

    while (true) {
      if (signal?.aborted) {
        throw new CancelledError(handle.name, state.pollCount, signal.reason);
      }
      // The first call always happens; later ones only inside the deadline.
      if (state.pollCount > 0 && this.clock.now() >= deadline) {
        throw new DeadlineExceededError(handle.name, timing.maxWaitMs, state.pollCount);
      }

      state.pollCount++;
      this.metrics.incrementCounter(MetricNames.POLLS_TOTAL);
      const operation = await this.fetchSnapshot(handle, getFn);
      this.logger.debug('Polled operation', {
        operation: handle.name,
        pollCount: state.pollCount,
        done: operation.done,
      });

      if (operation.done) {
        if (operation.error) {
          throw new OperationFailedError(operation.error.code, operation.error.message, {
            operationName: handle.name,
            remoteDetails: operation.error.details,
          });
        }
        return {
          response: operation.response,
          operation,
          pollCount: state.pollCount,
          durationMs: this.clock.now() - startedAt,
        };
      }

      const now = this.clock.now();
      const interval = applyJitter(
        calculateBackoff(state.pollCount - 1, timing.pollIntervalMs, timing.maxIntervalMs, timing.multiplier),
        timing.jitter,
        this.random
      );
      const nextDelayMs = Math.max(0, Math.min(interval, deadline - now));

      options.onPoll?.({
        handle,
        operation,
        pollCount: state.pollCount,
        elapsedMs: now - startedAt,
        nextDelayMs,
        message: options.message,
      });

      if (nextDelayMs > 0) {
        await this.clock.sleep(nextDelayMs, signal);
      }
    }
  }

  private async fetchSnapshot(handle: OperationHandle, getFn: GetOperationFn): Promise<OperationResource> {
    let body: unknown;
    try {
      body = await getFn(handle);
    } catch (error) {
      throw isOperationError(error) ? error : TransportError.wrap(error, handle.name);
    }
    return parseOperationResource(body, handle.name);
  }

  private recordOutcome(outcome: Outcome, startedAt: number): void {
    this.metrics.incrementCounter(MetricNames.OUTCOMES_TOTAL, { outcome });
    this.metrics.recordHistogram(MetricNames.WAIT_DURATION_MS, this.clock.now() - startedAt, { outcome });
  }
}

/**
 * Polls one operation with a poller built from `pollerOptions`.
 */
export function pollOperation(
  handle: OperationHandle,
  getFn: GetOperationFn,
  options?: PollOptions,
  pollerOptions?: OperationPollerOptions
): Promise<PollSuccess> {
  return new OperationPoller(pollerOptions).poll(handle, getFn, options);
}
