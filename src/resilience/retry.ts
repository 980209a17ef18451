/**
 * Retry wrapper with exponential backoff and jitter.
 *
 * The poller never retries a failed status call. Callers that prefer to
 * ride out transient failures wrap their status function with `withRetry`.
 */

import { DEFAULT_RETRY_CONFIG, type RetryConfig } from '../config.js';
import { isTransportError } from '../errors.js';
import { applyJitter } from '../poller/backoff.js';
import { SystemClock, type Clock } from '../poller/clock.js';
import type { Logger } from '../observability/index.js';

/**
 * Options for the retry executor.
 */
export interface RetryExecutorOptions {
  clock?: Clock;
  logger?: Logger;
  random?: () => number;
}

/**
 * Executes operations with retry logic, exponential backoff, and jitter.
 */
export class RetryExecutor {
  private readonly clock: Clock;

  constructor(
    private readonly config: RetryConfig = DEFAULT_RETRY_CONFIG,
    private readonly options: RetryExecutorOptions = {}
  ) {
    this.clock = options.clock ?? new SystemClock();
  }

  /**
   * Execute an operation, retrying failures that `isRetryable` accepts.
   *
   * @param getRetryDelay - Server-suggested delay in milliseconds, used instead of the backoff
   * @throws the last error once attempts are exhausted or the error is not retryable
   */
  async execute<T>(
    operation: () => Promise<T>,
    isRetryable: (error: unknown) => boolean,
    getRetryDelay?: (error: unknown) => number | undefined
  ): Promise<T> {
    let attempts = 0;
    let delayMs = this.config.initialBackoff;

    while (true) {
      try {
        return await operation();
      } catch (error) {
        attempts++;

        if (!this.config.enabled || !isRetryable(error) || attempts >= this.config.maxAttempts) {
          throw error;
        }

        const suggested = getRetryDelay?.(error);
        const waitMs = applyJitter(
          Math.min(suggested ?? delayMs, this.config.maxBackoff),
          this.config.jitter,
          this.options.random
        );
        this.options.logger?.debug('Retrying request', {
          attempt: attempts,
          waitMs,
          error: error instanceof Error ? error.message : String(error),
        });

        await this.clock.sleep(waitMs);

        delayMs = Math.min(delayMs * this.config.multiplier, this.config.maxBackoff);
      }
    }
  }
}

/**
 * Wraps a function so retryable TransportErrors are retried.
 *
 * The wrapper retries regardless of `config.enabled`; asking for it is the opt-in.
 */
export function withRetry<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  config: Partial<RetryConfig> = {},
  options: RetryExecutorOptions = {}
): (...args: A) => Promise<T> {
  const executor = new RetryExecutor({ ...DEFAULT_RETRY_CONFIG, ...config, enabled: true }, options);
  return (...args: A) =>
    executor.execute(
      () => fn(...args),
      (error) => isTransportError(error) && error.isRetryable(),
      (error) => (isTransportError(error) ? error.getRetryDelay() : undefined)
    );
}
