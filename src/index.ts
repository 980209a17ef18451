/**
 * Google Cloud long-running operation poller
 *
 * Waits for long-running operations of Google Cloud APIs with:
 * - A poller with backoff, an overall deadline and AbortSignal cancellation
 * - A REST client for `operations` collections (get, list, cancel, delete, wait)
 * - BigQuery jobs waited through the same poller
 * - BigQuery resource references with bq-style identifier parsing
 * - Authentication through google-auth-library
 *
 * @example
 * ```typescript
 * import {
 *   createCloudContext,
 *   createOperationHandle,
 *   OperationsClientConfig,
 * } from 'gcp-operation-poller';
 *
 * const context = createCloudContext({
 *   config: OperationsClientConfig.builder('https://file.googleapis.com')
 *     .project('my-project')
 *     .location('us-central1')
 *     .build(),
 * });
 *
 * const handle = createOperationHandle('operation-1718');
 * const { response } = await context.operations().wait(handle, { maxWaitMs: 600000 });
 * ```
 *
 * @module gcp-operation-poller
 */

// Configuration
export {
  OperationsClientConfig,
  OperationsConfigBuilder,
  type AuthMethod,
  type PollDefaults,
  type RetryConfig,
  PollDefaultsSchema,
  DEFAULT_API_VERSION,
  DEFAULT_BIGQUERY_ENDPOINT,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  DEFAULT_POLL_DEFAULTS,
  DEFAULT_RETRY_CONFIG,
  createDefaultConfig,
  validateConfig,
  validatePollDefaults,
  configFromEnv,
} from './config.js';

// Errors
export {
  OperationError,
  OperationErrorKind,
  ConfigurationError,
  InvalidReferenceError,
  TransportError,
  OperationFailedError,
  DeadlineExceededError,
  CancelledError,
  isOperationError,
  isTransportError,
  isTerminalError,
  type OperationErrorOptions,
  type TransportErrorKind,
} from './errors.js';

// Types
export * from './types/index.js';

// Poller
export * from './poller/index.js';

// Resilience
export { RetryExecutor, withRetry, type RetryExecutorOptions } from './resilience/retry.js';

// Auth
export * from './auth/index.js';

// Clients
export * from './client/index.js';

// References
export * from './references/index.js';

// Context
export { createCloudContext, type CloudContext, type CloudContextOptions } from './context.js';

// Observability
export {
  type Logger,
  type LogLevel,
  type MetricCollector,
  type MetricLabels,
  ConsoleLogger,
  NoOpLogger,
  NoOpMetricCollector,
  InMemoryMetricCollector,
  MetricNames,
} from './observability/index.js';

// Simulation
export {
  SimulatedClock,
  ScriptedOperationSource,
  runningSnapshot,
  succeededSnapshot,
  failedSnapshot,
  type ScriptStep,
  type ScriptedSourceOptions,
} from './simulation/index.js';
