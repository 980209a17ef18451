/**
 * Process-wide collaborators, created once and passed by reference.
 * @module context
 */

import type { OperationsClientConfig } from './config.js';
import { validateConfig } from './config.js';
import { GcpAuthProvider, type AuthProvider } from './auth/provider.js';
import { AuthorizedTransport } from './client/transport.js';
import { OperationsClient } from './client/operations.js';
import { JobsClient } from './client/jobs.js';
import { NoOpLogger, NoOpMetricCollector, type Logger, type MetricCollector } from './observability/index.js';
import { OperationPoller } from './poller/poller.js';
import { SystemClock, type Clock } from './poller/clock.js';

/**
 * Inputs for a context. Everything but the config has a default.
 */
export interface CloudContextOptions {
  config: OperationsClientConfig;
  logger?: Logger;
  metrics?: MetricCollector;
  clock?: Clock;
  /** Replaces the google-auth-library provider built from `config.auth` */
  authProvider?: AuthProvider;
}

/**
 * Config, observability and clients for one process.
 *
 * Clients are created on first use and cached on the context.
 */
export interface CloudContext {
  readonly config: Readonly<OperationsClientConfig>;
  readonly logger: Logger;
  readonly metrics: MetricCollector;
  readonly clock: Clock;
  readonly poller: OperationPoller;
  operations(): OperationsClient;
  jobs(): JobsClient;
}

/**
 * Creates a context.
 *
 * @example
 * ```typescript
 * const context = createCloudContext({
 *   config: OperationsClientConfig.builder('https://run.googleapis.com').project('my-project').build(),
 *   logger: new ConsoleLogger({ minLevel: 'debug' }),
 * });
 * await context.operations().wait(createOperationHandle('operation-42'));
 * ```
 */
export function createCloudContext(options: CloudContextOptions): CloudContext {
  validateConfig(options.config);

  const config: OperationsClientConfig = {
    ...options.config,
    polling: { ...options.config.polling },
    retry: { ...options.config.retry },
  };
  const logger = options.logger ?? new NoOpLogger();
  const metrics = options.metrics ?? new NoOpMetricCollector();
  const clock = options.clock ?? new SystemClock();
  const auth = options.authProvider ?? new GcpAuthProvider(config.auth, config.projectId);
  const poller = new OperationPoller({ clock, logger, metrics, defaults: config.polling });

  let transport: AuthorizedTransport | undefined;
  let operationsClient: OperationsClient | undefined;
  let jobsClient: JobsClient | undefined;

  const getTransport = (): AuthorizedTransport => {
    if (!transport) {
      transport = new AuthorizedTransport(config, { auth, logger, metrics, clock });
    }
    return transport;
  };

  return Object.freeze({
    config: Object.freeze(config),
    logger,
    metrics,
    clock,
    poller,
    operations(): OperationsClient {
      if (!operationsClient) {
        operationsClient = new OperationsClient(config, getTransport(), poller);
      }
      return operationsClient;
    },
    jobs(): JobsClient {
      if (!jobsClient) {
        jobsClient = new JobsClient(config, getTransport(), poller);
      }
      return jobsClient;
    },
  });
}
