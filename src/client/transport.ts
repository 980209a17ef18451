/**
 * Authenticated request execution shared by the REST clients.
 * @module client/transport
 */

import type { OperationsClientConfig } from '../config.js';
import { isTransportError } from '../errors.js';
import type { AuthProvider } from '../auth/provider.js';
import { MetricNames, type Logger, type MetricCollector } from '../observability/index.js';
import { RetryExecutor } from '../resilience/retry.js';
import type { Clock } from '../poller/clock.js';
import { buildUrl, httpRequest, type HttpMethod, type HttpResponse, type QueryParams } from './http.js';

/**
 * Per-request options.
 */
export interface TransportRequest {
  /** Label used in logs and metrics, e.g. "operations.get" */
  label: string;
  query?: QueryParams;
  body?: unknown;
  /** Operation the request concerns, attached to errors */
  operationName?: string;
}

/**
 * Collaborators of a transport.
 */
export interface TransportDeps {
  auth: AuthProvider;
  logger: Logger;
  metrics: MetricCollector;
  clock?: Clock;
}

/**
 * Adds credentials and headers to requests and applies the configured
 * request retry policy.
 */
export class AuthorizedTransport {
  private readonly retry: RetryExecutor;

  constructor(
    private readonly config: OperationsClientConfig,
    private readonly deps: TransportDeps
  ) {
    this.retry = new RetryExecutor(config.retry, { clock: deps.clock, logger: deps.logger });
  }

  /**
   * Sends one request, retried per `config.retry` when enabled.
   */
  async request(method: HttpMethod, baseUrl: string, path: string, request: TransportRequest): Promise<HttpResponse> {
    return this.retry.execute(
      () => this.send(method, baseUrl, path, request),
      (error) => isTransportError(error) && error.isRetryable(),
      (error) => (isTransportError(error) ? error.getRetryDelay() : undefined)
    );
  }

  private async send(
    method: HttpMethod,
    baseUrl: string,
    path: string,
    request: TransportRequest
  ): Promise<HttpResponse> {
    const token = await this.deps.auth.getToken();
    const url = buildUrl(baseUrl, path, request.query);

    this.deps.logger.debug('Sending request', { operation: request.label, method, url });

    try {
      const response = await httpRequest(method, url, {
        headers: {
          Authorization: `Bearer ${token}`,
          'User-Agent': this.config.userAgent,
        },
        body: request.body,
        timeout: this.config.timeout,
        operationName: request.operationName,
      });
      this.deps.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, {
        operation: request.label,
        status: response.status,
      });
      return response;
    } catch (error) {
      this.deps.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, {
        operation: request.label,
        status: isTransportError(error) ? error.statusCode : undefined,
      });
      throw error;
    }
  }
}
