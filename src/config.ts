/**
 * Configuration for the operations and jobs clients.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Default API version of the operations collection.
 */
export const DEFAULT_API_VERSION = 'v1';

/**
 * Default BigQuery API endpoint.
 */
export const DEFAULT_BIGQUERY_ENDPOINT = 'https://bigquery.googleapis.com';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'gcp-operation-poller/1.0.0';

/**
 * Poll timing defaults.
 */
export interface PollDefaults {
  /** Delay before the first status call in milliseconds */
  initialDelayMs: number;
  /** Delay after the first status call in milliseconds */
  pollIntervalMs: number;
  /** Delay growth factor */
  multiplier: number;
  /** Delay ceiling in milliseconds */
  maxIntervalMs: number;
  /** Overall deadline in milliseconds */
  maxWaitMs: number;
  /** Jitter factor (0.0 to 1.0) */
  jitter: number;
}

/**
 * Default poll timing: 1s before the first check, then 2s growing by 1.4x
 * up to 3 minutes, for at most 30 minutes.
 */
export const DEFAULT_POLL_DEFAULTS: PollDefaults = {
  initialDelayMs: 1000,
  pollIntervalMs: 2000,
  multiplier: 1.4,
  maxIntervalMs: 180000,
  maxWaitMs: 1800000,
  jitter: 0,
};

/**
 * Retry configuration for individual API requests.
 */
export interface RetryConfig {
  /** Maximum attempts, including the first */
  maxAttempts: number;
  /** Initial backoff delay in milliseconds */
  initialBackoff: number;
  /** Maximum backoff delay in milliseconds */
  maxBackoff: number;
  /** Backoff multiplier */
  multiplier: number;
  /** Jitter factor (0.0 to 1.0) */
  jitter: number;
  /** Enable retries */
  enabled: boolean;
}

/**
 * Default retry configuration. Retries are off unless asked for.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialBackoff: 1000,
  maxBackoff: 60000,
  multiplier: 2.0,
  jitter: 0.1,
  enabled: false,
};

/**
 * Authentication method types.
 */
export type AuthMethod =
  | { type: 'service_account'; keyPath?: string; keyJson?: string }
  | { type: 'workload_identity' }
  | { type: 'adc' }
  | { type: 'access_token'; token: string };

/**
 * Client configuration.
 */
export interface OperationsClientConfig {
  /** Base URL of the API that owns the operations, e.g. https://run.googleapis.com */
  apiEndpoint: string;
  /** API version segment of operation paths */
  apiVersion: string;
  /** Base URL for BigQuery job calls */
  bigQueryEndpoint: string;
  /** Project used to expand bare operation ids */
  projectId?: string;
  /** Location used to expand bare operation ids */
  defaultLocation?: string;
  /** Authentication method */
  auth: AuthMethod;
  /** Request timeout in milliseconds */
  timeout: number;
  /** User-Agent header */
  userAgent: string;
  /** Poll timing defaults for wait calls */
  polling: PollDefaults;
  /** Request retry configuration */
  retry: RetryConfig;
}

/**
 * Zod schema for URL validation.
 */
const urlSchema = z.string().url();

/**
 * Zod schema for poll timing.
 */
export const PollDefaultsSchema = z.object({
  initialDelayMs: z.number().min(0),
  pollIntervalMs: z.number().min(0),
  multiplier: z.number().min(1),
  maxIntervalMs: z.number().min(0),
  maxWaitMs: z.number().positive(),
  jitter: z.number().min(0).max(1),
});

const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1),
  initialBackoff: z.number().min(0),
  maxBackoff: z.number().min(0),
  multiplier: z.number().min(1),
  jitter: z.number().min(0).max(1),
  enabled: z.boolean(),
});

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid value';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Validates poll timing.
 *
 * @throws {ConfigurationError} naming the first offending field
 */
export function validatePollDefaults(polling: PollDefaults): void {
  const result = PollDefaultsSchema.safeParse(polling);
  if (!result.success) {
    throw new ConfigurationError(`Invalid polling configuration: ${firstIssue(result.error)}`);
  }
}

/**
 * Creates a default configuration for an API endpoint.
 */
export function createDefaultConfig(apiEndpoint: string, projectId?: string): OperationsClientConfig {
  return {
    apiEndpoint,
    apiVersion: DEFAULT_API_VERSION,
    bigQueryEndpoint: DEFAULT_BIGQUERY_ENDPOINT,
    projectId,
    auth: { type: 'adc' },
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
    polling: { ...DEFAULT_POLL_DEFAULTS },
    retry: { ...DEFAULT_RETRY_CONFIG },
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: OperationsClientConfig): void {
  if (!urlSchema.safeParse(config.apiEndpoint).success) {
    throw new ConfigurationError(`Invalid API endpoint URL: ${config.apiEndpoint}`);
  }

  if (!urlSchema.safeParse(config.bigQueryEndpoint).success) {
    throw new ConfigurationError(`Invalid BigQuery endpoint URL: ${config.bigQueryEndpoint}`);
  }

  if (config.apiVersion.trim() === '') {
    throw new ConfigurationError('API version cannot be empty');
  }

  if (config.projectId !== undefined && config.projectId.trim() === '') {
    throw new ConfigurationError('Project ID cannot be blank');
  }

  if (config.timeout <= 0) {
    throw new ConfigurationError('Timeout must be greater than 0');
  }

  if (config.auth.type === 'access_token' && config.auth.token === '') {
    throw new ConfigurationError('Access token cannot be empty');
  }

  validatePollDefaults(config.polling);

  const retry = RetryConfigSchema.safeParse(config.retry);
  if (!retry.success) {
    throw new ConfigurationError(`Invalid retry configuration: ${firstIssue(retry.error)}`);
  }
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (!raw) {
    return undefined;
  }
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Creates configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): OperationsClientConfig {
  const apiEndpoint = env['GCP_OPERATIONS_API_ENDPOINT'];
  if (!apiEndpoint) {
    throw new ConfigurationError(
      'API endpoint not found in environment. Set GCP_OPERATIONS_API_ENDPOINT'
    );
  }

  const projectId = env['GOOGLE_CLOUD_PROJECT'] || env['GCLOUD_PROJECT'] || undefined;
  const config = createDefaultConfig(apiEndpoint, projectId);

  if (env['GCP_OPERATIONS_LOCATION']) {
    config.defaultLocation = env['GCP_OPERATIONS_LOCATION'];
  }

  if (env['GCP_OPERATIONS_BIGQUERY_ENDPOINT']) {
    config.bigQueryEndpoint = env['GCP_OPERATIONS_BIGQUERY_ENDPOINT'];
  }

  const timeoutSeconds = readPositiveInt(env, 'GCP_OPERATIONS_TIMEOUT_SECONDS');
  if (timeoutSeconds !== undefined) {
    config.timeout = timeoutSeconds * 1000;
  }

  const pollInterval = readPositiveInt(env, 'GCP_OPERATIONS_POLL_INTERVAL_MS');
  if (pollInterval !== undefined) {
    config.polling.pollIntervalMs = pollInterval;
  }

  const maxWait = readPositiveInt(env, 'GCP_OPERATIONS_MAX_WAIT_MS');
  if (maxWait !== undefined) {
    config.polling.maxWaitMs = maxWait;
  }

  // Determine auth method
  const accessToken = env['CLOUDSDK_AUTH_ACCESS_TOKEN'];
  const serviceAccountKey = env['GCP_OPERATIONS_SERVICE_ACCOUNT_KEY'];
  const googleCredentials = env['GOOGLE_APPLICATION_CREDENTIALS'];

  if (accessToken) {
    config.auth = { type: 'access_token', token: accessToken };
  } else if (serviceAccountKey) {
    config.auth = { type: 'service_account', keyJson: serviceAccountKey };
  } else if (googleCredentials) {
    config.auth = { type: 'service_account', keyPath: googleCredentials };
  } else {
    config.auth = { type: 'adc' };
  }

  validateConfig(config);
  return config;
}

/**
 * Builder for OperationsClientConfig.
 */
export class OperationsConfigBuilder {
  private config: OperationsClientConfig;

  constructor(apiEndpoint: string) {
    this.config = createDefaultConfig(apiEndpoint);
  }

  /**
   * Sets the project used for bare operation ids.
   */
  project(projectId: string): this {
    this.config.projectId = projectId;
    return this;
  }

  /**
   * Sets the default location.
   */
  location(location: string): this {
    this.config.defaultLocation = location;
    return this;
  }

  /**
   * Sets the API version.
   */
  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Sets the BigQuery endpoint.
   */
  bigQueryEndpoint(endpoint: string): this {
    this.config.bigQueryEndpoint = endpoint;
    return this;
  }

  /**
   * Sets the authentication method.
   */
  auth(auth: AuthMethod): this {
    this.config.auth = auth;
    return this;
  }

  /**
   * Sets service account authentication from a key file path.
   */
  serviceAccountKey(keyPath: string): this {
    this.config.auth = { type: 'service_account', keyPath };
    return this;
  }

  /**
   * Sets service account authentication from a JSON string.
   */
  serviceAccountJson(keyJson: string): this {
    this.config.auth = { type: 'service_account', keyJson };
    return this;
  }

  /**
   * Sets workload identity authentication (GKE metadata server).
   */
  workloadIdentity(): this {
    this.config.auth = { type: 'workload_identity' };
    return this;
  }

  /**
   * Sets access token authentication.
   */
  accessToken(token: string): this {
    this.config.auth = { type: 'access_token', token };
    return this;
  }

  /**
   * Sets the request timeout.
   */
  timeout(timeoutMs: number): this {
    this.config.timeout = timeoutMs;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Overrides poll timing defaults.
   */
  polling(polling: Partial<PollDefaults>): this {
    this.config.polling = { ...this.config.polling, ...polling };
    return this;
  }

  /**
   * Sets the retry configuration.
   */
  retry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  /**
   * Disables retries.
   */
  noRetry(): this {
    this.config.retry = { ...this.config.retry, enabled: false };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): OperationsClientConfig {
    validateConfig(this.config);
    return {
      ...this.config,
      polling: { ...this.config.polling },
      retry: { ...this.config.retry },
    };
  }
}

/**
 * Namespace for OperationsClientConfig utilities.
 */
export namespace OperationsClientConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(apiEndpoint: string): OperationsConfigBuilder {
    return new OperationsConfigBuilder(apiEndpoint);
  }

  /**
   * Creates configuration from environment variables.
   */
  export function fromEnv(env?: NodeJS.ProcessEnv): OperationsClientConfig {
    return configFromEnv(env);
  }

  /**
   * Creates a default configuration.
   */
  export function defaultConfig(apiEndpoint: string, projectId?: string): OperationsClientConfig {
    return createDefaultConfig(apiEndpoint, projectId);
  }

  /**
   * Validates a configuration.
   */
  export function validate(config: OperationsClientConfig): void {
    validateConfig(config);
  }
}
