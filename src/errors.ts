/**
 * Error types for long-running operation polling.
 * @module errors
 */

/**
 * Error kinds for categorizing poller and client errors.
 */
export enum OperationErrorKind {
  // Configuration errors
  InvalidConfiguration = 'invalid_configuration',
  InvalidHandle = 'invalid_handle',
  InvalidReference = 'invalid_reference',

  // Authentication errors
  CredentialsNotFound = 'credentials_not_found',
  TokenRefreshFailed = 'token_refresh_failed',
  ServiceAccountInvalid = 'service_account_invalid',
  Unauthenticated = 'unauthenticated',
  PermissionDenied = 'permission_denied',

  // Transport errors
  InvalidRequest = 'invalid_request',
  NotFound = 'not_found',
  RateLimited = 'rate_limited',
  ServerError = 'server_error',
  ConnectionFailed = 'connection_failed',
  Timeout = 'timeout',
  MalformedResponse = 'malformed_response',

  // Terminal poll outcomes
  OperationFailed = 'operation_failed',
  DeadlineExceeded = 'deadline_exceeded',
  Cancelled = 'cancelled',

  // Generic
  Unknown = 'unknown',
}

/**
 * Kinds a TransportError can carry.
 */
export type TransportErrorKind =
  | OperationErrorKind.CredentialsNotFound
  | OperationErrorKind.TokenRefreshFailed
  | OperationErrorKind.ServiceAccountInvalid
  | OperationErrorKind.Unauthenticated
  | OperationErrorKind.PermissionDenied
  | OperationErrorKind.InvalidRequest
  | OperationErrorKind.NotFound
  | OperationErrorKind.RateLimited
  | OperationErrorKind.ServerError
  | OperationErrorKind.ConnectionFailed
  | OperationErrorKind.Timeout
  | OperationErrorKind.MalformedResponse
  | OperationErrorKind.Unknown;

/**
 * Common constructor options for operation errors.
 */
export interface OperationErrorOptions {
  /** HTTP status code */
  statusCode?: number;
  /** Name of the operation being polled */
  operationName?: string;
  /** Underlying cause */
  cause?: unknown;
  /** Additional details */
  details?: Record<string, unknown>;
}

/**
 * Base error class for everything raised by this package.
 */
export class OperationError extends Error {
  /** Error kind */
  public readonly kind: OperationErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** Operation name, when the error concerns one */
  public readonly operationName?: string;
  /** Underlying cause */
  public override readonly cause?: unknown;
  /** Additional details */
  public readonly details?: Record<string, unknown>;

  constructor(kind: OperationErrorKind, message: string, options?: OperationErrorOptions) {
    super(message);
    this.name = 'OperationError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.operationName = options?.operationName;
    this.cause = options?.cause;
    this.details = options?.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns true if repeating the failed call may succeed.
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Formats the error for display.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }
}

/**
 * Invalid configuration or an invalid operation handle.
 */
export class ConfigurationError extends OperationError {
  constructor(
    message: string,
    kind: OperationErrorKind.InvalidConfiguration | OperationErrorKind.InvalidHandle = OperationErrorKind.InvalidConfiguration,
    options?: OperationErrorOptions
  ) {
    super(kind, message, options);
    this.name = 'ConfigurationError';
  }

  static invalidHandle(message: string): ConfigurationError {
    return new ConfigurationError(message, OperationErrorKind.InvalidHandle);
  }
}

/**
 * A resource reference or identifier could not be built or parsed.
 */
export class InvalidReferenceError extends OperationError {
  constructor(message: string, options?: OperationErrorOptions) {
    super(OperationErrorKind.InvalidReference, message, options);
    this.name = 'InvalidReferenceError';
  }
}

/**
 * The call that checks on the operation failed; the operation itself may be fine.
 */
export class TransportError extends OperationError {
  /** Retry-After hint in seconds, when the server sent one */
  public readonly retryAfter?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    options?: OperationErrorOptions & { retryAfter?: number }
  ) {
    super(kind, message, options);
    this.name = 'TransportError';
    this.retryAfter = options?.retryAfter;
  }

  override isRetryable(): boolean {
    const retryable: readonly OperationErrorKind[] = [
      OperationErrorKind.RateLimited,
      OperationErrorKind.ServerError,
      OperationErrorKind.ConnectionFailed,
      OperationErrorKind.Timeout,
      OperationErrorKind.TokenRefreshFailed,
    ];
    return retryable.includes(this.kind);
  }

  /**
   * Returns the suggested delay before a retry, in milliseconds.
   */
  getRetryDelay(): number | undefined {
    if (this.retryAfter !== undefined) {
      return this.retryAfter * 1000;
    }
    switch (this.kind) {
      case OperationErrorKind.RateLimited:
        return 30000;
      case OperationErrorKind.ServerError:
        return 1000;
      default:
        return undefined;
    }
  }

  /**
   * Creates an error from an HTTP status code.
   */
  static fromHttpStatus(
    status: number,
    message: string,
    options?: { retryAfter?: number; operationName?: string; details?: Record<string, unknown> }
  ): TransportError {
    return new TransportError(TransportError.kindFromStatus(status), message, {
      statusCode: status,
      retryAfter: options?.retryAfter,
      operationName: options?.operationName,
      details: options?.details,
    });
  }

  /**
   * Wraps whatever a status call threw.
   */
  static wrap(error: unknown, operationName?: string): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(OperationErrorKind.Unknown, `Failed to get operation status: ${message}`, {
      operationName,
      cause: error,
    });
  }

  static malformed(message: string, operationName?: string): TransportError {
    return new TransportError(OperationErrorKind.MalformedResponse, message, { operationName });
  }

  private static kindFromStatus(status: number): TransportErrorKind {
    switch (status) {
      case 400:
        return OperationErrorKind.InvalidRequest;
      case 401:
        return OperationErrorKind.Unauthenticated;
      case 403:
        return OperationErrorKind.PermissionDenied;
      case 404:
        return OperationErrorKind.NotFound;
      case 408:
      case 504:
        return OperationErrorKind.Timeout;
      case 429:
        return OperationErrorKind.RateLimited;
      default:
        return status >= 500 ? OperationErrorKind.ServerError : OperationErrorKind.Unknown;
    }
  }
}

/**
 * The remote operation completed with an error payload.
 */
export class OperationFailedError extends OperationError {
  /** google.rpc.Code reported by the operation */
  public readonly code: number;
  /** Remote error message, verbatim */
  public readonly remoteMessage: string;
  /** Remote error details, verbatim */
  public readonly remoteDetails: readonly unknown[];

  constructor(code: number, remoteMessage: string, options?: { operationName?: string; remoteDetails?: readonly unknown[] }) {
    const subject = options?.operationName ? `Operation [${options.operationName}]` : 'Operation';
    super(OperationErrorKind.OperationFailed, `${subject} failed with code ${code}: ${remoteMessage}`, {
      operationName: options?.operationName,
      details: { code, message: remoteMessage },
    });
    this.name = 'OperationFailedError';
    this.code = code;
    this.remoteMessage = remoteMessage;
    this.remoteDetails = options?.remoteDetails ?? [];
  }
}

/**
 * The overall wait deadline passed before the operation finished.
 */
export class DeadlineExceededError extends OperationError {
  public readonly maxWaitMs: number;
  public readonly pollCount: number;

  constructor(operationName: string, maxWaitMs: number, pollCount: number) {
    super(
      OperationErrorKind.DeadlineExceeded,
      `Operation [${operationName}] did not finish within ${maxWaitMs}ms`,
      { operationName, details: { maxWaitMs, pollCount } }
    );
    this.name = 'DeadlineExceededError';
    this.maxWaitMs = maxWaitMs;
    this.pollCount = pollCount;
  }
}

/**
 * The caller cancelled the wait. The remote operation keeps running.
 */
export class CancelledError extends OperationError {
  public readonly pollCount: number;

  constructor(operationName: string, pollCount: number, reason?: unknown) {
    super(OperationErrorKind.Cancelled, `Wait for operation [${operationName}] was cancelled`, {
      operationName,
      cause: reason,
      details: { pollCount },
    });
    this.name = 'CancelledError';
    this.pollCount = pollCount;
  }
}

/**
 * Type guard for OperationError.
 */
export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError;
}

/**
 * Type guard for TransportError.
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Checks if an error is one of the poller's terminal outcomes.
 */
export function isTerminalError(
  error: unknown
): error is OperationFailedError | DeadlineExceededError | CancelledError {
  return (
    error instanceof OperationFailedError ||
    error instanceof DeadlineExceededError ||
    error instanceof CancelledError
  );
}
