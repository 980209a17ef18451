/**
 * HTTP client utilities for the Google Cloud JSON APIs.
 * @module client/http
 */

import { z } from 'zod';
import { OperationErrorKind, TransportError } from '../errors.js';

/**
 * Query parameters.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP response structure. Bodies stay untyped until validated.
 */
export interface HttpResponse {
  /** Response status code */
  status: number;
  /** Response headers */
  headers: Headers;
  /** Parsed JSON body, text for other content types, undefined when empty */
  data: unknown;
}

/**
 * HTTP methods.
 */
export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Google API error envelope.
 */
const GoogleErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

/**
 * Builds a URL with query parameters.
 */
export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  const url = new URL(normalizedPath, baseUrl);

  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Performs an HTTP request.
 *
 * @throws {TransportError} for non-2xx statuses, network failures and timeouts
 */
export async function httpRequest(
  method: HttpMethod,
  url: string,
  options: {
    headers?: Record<string, string>;
    body?: unknown;
    timeout?: number;
    operationName?: string;
  } = {}
): Promise<HttpResponse> {
  const { headers = {}, body, timeout = 30000, operationName } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw await parseErrorResponse(response, operationName);
    }

    return {
      status: response.status,
      headers: response.headers,
      data: await parseResponseBody(response),
    };
  } catch (error) {
    if (error instanceof TransportError) {
      throw error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      throw new TransportError(OperationErrorKind.Timeout, `Request timeout after ${timeout}ms`, {
        operationName,
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(OperationErrorKind.ConnectionFailed, `Request failed: ${message}`, {
      operationName,
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parses the response body based on content type.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  if (response.status === 204) {
    return undefined;
  }

  const text = await response.text();
  if (text === '') {
    return undefined;
  }

  const contentType = response.headers.get('Content-Type') ?? '';
  if (contentType.includes('application/json')) {
    const parsed = parseJson(text);
    if (parsed === undefined) {
      throw new TransportError(OperationErrorKind.MalformedResponse, 'Response body is not valid JSON');
    }
    return parsed;
  }

  return text;
}

/**
 * Parses an error response.
 */
async function parseErrorResponse(response: Response, operationName?: string): Promise<TransportError> {
  const status = response.status;
  const retryAfterHeader = response.headers.get('Retry-After');
  const retryAfter = retryAfterHeader ? parseInt(retryAfterHeader, 10) : NaN;

  let message = `HTTP ${status}`;
  let details: Record<string, unknown> | undefined;

  const envelope = GoogleErrorBodySchema.safeParse(parseJson(await response.text()));
  if (envelope.success) {
    message = envelope.data.error.message || message;
    if (envelope.data.error.status) {
      details = { status: envelope.data.error.status };
    }
  }

  return TransportError.fromHttpStatus(status, message, {
    retryAfter: isNaN(retryAfter) ? undefined : retryAfter,
    operationName,
    details,
  });
}
