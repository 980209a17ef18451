/**
 * Long-running operation types.
 * @module types/operation
 */

import { z } from 'zod';
import { ConfigurationError, TransportError } from '../errors.js';

/**
 * Identifies one remote long-running operation.
 */
export interface OperationHandle {
  /** Operation name: a bare id or a full relative resource name */
  readonly name: string;
  /** Project the operation belongs to */
  readonly project?: string;
  /** Location (region or zone) the operation runs in */
  readonly location?: string;
}

/**
 * Scoping fields used to expand a bare operation id.
 */
export interface OperationScope {
  project?: string;
  location?: string;
}

/**
 * Error payload of a finished operation (google.rpc.Status).
 */
export interface OperationStatus {
  /** google.rpc.Code value */
  code: number;
  /** Developer-facing message */
  message: string;
  /** Structured details, passed through verbatim */
  details?: unknown[];
}

/**
 * A snapshot of a long-running operation.
 */
export interface OperationResource {
  name?: string;
  done: boolean;
  error?: OperationStatus;
  response?: unknown;
  metadata?: unknown;
}

/**
 * Canonical google.rpc.Code names, indexed by code.
 */
const STATUS_CODE_NAMES = [
  'OK',
  'CANCELLED',
  'UNKNOWN',
  'INVALID_ARGUMENT',
  'DEADLINE_EXCEEDED',
  'NOT_FOUND',
  'ALREADY_EXISTS',
  'PERMISSION_DENIED',
  'RESOURCE_EXHAUSTED',
  'FAILED_PRECONDITION',
  'ABORTED',
  'OUT_OF_RANGE',
  'UNIMPLEMENTED',
  'INTERNAL',
  'UNAVAILABLE',
  'DATA_LOSS',
  'UNAUTHENTICATED',
] as const;

export type StatusCodeName = (typeof STATUS_CODE_NAMES)[number];

/**
 * Returns the canonical name of a google.rpc.Code.
 */
export function statusCodeName(code: number): StatusCodeName {
  return STATUS_CODE_NAMES[code] ?? 'UNKNOWN';
}

export const OperationStatusSchema = z.object({
  code: z.number().int().default(2),
  message: z.string().default(''),
  details: z.array(z.unknown()).optional(),
});

/**
 * Wire shape of a google.longrunning.Operation. `done` is omitted by the
 * JSON APIs while the operation runs.
 */
export const OperationResourceSchema = z.object({
  name: z.string().optional(),
  done: z.boolean().default(false),
  error: OperationStatusSchema.optional(),
  response: z.unknown().optional(),
  metadata: z.unknown().optional(),
});

/**
 * Validates a raw snapshot and normalizes it.
 *
 * A running snapshot never carries `error` or `response`; a finished one
 * carries `error` when the server sent both.
 *
 * @throws {TransportError} of kind MalformedResponse when the body does not fit
 */
export function parseOperationResource(body: unknown, operationName?: string): OperationResource {
  const result = OperationResourceSchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw TransportError.malformed(
      `Malformed operation snapshot${where}: ${issue?.message ?? 'invalid body'}`,
      operationName
    );
  }

  const data = result.data;
  const operation: OperationResource = { done: data.done };
  if (data.name !== undefined) {
    operation.name = data.name;
  }
  if (data.metadata !== undefined) {
    operation.metadata = data.metadata;
  }
  if (!data.done) {
    return operation;
  }

  if (data.error) {
    operation.error = toStatus(data.error);
  } else if (data.response !== undefined) {
    operation.response = data.response;
  }
  return operation;
}

function toStatus(status: z.infer<typeof OperationStatusSchema>): OperationStatus {
  const result: OperationStatus = { code: status.code, message: status.message };
  if (status.details !== undefined) {
    result.details = status.details;
  }
  return result;
}

/**
 * Creates a frozen operation handle.
 *
 * @throws {ConfigurationError} of kind InvalidHandle when the name is blank
 */
export function createOperationHandle(name: string, scope: OperationScope = {}): OperationHandle {
  if (name.trim() === '') {
    throw ConfigurationError.invalidHandle('Operation name must not be empty');
  }
  const handle: { name: string; project?: string; location?: string } = { name };
  if (scope.project) {
    handle.project = scope.project;
  }
  if (scope.location) {
    handle.location = scope.location;
  }
  return Object.freeze(handle);
}

/**
 * Resolves a handle to the relative resource name used in request paths.
 *
 * Names containing '/' are already relative names. Bare ids are expanded
 * with the handle's scope, falling back to `fallback` per field.
 */
export function resolveOperationName(handle: OperationHandle, fallback: OperationScope = {}): string {
  if (handle.name.includes('/')) {
    return handle.name;
  }
  const project = handle.project ?? fallback.project;
  const location = handle.location ?? fallback.location;
  if (project && location) {
    return `projects/${project}/locations/${location}/operations/${handle.name}`;
  }
  if (project) {
    return `projects/${project}/operations/${handle.name}`;
  }
  return `operations/${handle.name}`;
}

/**
 * Components of a relative operation name.
 */
export interface ParsedOperationName {
  id: string;
  project?: string;
  location?: string;
}

const LOCATION_SCOPED_NAME = /^projects\/([^/]+)\/locations\/([^/]+)\/operations\/(.+)$/;
const PROJECT_SCOPED_NAME = /^projects\/([^/]+)\/operations\/(.+)$/;
const GLOBAL_NAME = /^operations\/(.+)$/;

/**
 * Splits a relative operation name into its components. Unrecognized
 * names are returned whole as the id.
 */
export function parseOperationName(name: string): ParsedOperationName {
  const scoped = LOCATION_SCOPED_NAME.exec(name);
  if (scoped) {
    const [, project, location, id] = scoped;
    if (project && location && id) {
      return { id, project, location };
    }
  }

  const projectScoped = PROJECT_SCOPED_NAME.exec(name);
  if (projectScoped) {
    const [, project, id] = projectScoped;
    if (project && id) {
      return { id, project };
    }
  }

  const id = GLOBAL_NAME.exec(name)?.[1];
  return { id: id ?? name };
}

/**
 * Builds a handle from a relative operation name.
 */
export function operationHandleFromName(name: string): OperationHandle {
  const parsed = parseOperationName(name);
  return createOperationHandle(name, { project: parsed.project, location: parsed.location });
}
