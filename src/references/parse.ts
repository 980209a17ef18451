/**
 * Identifier parsing for BigQuery references.
 *
 * Identifiers follow the bq command line forms: `project:dataset.table`,
 * `dataset.table`, `table`, `project:location.job` and so on. Parts the
 * identifier leaves out are taken from the fallbacks.
 * @module references/parse
 */

import { InvalidReferenceError } from '../errors.js';
import { createOperationHandle, type OperationHandle } from '../types/operation.js';
import {
  datasetReference,
  jobReference,
  modelReference,
  projectReference,
  routineReference,
  rowAccessPolicyReference,
  tableReference,
  type DatasetReference,
  type JobReference,
  type ModelReference,
  type ProjectReference,
  type RoutineReference,
  type RowAccessPolicyReference,
  type TableReference,
} from './types.js';

/**
 * Defaults for parts an identifier leaves out.
 */
export interface IdFallbacks {
  projectId?: string;
  /** Default dataset, optionally project-qualified (`project:dataset`) */
  datasetId?: string;
}

/**
 * Raw identifier parts; missing parts are empty strings.
 */
export interface ParsedIdentifier {
  projectId: string;
  datasetId: string;
  tableId: string;
}

// A lone domain-scoped project such as example.com:my-project
const DOMAIN_PROJECT = /^\w[\w.]*\.[\w.]+:\w[\w\d_-]*:?$/;

const JOB_IDENTIFIER = /^(?:([\w:\-.]*[\w:\-]+):)?(?:([a-zA-Z\-0-9]+)\.)?([\w-]+)$/;

const JOB_NAME = /^projects\/([^/]+)\/jobs\/([^/]+)$/;

const DATASET_QUALIFIED_VIEWS = new Set(['SCHEMATA', 'SCHEMATA_OPTIONS']);

function rpartition(value: string, separator: string): [string, string] {
  const index = value.lastIndexOf(separator);
  if (index === -1) {
    return ['', value];
  }
  return [value.slice(0, index), value.slice(index + separator.length)];
}

/**
 * Moves INFORMATION_SCHEMA from the dataset to the table for
 * dataset-qualified views: `d.INFORMATION_SCHEMA` + `TABLES` becomes
 * `d` + `INFORMATION_SCHEMA.TABLES`.
 */
function shiftInformationSchema(datasetId: string, tableId: string): [string, string] {
  if (!datasetId || !tableId) {
    return [datasetId, tableId];
  }
  const parts = datasetId.split('.');
  if (parts[parts.length - 1] !== 'INFORMATION_SCHEMA' || DATASET_QUALIFIED_VIEWS.has(tableId)) {
    return [datasetId, tableId];
  }
  return [parts.slice(0, -1).join('.'), `INFORMATION_SCHEMA.${tableId}`];
}

/**
 * Splits an identifier into project, dataset and table parts without
 * validating them. A bare id with no separators comes back as the table.
 */
export function parseIdentifier(identifier: string): ParsedIdentifier {
  if (DOMAIN_PROJECT.test(identifier)) {
    return { projectId: identifier, datasetId: '', tableId: '' };
  }

  const [projectId, rest] = rpartition(identifier, ':');
  let datasetId: string;
  let tableId: string;

  if (rest.includes('.')) {
    [datasetId, tableId] = rpartition(rest, '.');
  } else if (projectId) {
    datasetId = rest;
    tableId = '';
  } else {
    datasetId = '';
    tableId = rest;
  }

  [datasetId, tableId] = shiftInformationSchema(datasetId, tableId);
  return { projectId, datasetId, tableId };
}

function parseDatasetIdentifier(identifier: string): [string, string] {
  return rpartition(identifier, ':');
}

function attempt<T>(build: () => T): T | undefined {
  try {
    return build();
  } catch (error) {
    if (error instanceof InvalidReferenceError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Resolves a project reference. A bare id is read as the project.
 */
export function getProjectReference(fallbacks: IdFallbacks, identifier = ''): ProjectReference {
  const parsed = parseIdentifier(identifier);
  const projectId = parsed.projectId || parsed.tableId || fallbacks.projectId || '';

  if (!parsed.datasetId && projectId) {
    return projectReference(projectId);
  }
  if (projectId === '') {
    throw new InvalidReferenceError('Please provide a project ID.');
  }
  throw new InvalidReferenceError(`Cannot determine project described by ${identifier}`);
}

/**
 * Resolves a dataset reference. A bare id is read as the dataset; an empty
 * identifier falls back to the default dataset.
 */
export function getDatasetReference(fallbacks: IdFallbacks, identifier = ''): DatasetReference {
  const target = identifier || fallbacks.datasetId || '';
  const parsed = parseIdentifier(target);
  const failure = `Cannot determine dataset described by ${target}`;

  let projectId = parsed.projectId;
  let datasetId = parsed.datasetId;

  if (parsed.tableId && !parsed.projectId && !parsed.datasetId) {
    projectId = fallbacks.projectId ?? '';
    datasetId = parsed.tableId;
  } else if (parsed.projectId && parsed.datasetId && parsed.tableId) {
    datasetId = `${parsed.datasetId}.${parsed.tableId}`;
  } else if (!(parsed.projectId && parsed.datasetId)) {
    throw new InvalidReferenceError(failure);
  }

  const ref = attempt(() => datasetReference(projectId, datasetId));
  if (!ref) {
    throw new InvalidReferenceError(failure);
  }
  return ref;
}

function resolveDatasetScoped(
  fallbacks: IdFallbacks,
  identifier: string,
  defaultDatasetId = ''
): ParsedIdentifier {
  const parsed = parseIdentifier(identifier);
  let { projectId, datasetId } = parsed;
  if (!datasetId) {
    [projectId, datasetId] = parseDatasetIdentifier(fallbacks.datasetId ?? '');
  }
  if (defaultDatasetId && !datasetId) {
    datasetId = defaultDatasetId;
  }
  return { projectId: projectId || fallbacks.projectId || '', datasetId, tableId: parsed.tableId };
}

/**
 * Resolves a table reference. A bare id is read as the table in the
 * default dataset.
 */
export function getTableReference(fallbacks: IdFallbacks, identifier = '', defaultDatasetId = ''): TableReference {
  const { projectId, datasetId, tableId } = resolveDatasetScoped(fallbacks, identifier, defaultDatasetId);
  const ref = attempt(() => tableReference(projectId, datasetId, tableId));
  if (!ref) {
    throw new InvalidReferenceError(`Cannot determine table described by ${identifier}`);
  }
  return ref;
}

export function getModelReference(fallbacks: IdFallbacks, identifier = ''): ModelReference {
  const { projectId, datasetId, tableId } = resolveDatasetScoped(fallbacks, identifier);
  const ref = attempt(() => modelReference(projectId, datasetId, tableId));
  if (!ref) {
    throw new InvalidReferenceError(`Cannot determine model described by ${identifier}`);
  }
  return ref;
}

export function getRoutineReference(fallbacks: IdFallbacks, identifier = ''): RoutineReference {
  const { projectId, datasetId, tableId } = resolveDatasetScoped(fallbacks, identifier);
  const ref = attempt(() => routineReference(projectId, datasetId, tableId));
  if (!ref) {
    throw new InvalidReferenceError(`Cannot determine routine described by ${identifier}`);
  }
  return ref;
}

export function getRowAccessPolicyReference(
  fallbacks: IdFallbacks,
  tableIdentifier: string,
  policyId: string
): RowAccessPolicyReference {
  const table = attempt(() => getTableReference(fallbacks, tableIdentifier));
  const ref = table && attempt(() => rowAccessPolicyReference(table.projectId, table.datasetId, table.tableId, policyId));
  if (!ref) {
    throw new InvalidReferenceError(
      `Cannot determine row access policy described by ${tableIdentifier} and ${policyId}`
    );
  }
  return ref;
}

/**
 * Resolves a job reference from `project:location.job`, `project:job`,
 * `location.job` or `job`.
 */
export function getJobReference(fallbacks: IdFallbacks, identifier = '', defaultLocation?: string): JobReference {
  const match = JOB_IDENTIFIER.exec(identifier);
  const jobId = match?.[3];
  if (match && jobId) {
    const projectId = match[1] || fallbacks.projectId || '';
    const location = match[2] || defaultLocation;
    const ref = attempt(() => jobReference(projectId, jobId, location));
    if (ref) {
      return ref;
    }
  }
  throw new InvalidReferenceError(`Cannot determine job described by ${identifier}`);
}

/**
 * Resolves the most specific reference the identifier allows: a table,
 * then a dataset, then a project.
 */
export function getReference(
  fallbacks: IdFallbacks,
  identifier = ''
): TableReference | DatasetReference | ProjectReference {
  const ref =
    attempt(() => getTableReference(fallbacks, identifier)) ??
    attempt(() => getDatasetReference(fallbacks, identifier)) ??
    attempt(() => getProjectReference(fallbacks, identifier));
  if (!ref) {
    throw new InvalidReferenceError(`Cannot determine reference for "${identifier}"`);
  }
  return ref;
}

/**
 * Parses a job resource name (`projects/{project}/jobs/{job}`).
 */
export function jobReferenceFromName(name: string, location?: string): JobReference {
  const match = JOB_NAME.exec(name);
  const projectId = match?.[1];
  const jobId = match?.[2];
  if (!projectId || !jobId) {
    throw new InvalidReferenceError(`Cannot determine job described by ${name}`);
  }
  return jobReference(projectId, jobId, location);
}

/**
 * Operation handle under which a BigQuery job is polled.
 */
export function operationHandleFromJob(ref: JobReference): OperationHandle {
  return createOperationHandle(`projects/${ref.projectId}/jobs/${ref.jobId}`, {
    project: ref.projectId,
    location: ref.location,
  });
}
