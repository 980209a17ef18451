/**
 * Display forms, REST paths and navigation for BigQuery references.
 * @module references/format
 */

import type { BigQueryReference, DatasetReference, ProjectReference, ReferenceKind } from './types.js';

const TYPE_NAMES: Record<ReferenceKind, string> = {
  project: 'project',
  dataset: 'dataset',
  table: 'table',
  job: 'job',
  model: 'model',
  routine: 'routine',
  rowAccessPolicy: 'row access policy',
  reservation: 'reservation',
  capacityCommitment: 'capacity commitment',
  reservationAssignment: 'reservation assignment',
  biReservation: 'bi reservation',
  connection: 'connection',
  transferConfig: 'transfer config',
  transferRun: 'transfer run',
};

/**
 * Human-readable name of a reference kind, e.g. "row access policy".
 */
export function referenceTypeName(kind: ReferenceKind): string {
  return TYPE_NAMES[kind];
}

/**
 * Formats a reference the way the bq command line displays it,
 * e.g. `my-project:sales.orders`.
 */
export function formatReference(ref: BigQueryReference): string {
  switch (ref.kind) {
    case 'project':
      return ref.projectId;
    case 'dataset':
      return `${ref.projectId}:${ref.datasetId}`;
    case 'table':
      return `${ref.projectId}:${ref.datasetId}.${ref.tableId}`;
    case 'job':
      return `${ref.projectId}:${ref.jobId}`;
    case 'model':
      return `${ref.projectId}:${ref.datasetId}.${ref.modelId}`;
    case 'routine':
      return `${ref.projectId}:${ref.datasetId}.${ref.routineId}`;
    case 'rowAccessPolicy':
      return `${ref.projectId}:${ref.datasetId}.${ref.tableId}.${ref.policyId}`;
    case 'reservation':
      return `${ref.projectId}:${ref.location}.${ref.reservationId}`;
    case 'capacityCommitment':
      return `${ref.projectId}:${ref.location}.${ref.capacityCommitmentId}`;
    case 'reservationAssignment':
      return `${ref.projectId}:${ref.location}.${ref.reservationId}.${ref.reservationAssignmentId}`;
    case 'biReservation':
      return `${ref.projectId}:${ref.location}`;
    case 'connection':
      return `${ref.projectId}.${ref.location}.${ref.connectionId}`;
    case 'transferConfig':
      return ref.transferConfigName;
    case 'transferRun':
      return ref.transferRunName;
  }
}

/**
 * REST relative path of a reference, for kinds addressed by one.
 */
export function referencePath(ref: BigQueryReference): string | undefined {
  switch (ref.kind) {
    case 'routine':
      return `projects/${ref.projectId}/datasets/${ref.datasetId}/routines/${ref.routineId}`;
    case 'reservation':
      return `projects/${ref.projectId}/locations/${ref.location}/reservations/${ref.reservationId}`;
    case 'capacityCommitment':
      return `projects/${ref.projectId}/locations/${ref.location}/capacityCommitments/${ref.capacityCommitmentId}`;
    case 'reservationAssignment':
      return (
        `projects/${ref.projectId}/locations/${ref.location}` +
        `/reservations/${ref.reservationId}/assignments/${ref.reservationAssignmentId}`
      );
    case 'biReservation':
      return `projects/${ref.projectId}/locations/${ref.location}/biReservation`;
    case 'connection':
      return `projects/${ref.projectId}/locations/${ref.location}/connections/${ref.connectionId}`;
    case 'project':
    case 'dataset':
    case 'table':
    case 'job':
    case 'model':
    case 'rowAccessPolicy':
    case 'transferConfig':
    case 'transferRun':
      return undefined;
  }
}

/**
 * Describes a reference for messages, e.g. `table 'p:d.t'`.
 */
export function describeReference(ref: BigQueryReference): string {
  return `${TYPE_NAMES[ref.kind]} '${formatReference(ref)}'`;
}

function fieldsOf(ref: BigQueryReference): Map<string, unknown> {
  return new Map(Object.entries(ref));
}

/**
 * Compares kind and every field, including optional ones.
 */
export function referencesEqual(a: BigQueryReference, b: BigQueryReference): boolean {
  if (a.kind !== b.kind) {
    return false;
  }
  const left = fieldsOf(a);
  const right = fieldsOf(b);
  if (left.size !== right.size) {
    return false;
  }
  for (const [key, value] of left) {
    if (right.get(key) !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Project a reference belongs to, for kinds scoped to one.
 */
export function projectOf(ref: BigQueryReference): ProjectReference | undefined {
  if (ref.kind === 'transferConfig' || ref.kind === 'transferRun') {
    return undefined;
  }
  return Object.freeze({ kind: 'project', projectId: ref.projectId });
}

/**
 * Dataset a reference lives in, for dataset-scoped kinds.
 */
export function datasetOf(ref: BigQueryReference): DatasetReference | undefined {
  switch (ref.kind) {
    case 'table':
    case 'model':
    case 'routine':
    case 'rowAccessPolicy':
      return Object.freeze({ kind: 'dataset', projectId: ref.projectId, datasetId: ref.datasetId });
    default:
      return undefined;
  }
}
