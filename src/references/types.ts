/**
 * BigQuery resource references.
 *
 * Every reference is a frozen object tagged by `kind`. Constructors reject
 * missing required fields.
 * @module references/types
 */

import { InvalidReferenceError } from '../errors.js';

export interface ProjectReference {
  readonly kind: 'project';
  readonly projectId: string;
}

export interface DatasetReference {
  readonly kind: 'dataset';
  readonly projectId: string;
  readonly datasetId: string;
}

export interface TableReference {
  readonly kind: 'table';
  readonly projectId: string;
  readonly datasetId: string;
  readonly tableId: string;
}

export interface JobReference {
  readonly kind: 'job';
  readonly projectId: string;
  readonly jobId: string;
  readonly location?: string;
}

export interface ModelReference {
  readonly kind: 'model';
  readonly projectId: string;
  readonly datasetId: string;
  readonly modelId: string;
}

export interface RoutineReference {
  readonly kind: 'routine';
  readonly projectId: string;
  readonly datasetId: string;
  readonly routineId: string;
}

export interface RowAccessPolicyReference {
  readonly kind: 'rowAccessPolicy';
  readonly projectId: string;
  readonly datasetId: string;
  readonly tableId: string;
  readonly policyId: string;
}

export interface ReservationReference {
  readonly kind: 'reservation';
  readonly projectId: string;
  readonly location: string;
  readonly reservationId: string;
}

export interface CapacityCommitmentReference {
  readonly kind: 'capacityCommitment';
  readonly projectId: string;
  readonly location: string;
  readonly capacityCommitmentId: string;
}

export interface ReservationAssignmentReference {
  readonly kind: 'reservationAssignment';
  readonly projectId: string;
  readonly location: string;
  readonly reservationId: string;
  readonly reservationAssignmentId: string;
}

export interface BiReservationReference {
  readonly kind: 'biReservation';
  readonly projectId: string;
  readonly location: string;
}

export interface ConnectionReference {
  readonly kind: 'connection';
  readonly projectId: string;
  readonly location: string;
  readonly connectionId: string;
}

export interface TransferConfigReference {
  readonly kind: 'transferConfig';
  readonly transferConfigName: string;
}

export interface TransferRunReference {
  readonly kind: 'transferRun';
  readonly transferRunName: string;
}

/**
 * Any BigQuery reference.
 */
export type BigQueryReference =
  | ProjectReference
  | DatasetReference
  | TableReference
  | JobReference
  | ModelReference
  | RoutineReference
  | RowAccessPolicyReference
  | ReservationReference
  | CapacityCommitmentReference
  | ReservationAssignmentReference
  | BiReservationReference
  | ConnectionReference
  | TransferConfigReference
  | TransferRunReference;

export type ReferenceKind = BigQueryReference['kind'];

/**
 * Throws unless every listed field is a non-empty string.
 */
function requireFields(kind: ReferenceKind, fields: Record<string, string | undefined>): void {
  for (const [field, value] of Object.entries(fields)) {
    if (!value) {
      throw new InvalidReferenceError(`Missing required argument ${field} to ${kind} reference`);
    }
  }
}

export function projectReference(projectId: string): ProjectReference {
  requireFields('project', { projectId });
  return Object.freeze({ kind: 'project', projectId });
}

export function datasetReference(projectId: string, datasetId: string): DatasetReference {
  requireFields('dataset', { projectId, datasetId });
  return Object.freeze({ kind: 'dataset', projectId, datasetId });
}

export function tableReference(projectId: string, datasetId: string, tableId: string): TableReference {
  requireFields('table', { projectId, datasetId, tableId });
  return Object.freeze({ kind: 'table', projectId, datasetId, tableId });
}

/**
 * Creates a job reference. An empty location is treated as absent.
 */
export function jobReference(projectId: string, jobId: string, location?: string): JobReference {
  requireFields('job', { projectId, jobId });
  if (location) {
    return Object.freeze({ kind: 'job', projectId, jobId, location });
  }
  return Object.freeze({ kind: 'job', projectId, jobId });
}

export function modelReference(projectId: string, datasetId: string, modelId: string): ModelReference {
  requireFields('model', { projectId, datasetId, modelId });
  return Object.freeze({ kind: 'model', projectId, datasetId, modelId });
}

export function routineReference(projectId: string, datasetId: string, routineId: string): RoutineReference {
  requireFields('routine', { projectId, datasetId, routineId });
  return Object.freeze({ kind: 'routine', projectId, datasetId, routineId });
}

export function rowAccessPolicyReference(
  projectId: string,
  datasetId: string,
  tableId: string,
  policyId: string
): RowAccessPolicyReference {
  requireFields('rowAccessPolicy', { projectId, datasetId, tableId, policyId });
  return Object.freeze({ kind: 'rowAccessPolicy', projectId, datasetId, tableId, policyId });
}

export function reservationReference(projectId: string, location: string, reservationId: string): ReservationReference {
  requireFields('reservation', { projectId, location, reservationId });
  return Object.freeze({ kind: 'reservation', projectId, location, reservationId });
}

export function capacityCommitmentReference(
  projectId: string,
  location: string,
  capacityCommitmentId: string
): CapacityCommitmentReference {
  requireFields('capacityCommitment', { projectId, location, capacityCommitmentId });
  return Object.freeze({ kind: 'capacityCommitment', projectId, location, capacityCommitmentId });
}

export function reservationAssignmentReference(
  projectId: string,
  location: string,
  reservationId: string,
  reservationAssignmentId: string
): ReservationAssignmentReference {
  requireFields('reservationAssignment', { projectId, location, reservationId, reservationAssignmentId });
  return Object.freeze({ kind: 'reservationAssignment', projectId, location, reservationId, reservationAssignmentId });
}

export function biReservationReference(projectId: string, location: string): BiReservationReference {
  requireFields('biReservation', { projectId, location });
  return Object.freeze({ kind: 'biReservation', projectId, location });
}

export function connectionReference(projectId: string, location: string, connectionId: string): ConnectionReference {
  requireFields('connection', { projectId, location, connectionId });
  return Object.freeze({ kind: 'connection', projectId, location, connectionId });
}

export function transferConfigReference(transferConfigName: string): TransferConfigReference {
  requireFields('transferConfig', { transferConfigName });
  return Object.freeze({ kind: 'transferConfig', transferConfigName });
}

export function transferRunReference(transferRunName: string): TransferRunReference {
  requireFields('transferRun', { transferRunName });
  return Object.freeze({ kind: 'transferRun', transferRunName });
}
