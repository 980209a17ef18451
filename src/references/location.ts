/**
 * Parsing for location-scoped BigQuery resources: reservations, capacity
 * commitments, reservation assignments, the BI reservation and connections.
 *
 * Each resource can be named by a short identifier
 * (`project:location.reservation`) or by its full resource path
 * (`projects/{project}/locations/{location}/reservations/{reservation}`).
 * @module references/location
 */

import { InvalidReferenceError } from '../errors.js';
import type { IdFallbacks } from './parse.js';
import {
  biReservationReference,
  capacityCommitmentReference,
  connectionReference,
  reservationAssignmentReference,
  reservationReference,
  type BiReservationReference,
  type CapacityCommitmentReference,
  type ConnectionReference,
  type ReservationAssignmentReference,
  type ReservationReference,
} from './types.js';

/**
 * Parts read from an identifier or path; any of them may be missing.
 */
export interface LocationScopedParts {
  projectId?: string;
  location?: string;
}

export interface ParsedReservation extends LocationScopedParts {
  reservationId?: string;
}

export interface ParsedCapacityCommitment extends LocationScopedParts {
  capacityCommitmentId?: string;
}

export interface ParsedReservationAssignment extends LocationScopedParts {
  reservationId?: string;
  reservationAssignmentId?: string;
}

export interface ParsedConnection extends LocationScopedParts {
  connectionId?: string;
}

/**
 * Names a resource by short identifier or by resource path.
 */
export type ResourceSource = { identifier: string } | { path: string };

const PROJECT = '([\\w:\\-.]*[\\w:\\-]+)';
const LOCATION = '([\\w-]+)';
const PATH_PREFIX = `^projects\\/${PROJECT}?\\/locations\\/${LOCATION}?\\/`;

const RESERVATION_IDENTIFIER = new RegExp(`^(?:${PROJECT}:)?(?:${LOCATION}\\.)?([\\w-]*)$`);
const RESERVATION_PATH = new RegExp(`${PATH_PREFIX}(?:reservations\\/([\\w\\-/]+)|(biReservation))$`);

const COMMITMENT_IDENTIFIER = new RegExp(`^(?:${PROJECT}:)?(?:${LOCATION}\\.)?([\\w|-]*)$`);
const COMMITMENT_IDENTIFIER_WITH_COMMAS = new RegExp(`^(?:${PROJECT}:)?(?:${LOCATION}\\.)?([\\w|,-]*)$`);
const COMMITMENT_PATH = new RegExp(`${PATH_PREFIX}capacityCommitments\\/([\\w|-]+)$`);

const ASSIGNMENT_IDENTIFIER = new RegExp(`^(?:${PROJECT}:)?(?:${LOCATION}\\.)?([\\w\\-/]+)\\.([\\w-]+)$`);
const ASSIGNMENT_PATH = new RegExp(`${PATH_PREFIX}reservations\\/([\\w-]+)\\/assignments\\/([\\w-]+)$`);

const CONNECTION_PATH = new RegExp(`${PATH_PREFIX}connections\\/([\\w\\-/]+)$`);

// Connection identifiers are at most project.with.dots.location.connection
const MAX_CONNECTION_TOKENS = 4;

function parseReservationIdentifier(identifier: string): ParsedReservation {
  const match = RESERVATION_IDENTIFIER.exec(identifier);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse reservation identifier: ${identifier}`);
  }
  return { projectId: match[1], location: match[2], reservationId: match[3] };
}

/**
 * Parses `projects/{p}/locations/{l}/reservations/{r}`. The BI reservation
 * path `.../locations/{l}/biReservation` yields the id `biReservation`.
 */
export function parseReservationPath(path: string): ParsedReservation {
  const match = RESERVATION_PATH.exec(path);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse reservation path: ${path}`);
  }
  return { projectId: match[1], location: match[2], reservationId: match[3] ?? match[4] };
}

function parseCapacityCommitmentIdentifier(identifier: string, allowCommas: boolean): ParsedCapacityCommitment {
  const pattern = allowCommas ? COMMITMENT_IDENTIFIER_WITH_COMMAS : COMMITMENT_IDENTIFIER;
  const match = pattern.exec(identifier);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse capacity commitment identifier: ${identifier}`);
  }
  return { projectId: match[1], location: match[2], capacityCommitmentId: match[3] };
}

export function parseCapacityCommitmentPath(path: string): ParsedCapacityCommitment {
  const match = COMMITMENT_PATH.exec(path);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse capacity commitment path: ${path}`);
  }
  return { projectId: match[1], location: match[2], capacityCommitmentId: match[3] };
}

function parseReservationAssignmentIdentifier(identifier: string): ParsedReservationAssignment {
  const match = ASSIGNMENT_IDENTIFIER.exec(identifier);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse reservation assignment identifier: ${identifier}`);
  }
  return { projectId: match[1], location: match[2], reservationId: match[3], reservationAssignmentId: match[4] };
}

export function parseReservationAssignmentPath(path: string): ParsedReservationAssignment {
  const match = ASSIGNMENT_PATH.exec(path);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse reservation assignment path: ${path}`);
  }
  return { projectId: match[1], location: match[2], reservationId: match[3], reservationAssignmentId: match[4] };
}

/**
 * Splits `connection`, `location.connection` or `project.location.connection`.
 * The project part may itself contain one dot.
 */
function parseConnectionIdentifier(identifier: string): ParsedConnection {
  if (!identifier) {
    throw new InvalidReferenceError('Empty connection identifier');
  }
  const tokens = identifier.split('.');
  if (tokens.length > MAX_CONNECTION_TOKENS) {
    throw new InvalidReferenceError(`Could not parse connection identifier: ${identifier}`);
  }
  return {
    projectId: tokens.length > 2 ? tokens.slice(0, -2).join('.') : undefined,
    location: tokens.length > 1 ? tokens[tokens.length - 2] : undefined,
    connectionId: tokens[tokens.length - 1],
  };
}

export function parseConnectionPath(path: string): ParsedConnection {
  const match = CONNECTION_PATH.exec(path);
  if (!match) {
    throw new InvalidReferenceError(`Could not parse connection path: ${path}`);
  }
  return { projectId: match[1], location: match[2], connectionId: match[3] };
}

function parseSource<T>(source: ResourceSource, fromIdentifier: (id: string) => T, fromPath: (path: string) => T): T {
  return 'identifier' in source ? fromIdentifier(source.identifier) : fromPath(source.path);
}

function resolveProject(parsed: LocationScopedParts, fallbacks: IdFallbacks): string {
  const projectId = parsed.projectId || fallbacks.projectId;
  if (!projectId) {
    throw new InvalidReferenceError('Project id not specified.');
  }
  return projectId;
}

function resolveLocation(parsed: LocationScopedParts, defaultLocation: string | undefined): string {
  const location = parsed.location || defaultLocation;
  if (!location) {
    throw new InvalidReferenceError('Location not specified.');
  }
  return location;
}

export interface ReservationOptions {
  defaultLocation?: string;
  defaultReservationId?: string;
  /** Reject an identifier whose project differs from the fallback project. Defaults to true. */
  checkReservationProject?: boolean;
}

/**
 * Resolves a reservation from `project:location.reservation` or any suffix
 * of it. When a default location is given, the identifier's location must
 * match it, ignoring case.
 */
export function getReservationReference(
  fallbacks: IdFallbacks,
  identifier = '',
  options: ReservationOptions = {}
): ReservationReference {
  const { defaultLocation, defaultReservationId, checkReservationProject = true } = options;
  const parsed = parseReservationIdentifier(identifier);

  if (checkReservationProject && parsed.projectId && fallbacks.projectId && parsed.projectId !== fallbacks.projectId) {
    throw new InvalidReferenceError(
      `Specified project '${fallbacks.projectId}' should be the same as the project of the reservation '${parsed.projectId}'.`
    );
  }
  const projectId = resolveProject(parsed, fallbacks);
  const location = resolveLocation(parsed, defaultLocation);
  if (defaultLocation && location.toLowerCase() !== defaultLocation.toLowerCase()) {
    throw new InvalidReferenceError(
      `Specified location '${defaultLocation}' should be the same as the location of the reservation '${location}'.`
    );
  }
  const reservationId = parsed.reservationId || defaultReservationId;
  if (!reservationId) {
    throw new InvalidReferenceError('Reservation name not specified.');
  }
  return reservationReference(projectId, location, reservationId);
}

/**
 * The BI reservation has no id of its own: one exists per project and location.
 */
export function getBiReservationReference(fallbacks: IdFallbacks, defaultLocation?: string): BiReservationReference {
  const projectId = resolveProject({}, fallbacks);
  const location = resolveLocation({}, defaultLocation);
  return biReservationReference(projectId, location);
}

export interface CapacityCommitmentOptions {
  defaultLocation?: string;
  defaultCapacityCommitmentId?: string;
  /** Accept comma-separated ids, as used when merging commitments */
  allowCommas?: boolean;
}

export function getCapacityCommitmentReference(
  fallbacks: IdFallbacks,
  source: ResourceSource,
  options: CapacityCommitmentOptions = {}
): CapacityCommitmentReference {
  const { defaultLocation, defaultCapacityCommitmentId, allowCommas = false } = options;
  const parsed = parseSource(
    source,
    (identifier) => parseCapacityCommitmentIdentifier(identifier, allowCommas),
    parseCapacityCommitmentPath
  );

  const projectId = resolveProject(parsed, fallbacks);
  const location = resolveLocation(parsed, defaultLocation);
  const capacityCommitmentId = parsed.capacityCommitmentId || defaultCapacityCommitmentId;
  if (!capacityCommitmentId) {
    throw new InvalidReferenceError('Capacity commitment id not specified.');
  }
  return capacityCommitmentReference(projectId, location, capacityCommitmentId);
}

export interface ReservationAssignmentOptions {
  defaultLocation?: string;
  defaultReservationId?: string;
  defaultReservationAssignmentId?: string;
}

/**
 * Resolves an assignment from `project:location.reservation.assignment` or
 * its resource path.
 */
export function getReservationAssignmentReference(
  fallbacks: IdFallbacks,
  source: ResourceSource,
  options: ReservationAssignmentOptions = {}
): ReservationAssignmentReference {
  const { defaultLocation, defaultReservationId, defaultReservationAssignmentId } = options;
  const parsed = parseSource(source, parseReservationAssignmentIdentifier, parseReservationAssignmentPath);

  const projectId = resolveProject(parsed, fallbacks);
  const location = resolveLocation(parsed, defaultLocation);
  return reservationAssignmentReference(
    projectId,
    location,
    parsed.reservationId || defaultReservationId || '',
    parsed.reservationAssignmentId || defaultReservationAssignmentId || ''
  );
}

export interface ConnectionOptions {
  defaultLocation?: string;
  defaultConnectionId?: string;
}

export function getConnectionReference(
  fallbacks: IdFallbacks,
  source: ResourceSource,
  options: ConnectionOptions = {}
): ConnectionReference {
  const { defaultLocation, defaultConnectionId } = options;
  const parsed = parseSource(source, parseConnectionIdentifier, parseConnectionPath);

  const projectId = resolveProject(parsed, fallbacks);
  const location = resolveLocation(parsed, defaultLocation);
  const connectionId = parsed.connectionId || defaultConnectionId;
  if (!connectionId) {
    throw new InvalidReferenceError('Connection name not specified.');
  }
  return connectionReference(projectId, location, connectionId);
}
