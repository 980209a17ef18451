/**
 * BigQuery reference tests
 */

import { describe, it, expect } from 'vitest';
import {
  biReservationReference,
  capacityCommitmentReference,
  connectionReference,
  datasetReference,
  jobReference,
  modelReference,
  projectReference,
  reservationAssignmentReference,
  reservationReference,
  routineReference,
  rowAccessPolicyReference,
  tableReference,
  transferConfigReference,
  transferRunReference,
} from '../references/types.js';
import {
  datasetOf,
  describeReference,
  formatReference,
  projectOf,
  referencePath,
  referencesEqual,
  referenceTypeName,
} from '../references/format.js';
import {
  getDatasetReference,
  getJobReference,
  getModelReference,
  getProjectReference,
  getReference,
  getRoutineReference,
  getRowAccessPolicyReference,
  getTableReference,
  jobReferenceFromName,
  operationHandleFromJob,
  parseIdentifier,
} from '../references/parse.js';
import {
  getBiReservationReference,
  getCapacityCommitmentReference,
  getConnectionReference,
  getReservationAssignmentReference,
  getReservationReference,
  parseReservationPath,
} from '../references/location.js';
import { InvalidReferenceError } from '../errors.js';

describe('reference constructors', () => {
  it('creates frozen references tagged by kind', () => {
    const ref = tableReference('p', 'd', 't');

    expect(ref).toEqual({ kind: 'table', projectId: 'p', datasetId: 'd', tableId: 't' });
    expect(Object.isFrozen(ref)).toBe(true);
  });

  it('names the missing field', () => {
    expect(() => tableReference('p', '', 't')).toThrow(
      new InvalidReferenceError('Missing required argument datasetId to table reference')
    );
    expect(() => transferRunReference('')).toThrow(
      'Missing required argument transferRunName to transferRun reference'
    );
  });

  it('omits an empty job location', () => {
    expect(jobReference('p', 'j', '')).toEqual({ kind: 'job', projectId: 'p', jobId: 'j' });
    expect(jobReference('p', 'j', 'EU')).toEqual({ kind: 'job', projectId: 'p', jobId: 'j', location: 'EU' });
  });
});

describe('formatReference', () => {
  it.each([
    [projectReference('p'), 'p'],
    [datasetReference('p', 'd'), 'p:d'],
    [tableReference('p', 'd', 't'), 'p:d.t'],
    [jobReference('p', 'j', 'US'), 'p:j'],
    [modelReference('p', 'd', 'm'), 'p:d.m'],
    [routineReference('p', 'd', 'r'), 'p:d.r'],
    [rowAccessPolicyReference('p', 'd', 't', 'pol'), 'p:d.t.pol'],
    [reservationReference('p', 'us', 'res'), 'p:us.res'],
    [capacityCommitmentReference('p', 'us', 'cc'), 'p:us.cc'],
    [reservationAssignmentReference('p', 'us', 'res', 'a1'), 'p:us.res.a1'],
    [biReservationReference('p', 'us'), 'p:us'],
    [connectionReference('p', 'us', 'conn'), 'p.us.conn'],
    [transferConfigReference('projects/1/transferConfigs/c'), 'projects/1/transferConfigs/c'],
    [transferRunReference('projects/1/transferConfigs/c/runs/r'), 'projects/1/transferConfigs/c/runs/r'],
  ])('formats %o as %s', (ref, expected) => {
    expect(formatReference(ref)).toBe(expected);
  });
});

describe('referencePath', () => {
  it('builds REST paths for addressable kinds', () => {
    expect(referencePath(routineReference('p', 'd', 'r'))).toBe('projects/p/datasets/d/routines/r');
    expect(referencePath(reservationReference('p', 'us', 'res'))).toBe('projects/p/locations/us/reservations/res');
    expect(referencePath(capacityCommitmentReference('p', 'us', 'cc'))).toBe(
      'projects/p/locations/us/capacityCommitments/cc'
    );
    expect(referencePath(reservationAssignmentReference('p', 'us', 'res', 'a1'))).toBe(
      'projects/p/locations/us/reservations/res/assignments/a1'
    );
    expect(referencePath(biReservationReference('p', 'us'))).toBe('projects/p/locations/us/biReservation');
    expect(referencePath(connectionReference('p', 'us', 'conn'))).toBe('projects/p/locations/us/connections/conn');
  });

  it('returns undefined for other kinds', () => {
    expect(referencePath(tableReference('p', 'd', 't'))).toBeUndefined();
    expect(referencePath(jobReference('p', 'j'))).toBeUndefined();
  });
});

describe('describeReference', () => {
  it('prefixes the type name', () => {
    expect(describeReference(tableReference('p', 'd', 't'))).toBe("table 'p:d.t'");
    expect(describeReference(rowAccessPolicyReference('p', 'd', 't', 'pol'))).toBe("row access policy 'p:d.t.pol'");
    expect(referenceTypeName('biReservation')).toBe('bi reservation');
  });
});

describe('referencesEqual', () => {
  it('compares kind and every field', () => {
    expect(referencesEqual(jobReference('p', 'j', 'US'), jobReference('p', 'j', 'US'))).toBe(true);
    expect(referencesEqual(jobReference('p', 'j'), jobReference('p', 'j', 'US'))).toBe(false);
    expect(referencesEqual(modelReference('p', 'd', 'x'), routineReference('p', 'd', 'x'))).toBe(false);
    expect(referencesEqual(tableReference('p', 'd', 't'), tableReference('p', 'd', 'u'))).toBe(false);
  });
});

describe('navigation', () => {
  it('finds the owning project', () => {
    expect(projectOf(tableReference('p', 'd', 't'))).toEqual({ kind: 'project', projectId: 'p' });
    expect(projectOf(connectionReference('p', 'us', 'c'))).toEqual({ kind: 'project', projectId: 'p' });
    expect(projectOf(transferConfigReference('projects/1/transferConfigs/c'))).toBeUndefined();
  });

  it('finds the owning dataset', () => {
    expect(datasetOf(modelReference('p', 'd', 'm'))).toEqual({ kind: 'dataset', projectId: 'p', datasetId: 'd' });
    expect(datasetOf(jobReference('p', 'j'))).toBeUndefined();
  });
});

describe('parseIdentifier', () => {
  it.each([
    ['p:d.t', { projectId: 'p', datasetId: 'd', tableId: 't' }],
    ['d.t', { projectId: '', datasetId: 'd', tableId: 't' }],
    ['t', { projectId: '', datasetId: '', tableId: 't' }],
    ['p:d', { projectId: 'p', datasetId: 'd', tableId: '' }],
    ['', { projectId: '', datasetId: '', tableId: '' }],
    ['example.com:my-project', { projectId: 'example.com:my-project', datasetId: '', tableId: '' }],
    ['example.com:p:d.t', { projectId: 'example.com:p', datasetId: 'd', tableId: 't' }],
  ])('splits %j', (identifier, expected) => {
    expect(parseIdentifier(identifier)).toEqual(expected);
  });

  it('moves INFORMATION_SCHEMA into the table part', () => {
    expect(parseIdentifier('p:d.INFORMATION_SCHEMA.TABLES')).toEqual({
      projectId: 'p',
      datasetId: 'd',
      tableId: 'INFORMATION_SCHEMA.TABLES',
    });
    expect(parseIdentifier('region-us.INFORMATION_SCHEMA.JOBS')).toEqual({
      projectId: '',
      datasetId: 'region-us',
      tableId: 'INFORMATION_SCHEMA.JOBS',
    });
  });

  it('leaves dataset-qualified views alone', () => {
    expect(parseIdentifier('d.INFORMATION_SCHEMA.SCHEMATA')).toEqual({
      projectId: '',
      datasetId: 'd.INFORMATION_SCHEMA',
      tableId: 'SCHEMATA',
    });
  });
});

describe('getProjectReference', () => {
  it('reads a bare id as the project', () => {
    expect(getProjectReference({}, 'p')).toEqual({ kind: 'project', projectId: 'p' });
  });

  it('falls back to the default project', () => {
    expect(getProjectReference({ projectId: 'fb' })).toEqual({ kind: 'project', projectId: 'fb' });
  });

  it('asks for a project when none is known', () => {
    expect(() => getProjectReference({}, '')).toThrow('Please provide a project ID.');
  });

  it('rejects dataset identifiers', () => {
    expect(() => getProjectReference({}, 'p:d')).toThrow('Cannot determine project described by p:d');
  });
});

describe('getDatasetReference', () => {
  it('reads a bare id as the dataset in the default project', () => {
    expect(getDatasetReference({ projectId: 'fb' }, 'd')).toEqual({ kind: 'dataset', projectId: 'fb', datasetId: 'd' });
  });

  it('reads qualified identifiers', () => {
    expect(getDatasetReference({}, 'p:d')).toEqual({ kind: 'dataset', projectId: 'p', datasetId: 'd' });
  });

  it('uses the default dataset for an empty identifier', () => {
    expect(getDatasetReference({ projectId: 'fb', datasetId: 'p2:d2' })).toEqual({
      kind: 'dataset',
      projectId: 'p2',
      datasetId: 'd2',
    });
  });

  it('fails without a project', () => {
    expect(() => getDatasetReference({}, 'd')).toThrow('Cannot determine dataset described by d');
    expect(() => getDatasetReference({}, 'd.t')).toThrow('Cannot determine dataset described by d.t');
  });
});

describe('getTableReference', () => {
  it('places a bare id in the default dataset', () => {
    expect(getTableReference({ projectId: 'fb', datasetId: 'ds' }, 't')).toEqual(tableReference('fb', 'ds', 't'));
  });

  it('honors a project-qualified default dataset', () => {
    expect(getTableReference({ projectId: 'fb', datasetId: 'p2:ds' }, 't')).toEqual(tableReference('p2', 'ds', 't'));
  });

  it('fills only the project for dataset.table', () => {
    expect(getTableReference({ projectId: 'fb' }, 'd.t')).toEqual(tableReference('fb', 'd', 't'));
  });

  it('uses the explicit default dataset last', () => {
    expect(getTableReference({ projectId: 'fb' }, 't', 'defaults')).toEqual(tableReference('fb', 'defaults', 't'));
  });

  it('fails when the dataset is unknown', () => {
    expect(() => getTableReference({ projectId: 'fb' }, 't')).toThrow('Cannot determine table described by t');
  });
});

describe('dataset-scoped getters', () => {
  it('resolves models and routines', () => {
    expect(getModelReference({ projectId: 'p' }, 'd.m')).toEqual(modelReference('p', 'd', 'm'));
    expect(getRoutineReference({ projectId: 'p', datasetId: 'd' }, 'r')).toEqual(routineReference('p', 'd', 'r'));
  });

  it('resolves row access policies on a table', () => {
    expect(getRowAccessPolicyReference({ projectId: 'p' }, 'd.t', 'pol')).toEqual(
      rowAccessPolicyReference('p', 'd', 't', 'pol')
    );
  });

  it('fails on an empty policy id', () => {
    expect(() => getRowAccessPolicyReference({ projectId: 'p' }, 'd.t', '')).toThrow(
      'Cannot determine row access policy described by d.t and '
    );
  });
});

describe('getJobReference', () => {
  it.each([
    ['p:us.j1', undefined, jobReference('p', 'j1', 'us')],
    ['p:j1', undefined, jobReference('p', 'j1')],
    ['asia-northeast1.j1', undefined, jobReference('fb', 'j1', 'asia-northeast1')],
    ['j1', undefined, jobReference('fb', 'j1')],
    ['j1', 'EU', jobReference('fb', 'j1', 'EU')],
    ['example.com:p:us.j', undefined, jobReference('example.com:p', 'j', 'us')],
  ])('resolves %j', (identifier, location, expected) => {
    expect(getJobReference({ projectId: 'fb' }, identifier, location)).toEqual(expected);
  });

  it('fails without a project', () => {
    expect(() => getJobReference({}, 'j1')).toThrow('Cannot determine job described by j1');
  });

  it('fails on malformed identifiers', () => {
    expect(() => getJobReference({ projectId: 'fb' }, 'bad id!')).toThrow(InvalidReferenceError);
  });
});

describe('getReference', () => {
  it('prefers a table', () => {
    expect(getReference({ projectId: 'fb', datasetId: 'ds' }, 't')).toEqual(tableReference('fb', 'ds', 't'));
  });

  it('falls back to a dataset', () => {
    expect(getReference({}, 'p:d')).toEqual(datasetReference('p', 'd'));
  });

  it('falls back to a project', () => {
    expect(getReference({}, 'p')).toEqual(projectReference('p'));
  });

  it('fails when nothing fits', () => {
    expect(() => getReference({}, '')).toThrow('Cannot determine reference for ""');
  });
});

describe('job names', () => {
  it('parses job resource names', () => {
    expect(jobReferenceFromName('projects/p/jobs/j', 'US')).toEqual(jobReference('p', 'j', 'US'));
  });

  it('rejects other resource names', () => {
    expect(() => jobReferenceFromName('projects/p/datasets/d')).toThrow(
      'Cannot determine job described by projects/p/datasets/d'
    );
  });

  it('builds the operation handle for a job', () => {
    expect(operationHandleFromJob(jobReference('p', 'j', 'EU'))).toEqual({
      name: 'projects/p/jobs/j',
      project: 'p',
      location: 'EU',
    });
  });
});

describe('getReservationReference', () => {
  it('reads project, location and reservation', () => {
    expect(getReservationReference({ projectId: 'p' }, 'p:us.res')).toEqual(reservationReference('p', 'us', 'res'));
  });

  it('takes the location from the default', () => {
    expect(getReservationReference({ projectId: 'p' }, 'res', { defaultLocation: 'US' })).toEqual(
      reservationReference('p', 'US', 'res')
    );
  });

  it('compares locations without regard to case', () => {
    expect(getReservationReference({ projectId: 'p' }, 'EU.res', { defaultLocation: 'eu' })).toEqual(
      reservationReference('p', 'EU', 'res')
    );
    expect(() => getReservationReference({ projectId: 'p' }, 'us.res', { defaultLocation: 'EU' })).toThrow(
      "Specified location 'EU' should be the same as the location of the reservation 'us'."
    );
  });

  it('rejects a project other than the default unless told not to check', () => {
    expect(() => getReservationReference({ projectId: 'p' }, 'other:us.res')).toThrow(
      "Specified project 'p' should be the same as the project of the reservation 'other'."
    );
    expect(getReservationReference({ projectId: 'p' }, 'other:us.res', { checkReservationProject: false })).toEqual(
      reservationReference('other', 'us', 'res')
    );
  });

  it('falls back to the default reservation id', () => {
    expect(() => getReservationReference({ projectId: 'p' }, '', { defaultLocation: 'US' })).toThrow(
      'Reservation name not specified.'
    );
    expect(
      getReservationReference({ projectId: 'p' }, '', { defaultLocation: 'US', defaultReservationId: 'default' })
    ).toEqual(reservationReference('p', 'US', 'default'));
  });

  it('requires a project and a location', () => {
    expect(() => getReservationReference({}, 'us.res')).toThrow('Project id not specified.');
    expect(() => getReservationReference({ projectId: 'p' }, 'res')).toThrow('Location not specified.');
  });

  it('rejects identifiers outside the grammar', () => {
    expect(() => getReservationReference({ projectId: 'p' }, 'bad id!')).toThrow(InvalidReferenceError);
    expect(() => getReservationReference({ projectId: 'p' }, 'bad id!')).toThrow(
      'Could not parse reservation identifier: bad id!'
    );
  });
});

describe('parseReservationPath', () => {
  it('reads reservation paths', () => {
    expect(parseReservationPath('projects/p/locations/us/reservations/res')).toEqual({
      projectId: 'p',
      location: 'us',
      reservationId: 'res',
    });
  });

  it('names the BI reservation by its fixed id', () => {
    expect(parseReservationPath('projects/p/locations/us/biReservation')).toEqual({
      projectId: 'p',
      location: 'us',
      reservationId: 'biReservation',
    });
  });

  it('rejects paths without a location', () => {
    expect(() => parseReservationPath('projects/p/reservations/r')).toThrow(
      'Could not parse reservation path: projects/p/reservations/r'
    );
  });
});

describe('getBiReservationReference', () => {
  it('uses the default project and location', () => {
    expect(getBiReservationReference({ projectId: 'p' }, 'US')).toEqual(biReservationReference('p', 'US'));
  });

  it('requires both', () => {
    expect(() => getBiReservationReference({}, 'US')).toThrow('Project id not specified.');
    expect(() => getBiReservationReference({ projectId: 'p' })).toThrow('Location not specified.');
  });
});

describe('getCapacityCommitmentReference', () => {
  it('reads an identifier', () => {
    expect(getCapacityCommitmentReference({ projectId: 'p' }, { identifier: 'us.12345' })).toEqual(
      capacityCommitmentReference('p', 'us', '12345')
    );
  });

  it('reads a resource path', () => {
    expect(
      getCapacityCommitmentReference({}, { path: 'projects/p/locations/eu/capacityCommitments/c1' })
    ).toEqual(capacityCommitmentReference('p', 'eu', 'c1'));
  });

  it('accepts comma-separated ids only when allowed', () => {
    expect(
      getCapacityCommitmentReference({ projectId: 'p' }, { identifier: 'us.111,222' }, { allowCommas: true })
    ).toEqual(capacityCommitmentReference('p', 'us', '111,222'));
    expect(() => getCapacityCommitmentReference({ projectId: 'p' }, { identifier: 'us.111,222' })).toThrow(
      'Could not parse capacity commitment identifier: us.111,222'
    );
  });

  it('requires an id', () => {
    expect(() => getCapacityCommitmentReference({ projectId: 'p' }, { identifier: 'us.' })).toThrow(
      'Capacity commitment id not specified.'
    );
  });
});

describe('getReservationAssignmentReference', () => {
  it('reads an identifier and a path to the same assignment', () => {
    const expected = reservationAssignmentReference('p', 'us', 'res', 'a1');

    expect(getReservationAssignmentReference({}, { identifier: 'p:us.res.a1' })).toEqual(expected);
    expect(
      getReservationAssignmentReference({}, { path: 'projects/p/locations/us/reservations/res/assignments/a1' })
    ).toEqual(expected);
  });

  it('needs both reservation and assignment in an identifier', () => {
    expect(() => getReservationAssignmentReference({ projectId: 'p' }, { identifier: 'res' })).toThrow(
      'Could not parse reservation assignment identifier: res'
    );
  });
});

describe('getConnectionReference', () => {
  it('reads project, location and connection', () => {
    expect(getConnectionReference({}, { identifier: 'p.us.conn' })).toEqual(connectionReference('p', 'us', 'conn'));
  });

  it('keeps a dot inside a domain-scoped project', () => {
    expect(getConnectionReference({}, { identifier: 'example.com:p.us.conn' })).toEqual(
      connectionReference('example.com:p', 'us', 'conn')
    );
  });

  it('fills the project and location from defaults', () => {
    expect(getConnectionReference({ projectId: 'p' }, { identifier: 'conn' }, { defaultLocation: 'eu' })).toEqual(
      connectionReference('p', 'eu', 'conn')
    );
  });

  it('reads a resource path', () => {
    expect(getConnectionReference({}, { path: 'projects/p/locations/us/connections/conn' })).toEqual(
      connectionReference('p', 'us', 'conn')
    );
  });

  it('rejects empty and overlong identifiers and foreign paths', () => {
    expect(() => getConnectionReference({ projectId: 'p' }, { identifier: '' })).toThrow('Empty connection identifier');
    expect(() => getConnectionReference({ projectId: 'p' }, { identifier: 'a.b.c.d.e' })).toThrow(
      'Could not parse connection identifier: a.b.c.d.e'
    );
    expect(() => getConnectionReference({ projectId: 'p' }, { path: 'projects/p/connections/conn' })).toThrow(
      'Could not parse connection path: projects/p/connections/conn'
    );
  });
});
