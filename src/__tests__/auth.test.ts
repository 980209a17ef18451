/**
 * Authentication tests
 */

import { inspect } from 'node:util';
import { describe, it, expect } from 'vitest';
import { GcpAuthProvider, parseServiceAccountKey } from '../auth/provider.js';
import { SecretString } from '../auth/secret.js';
import { OperationErrorKind, TransportError } from '../errors.js';

describe('GcpAuthProvider', () => {
  it('returns an explicit access token', async () => {
    const provider = new GcpAuthProvider({ type: 'access_token', token: 'test-token' });

    expect(await provider.getToken()).toBe('test-token');
  });

  it('shares one refresh between concurrent callers', async () => {
    const provider = new GcpAuthProvider({ type: 'access_token', token: 'test-token' });

    const tokens = await Promise.all([provider.getToken(), provider.getToken(), provider.getToken()]);

    expect(tokens).toEqual(['test-token', 'test-token', 'test-token']);
  });

  it('reports an invalid inline service account key', async () => {
    const provider = new GcpAuthProvider({ type: 'service_account', keyJson: 'not json' });

    await expect(provider.getToken()).rejects.toMatchObject({
      kind: OperationErrorKind.ServiceAccountInvalid,
      message: 'Invalid service account key JSON',
    });
  });
});

describe('parseServiceAccountKey', () => {
  it('keeps the fields used for signing', () => {
    const key = parseServiceAccountKey(
      JSON.stringify({ type: 'service_account', client_email: 'sa@p.iam.example', private_key: 'test-secret' })
    );

    expect(key).toEqual({ client_email: 'sa@p.iam.example', private_key: 'test-secret' });
  });

  it('rejects keys without credentials', () => {
    let caught: unknown;
    try {
      parseServiceAccountKey('{"client_email":"sa@p.iam.example"}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TransportError);
    expect(caught).toMatchObject({
      kind: OperationErrorKind.ServiceAccountInvalid,
      message: 'Service account key must contain client_email and private_key',
    });
  });
});

describe('SecretString', () => {
  it('exposes the value only on request', () => {
    const secret = new SecretString('test-secret');

    expect(secret.expose()).toBe('test-secret');
  });

  it('offers no accessor besides expose', () => {
    expect(Object.getOwnPropertyNames(SecretString.prototype)).toEqual(['constructor', 'expose', 'toString', 'toJSON']);
  });

  it('redacts string, JSON and inspect output', () => {
    const secret = new SecretString('test-secret');

    expect(String(secret)).toBe('***REDACTED***');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"***REDACTED***"}');
    expect(inspect(secret)).toBe('SecretString(***REDACTED***)');
  });
});
