/**
 * GCP authentication provider for the REST clients.
 * @module auth/provider
 */

import { GoogleAuth, OAuth2Client, type AuthClient, type GoogleAuthOptions } from 'google-auth-library';
import { z } from 'zod';
import { SecretString } from './secret.js';
import { OperationErrorKind, TransportError } from '../errors.js';
import type { AuthMethod } from '../config.js';

/**
 * Supplies bearer tokens for API calls.
 */
export interface AuthProvider {
  getToken(): Promise<string>;
}

/**
 * Cached token with its lifetime.
 */
export interface CachedToken {
  /** Access token (wrapped) */
  token: SecretString;
  /** When the token was obtained */
  obtainedAt: number;
  /** When the token expires */
  expiresAt: number;
}

/**
 * OAuth2 scope for Cloud APIs.
 */
const CLOUD_PLATFORM_SCOPES = ['https://www.googleapis.com/auth/cloud-platform'];

/**
 * Refresh once less than this share of the token lifetime remains.
 */
const REFRESH_THRESHOLD = 0.2;

/**
 * Assumed lifetime of tokens whose expiry is unknown.
 */
const DEFAULT_TOKEN_TTL_MS = 3600 * 1000;

const ServiceAccountKeySchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
});

/**
 * Authentication provider supporting service accounts, workload identity,
 * ADC and explicit access tokens.
 */
export class GcpAuthProvider implements AuthProvider {
  private readonly authMethod: AuthMethod;
  private readonly projectId?: string;
  private googleAuth?: GoogleAuth<AuthClient>;
  private cachedToken?: CachedToken;
  private refreshPromise?: Promise<CachedToken>;

  constructor(authMethod: AuthMethod, projectId?: string) {
    this.authMethod = authMethod;
    this.projectId = projectId;
  }

  /**
   * Gets an access token, refreshing it ahead of expiry.
   * Concurrent callers share one refresh.
   */
  async getToken(): Promise<string> {
    if (this.cachedToken && !this.shouldRefresh(this.cachedToken)) {
      return this.cachedToken.token.expose();
    }

    if (this.refreshPromise) {
      const cached = await this.refreshPromise;
      return cached.token.expose();
    }

    this.refreshPromise = this.refreshToken();
    try {
      const cached = await this.refreshPromise;
      return cached.token.expose();
    } finally {
      this.refreshPromise = undefined;
    }
  }

  private async refreshToken(): Promise<CachedToken> {
    try {
      const cached = await this.fetchToken();
      this.cachedToken = cached;
      return cached;
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  private async fetchToken(): Promise<CachedToken> {
    const obtainedAt = Date.now();

    if (this.authMethod.type === 'access_token') {
      return {
        token: new SecretString(this.authMethod.token),
        obtainedAt,
        expiresAt: obtainedAt + DEFAULT_TOKEN_TTL_MS,
      };
    }

    const auth = this.getOrCreateAuth();
    const client = await auth.getClient();
    const tokenResponse = await client.getAccessToken();

    if (!tokenResponse.token) {
      throw new TransportError(
        OperationErrorKind.TokenRefreshFailed,
        `Failed to obtain access token from ${this.describeSource()}`
      );
    }

    let expiresAt = obtainedAt + DEFAULT_TOKEN_TTL_MS;
    if (client instanceof OAuth2Client && client.credentials.expiry_date) {
      expiresAt = client.credentials.expiry_date;
    }

    return { token: new SecretString(tokenResponse.token), obtainedAt, expiresAt };
  }

  private describeSource(): string {
    switch (this.authMethod.type) {
      case 'service_account':
        return 'service account';
      case 'workload_identity':
        return 'workload identity';
      case 'adc':
        return 'ADC';
      case 'access_token':
        return 'access token';
    }
  }

  private getOrCreateAuth(): GoogleAuth<AuthClient> {
    if (this.googleAuth) {
      return this.googleAuth;
    }

    const options: GoogleAuthOptions<AuthClient> = {
      scopes: CLOUD_PLATFORM_SCOPES,
      projectId: this.projectId,
    };

    if (this.authMethod.type === 'service_account') {
      if (this.authMethod.keyPath) {
        options.keyFile = this.authMethod.keyPath;
      } else if (this.authMethod.keyJson) {
        options.credentials = parseServiceAccountKey(this.authMethod.keyJson);
      }
    }

    this.googleAuth = new GoogleAuth(options);
    return this.googleAuth;
  }

  private shouldRefresh(cached: CachedToken): boolean {
    const lifetime = cached.expiresAt - cached.obtainedAt;
    const remaining = cached.expiresAt - Date.now();
    return remaining < lifetime * REFRESH_THRESHOLD;
  }

  private wrapError(error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);

    if (message.includes('Could not load the default credentials')) {
      return new TransportError(
        OperationErrorKind.CredentialsNotFound,
        'GCP credentials not found. Set GOOGLE_APPLICATION_CREDENTIALS or configure authentication.',
        { cause: error }
      );
    }

    if (message.includes('invalid_grant') || message.includes('Token has been expired')) {
      return new TransportError(OperationErrorKind.Unauthenticated, 'Token has expired or been revoked', {
        cause: error,
      });
    }

    return new TransportError(OperationErrorKind.TokenRefreshFailed, `Failed to refresh token: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Parses a service account key given as JSON text.
 *
 * @throws {TransportError} of kind ServiceAccountInvalid
 */
export function parseServiceAccountKey(keyJson: string): z.infer<typeof ServiceAccountKeySchema> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(keyJson);
  } catch (error) {
    throw new TransportError(OperationErrorKind.ServiceAccountInvalid, 'Invalid service account key JSON', {
      cause: error,
    });
  }

  const result = ServiceAccountKeySchema.safeParse(parsed);
  if (!result.success) {
    throw new TransportError(
      OperationErrorKind.ServiceAccountInvalid,
      'Service account key must contain client_email and private_key'
    );
  }
  return result.data;
}
