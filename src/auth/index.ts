/**
 * Authentication module.
 * @module auth
 */

export { SecretString } from './secret.js';
export { GcpAuthProvider, parseServiceAccountKey, type AuthProvider, type CachedToken } from './provider.js';
