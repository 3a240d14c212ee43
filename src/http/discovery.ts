/**
 * OAuth 2.0 Authorization Server Metadata (RFC 8414)
 *
 * Published at /.well-known/openid-configuration so clients can find the
 * token, introspection and JWKS endpoints from the issuer URL alone.
 */

import { SIGNING_ALGORITHM } from '../core/index.js';

export interface AuthorizationServerMetadata {
  /** Authorization server's issuer identifier URL */
  issuer: string;

  /** URL of the token endpoint */
  token_endpoint: string;

  /** URL of the JSON Web Key Set document */
  jwks_uri: string;

  userinfo_endpoint: string;
  introspection_endpoint: string;
  registration_endpoint: string;

  scopes_supported: string[];
  response_types_supported: string[];
  grant_types_supported: string[];
  token_endpoint_auth_methods_supported: string[];
  subject_types_supported: string[];
  id_token_signing_alg_values_supported: string[];
  claims_supported: string[];
}

export const SUPPORTED_GRANT_TYPES = ['password', 'refresh_token'] as const;

/**
 * @param issuer - Base URL of this server (a trailing slash is ignored)
 * @param scopes - Scopes advertised as supported
 *
 * @example
 * ```typescript
 * generateDiscoveryDocument('https://id.example.com', ['read', 'write']).token_endpoint;
 * // 'https://id.example.com/oauth/token'
 * ```
 */
export function generateDiscoveryDocument(
  issuer: string,
  scopes: readonly string[]
): AuthorizationServerMetadata {
  const base = issuer.replace(/\/+$/, '');

  return {
    issuer: base,
    token_endpoint: `${base}/oauth/token`,
    jwks_uri: `${base}/.well-known/jwks.json`,
    userinfo_endpoint: `${base}/oauth/userinfo`,
    introspection_endpoint: `${base}/oauth/introspect`,
    registration_endpoint: `${base}/users/register`,
    scopes_supported: [...scopes],
    response_types_supported: ['token'],
    grant_types_supported: [...SUPPORTED_GRANT_TYPES],
    token_endpoint_auth_methods_supported: ['none'],
    subject_types_supported: ['public'],
    id_token_signing_alg_values_supported: [SIGNING_ALGORITHM],
    claims_supported: ['sub', 'username', 'email', 'roles', 'scopes', 'type', 'iat', 'exp'],
  };
}

/**
 * Generate WWW-Authenticate header for 401 responses (RFC 6750 §3)
 *
 * @example
 * ```typescript
 * generateWWWAuthenticateHeader('https://id.example.com', 'invalid_token');
 * // 'Bearer realm="https://id.example.com", error="invalid_token"'
 * ```
 */
export function generateWWWAuthenticateHeader(realm: string, error?: string): string {
  const params = [`realm="${realm}"`];
  if (error) {
    params.push(`error="${error}"`);
  }
  return `Bearer ${params.join(', ')}`;
}
