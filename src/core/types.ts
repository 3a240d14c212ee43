/**
 * Core Identity Types
 *
 * Type definitions shared by the token engine. Nothing in this file
 * depends on the HTTP, dispatch or store layers.
 *
 * Architectural Rule: Core → Dispatch → HTTP
 * Files in src/core/ MUST NOT import from src/dispatch/ or src/http/
 */

// ============================================================================
// Role Constants
// ============================================================================

export const ROLE_ADMIN = 'admin';
export const ROLE_USER = 'user';
export const ROLE_GUEST = 'guest';

export const KNOWN_ROLES: readonly string[] = [ROLE_ADMIN, ROLE_USER, ROLE_GUEST];

/** Role set given to principals registered without explicit roles */
export const DEFAULT_ROLES: readonly string[] = [ROLE_USER];

// ============================================================================
// Principal
// ============================================================================

/**
 * Principal - the user account this service authenticates.
 *
 * `id` is assigned once by createPrincipal() and never changes.
 * `passwordHash` never leaves the core; see PrincipalView for the public shape.
 */
export interface Principal {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  /** Never empty */
  readonly roles: readonly string[];
  readonly active: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Public projection of a Principal (wire format)
 */
export interface PrincipalView {
  id: string;
  username: string;
  email: string;
  roles: string[];
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind = 'access' | 'refresh';

/** Value of the `type` claim for each token kind */
export const TOKEN_TYPE_CLAIM = {
  access: 'access_token',
  refresh: 'refresh_token',
} as const satisfies Record<TokenKind, string>;

export interface AccessTokenClaims {
  type: 'access_token';
  sub: string;
  username: string;
  email: string;
  roles: string[];
  scopes: string[];
  iat: number;
  exp: number;
}

/** Refresh tokens carry no role or scope claims */
export interface RefreshTokenClaims {
  type: 'refresh_token';
  sub: string;
  iat: number;
  exp: number;
}

export type TokenClaims = AccessTokenClaims | RefreshTokenClaims;

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Introspection result. Inactive tokens reveal nothing else.
 */
export type IntrospectionResult =
  | { active: false }
  | {
      active: true;
      sub: string;
      type: TokenClaims['type'];
      username?: string;
      email?: string;
      roles?: string[];
      exp: number;
      iat: number;
    };

// ============================================================================
// Key Material
// ============================================================================

/**
 * Published RSA verification key (RFC 7517)
 */
export interface PublicJWK {
  kty: 'RSA';
  use: 'sig';
  kid: string;
  alg: 'RS256';
  n: string;
  e: string;
}

export interface JWKSet {
  keys: PublicJWK[];
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field to track the origin of the
 * entry (e.g. 'auth:engine', 'dispatch:registry').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Principal ID associated with the event (if known) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error code or message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
