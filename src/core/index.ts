/**
 * Core Module Public API
 *
 * One-way dependency: Core → Dispatch → HTTP
 */

// ============================================================================
// Services
// ============================================================================

export { AuthenticationEngine } from './authentication-engine.js';
export type { AuthenticationEngineDeps } from './authentication-engine.js';

export { TokenCodec } from './token-codec.js';
export type { TokenCodecOptions } from './token-codec.js';
export {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  DEFAULT_SCOPES,
} from './token-codec.js';

export { KeyManager, SIGNING_ALGORITHM, DEFAULT_MODULUS_LENGTH } from './key-manager.js';
export type { KeyManagerOptions } from './key-manager.js';

export { PasswordHasher, DEFAULT_BCRYPT_ROUNDS } from './password-hasher.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { RegistrationValidator, MIN_USERNAME_LENGTH, MIN_PASSWORD_LENGTH } from './validators.js';
export type { RegistrationInput } from './validators.js';

export type { CredentialStore } from './credential-store.js';

export {
  createPrincipal,
  hasRole,
  grantRole,
  revokeRole,
  setActive,
  toPrincipalView,
} from './principal.js';
export type { NewPrincipal } from './principal.js';

// ============================================================================
// Types
// ============================================================================

export type {
  Principal,
  PrincipalView,
  TokenKind,
  AccessTokenClaims,
  RefreshTokenClaims,
  TokenClaims,
  TokenPair,
  IntrospectionResult,
  PublicJWK,
  JWKSet,
  AuditEntry,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export {
  ROLE_ADMIN,
  ROLE_USER,
  ROLE_GUEST,
  KNOWN_ROLES,
  DEFAULT_ROLES,
  TOKEN_TYPE_CLAIM,
} from './types.js';
