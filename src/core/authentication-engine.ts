/**
 * Authentication Engine - orchestrates login, token issuance and refresh
 *
 * Coordinates:
 * - Credential lookup (CredentialStore)
 * - Password verification (PasswordHasher)
 * - Token minting and verification (TokenCodec)
 * - Audit logging (AuditService)
 *
 * CRITICAL POLICIES:
 * - Unknown username and wrong password fail identically (AUTHENTICATION_FAILED)
 * - Token kind is checked before any subject lookup
 * - Refreshed access tokens carry the principal's CURRENT roles
 * - Refresh tokens are returned unchanged (no rotation)
 * - Store failures surface as STORE_UNAVAILABLE, never retried here
 */

import type { CredentialStore } from './credential-store.js';
import type { PasswordHasher } from './password-hasher.js';
import type { TokenCodec } from './token-codec.js';
import { AuditService } from './audit-service.js';
import { RegistrationValidator } from './validators.js';
import type { RegistrationInput } from './validators.js';
import * as principals from './principal.js';
import { KNOWN_ROLES, TOKEN_TYPE_CLAIM } from './types.js';
import type {
  AccessTokenClaims,
  AuditEntry,
  IntrospectionResult,
  Principal,
  RefreshTokenClaims,
  TokenClaims,
  TokenPair,
} from './types.js';
import { IdentityError, IdentityErrors, isIdentityError } from '../utils/errors.js';

const AUDIT_SOURCE = 'auth:engine';

// Compared against when the username is unknown, so both paths pay for one bcrypt run
const PLACEHOLDER_PASSWORD = 'placeholder-credential';

export interface AuthenticationEngineDeps {
  store: CredentialStore;
  hasher: PasswordHasher;
  codec: TokenCodec;
  /** Optional audit service (Null Object Pattern if not provided) */
  auditService?: AuditService;
}

/**
 * Usage:
 * ```typescript
 * const engine = new AuthenticationEngine({ store, hasher, codec });
 * const principal = await engine.login('alice', 'secret1');
 * const { accessToken, refreshToken } = await engine.issueTokenPair(principal);
 * ```
 */
export class AuthenticationEngine {
  private readonly store: CredentialStore;
  private readonly hasher: PasswordHasher;
  private readonly codec: TokenCodec;
  private readonly auditService: AuditService;
  private placeholderHash: Promise<string> | null = null;

  constructor(deps: AuthenticationEngineDeps) {
    this.store = deps.store;
    this.hasher = deps.hasher;
    this.codec = deps.codec;
    this.auditService = deps.auditService ?? new AuditService();
  }

  // ==========================================================================
  // Login / token protocol
  // ==========================================================================

  /**
   * Authenticate a principal by username and password
   *
   * @throws {IdentityError} AUTHENTICATION_FAILED for unknown username or wrong password
   * @throws {IdentityError} ACCOUNT_INACTIVE if the account is disabled
   */
  async login(username: string, password: string): Promise<Principal> {
    try {
      const principal = await this.fromStore('findByUsername', () =>
        this.store.findByUsername(username)
      );

      if (!principal) {
        await this.hasher.verify(password, await this.getPlaceholderHash());
        throw IdentityErrors.AUTHENTICATION_FAILED();
      }

      if (!principal.active) {
        throw IdentityErrors.ACCOUNT_INACTIVE();
      }

      if (!(await this.hasher.verify(password, principal.passwordHash))) {
        throw IdentityErrors.AUTHENTICATION_FAILED();
      }

      await this.audit('login', true, { userId: principal.id });
      return principal;
    } catch (error) {
      await this.audit('login', false, { error, metadata: { username } });
      throw error;
    }
  }

  /**
   * Mint an access token (roles + scopes) and a refresh token (no extra claims).
   * Nothing is persisted; both stay valid until their own expiry.
   *
   * @param scopes - Subset of the default scopes (default: all of them)
   * @throws {IdentityError} VALIDATION_FAILED for a scope outside the default set
   */
  async issueTokenPair(principal: Principal, scopes?: readonly string[]): Promise<TokenPair> {
    if (scopes) {
      const supported = this.codec.getDefaultScopes();
      const unsupported = scopes.filter((scope) => !supported.includes(scope));
      if (unsupported.length > 0) {
        throw IdentityErrors.VALIDATION_FAILED(
          unsupported.map((scope) => `Unsupported scope: ${scope}`)
        );
      }
    }

    const [accessToken, refreshToken] = await Promise.all([
      this.codec.mint(principal, 'access', scopes),
      this.codec.mint(principal, 'refresh'),
    ]);
    return { accessToken, refreshToken };
  }

  /**
   * Exchange a refresh token for a new access token
   *
   * @returns New access token paired with the SAME refresh token
   * @throws {IdentityError} TOKEN_VERIFICATION_ERROR if an access token is presented
   * @throws {IdentityError} TOKEN_INVALID / TOKEN_EXPIRED from verification
   * @throws {IdentityError} AUTHENTICATION_FAILED / ACCOUNT_INACTIVE for the subject
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    let userId: string | undefined;
    try {
      const claims = await this.verifyRefreshToken(refreshToken);
      userId = claims.sub;

      const principal = await this.loadActiveSubject(claims.sub);
      const accessToken = await this.codec.mint(principal, 'access');

      await this.audit('refresh', true, { userId });
      return { accessToken, refreshToken };
    } catch (error) {
      await this.audit('refresh', false, { userId, error });
      throw error;
    }
  }

  /**
   * Register a new principal
   *
   * @throws {IdentityError} VALIDATION_FAILED listing every violated rule
   * @throws {IdentityError} DUPLICATE_USERNAME / DUPLICATE_EMAIL
   */
  async register(input: RegistrationInput): Promise<Principal> {
    try {
      const violations = RegistrationValidator.validate(input);
      if (violations.length > 0) {
        throw IdentityErrors.VALIDATION_FAILED(violations);
      }

      if (await this.fromStore('existsByUsername', () => this.store.existsByUsername(input.username))) {
        throw IdentityErrors.DUPLICATE_USERNAME(input.username);
      }

      if (await this.fromStore('existsByEmail', () => this.store.existsByEmail(input.email))) {
        throw IdentityErrors.DUPLICATE_EMAIL(input.email);
      }

      const principal = principals.createPrincipal({
        username: input.username,
        email: input.email,
        passwordHash: await this.hasher.hash(input.password),
        roles: input.roles,
      });

      const created = await this.fromStore('create', () => this.store.create(principal));
      await this.audit('register', true, {
        userId: created.id,
        metadata: { roles: [...created.roles] },
      });
      return created;
    } catch (error) {
      await this.audit('register', false, { error, metadata: { username: input.username } });
      throw error;
    }
  }

  // ==========================================================================
  // Token inspection
  // ==========================================================================

  /**
   * Report whether a token is currently valid, with its claims if so.
   * Invalid or expired tokens yield `{ active: false }` rather than an error.
   */
  async introspect(token: string): Promise<IntrospectionResult> {
    let claims: TokenClaims;
    try {
      claims = await this.codec.verify(token);
    } catch (error) {
      if (isIdentityError(error, 'TOKEN_INVALID') || isIdentityError(error, 'TOKEN_EXPIRED')) {
        return { active: false };
      }
      throw error;
    }

    if (claims.type === TOKEN_TYPE_CLAIM.access) {
      return {
        active: true,
        sub: claims.sub,
        type: claims.type,
        username: claims.username,
        email: claims.email,
        roles: claims.roles,
        exp: claims.exp,
        iat: claims.iat,
      };
    }
    return { active: true, sub: claims.sub, type: claims.type, exp: claims.exp, iat: claims.iat };
  }

  /**
   * Principal behind a valid access token
   *
   * @throws {IdentityError} TOKEN_VERIFICATION_ERROR if a refresh token is presented
   * @throws {IdentityError} AUTHENTICATION_FAILED if the subject no longer exists
   */
  async userInfo(accessToken: string): Promise<Principal> {
    const claims = await this.verifyAccessToken(accessToken);
    const principal = await this.fromStore('findById', () => this.store.findById(claims.sub));
    if (!principal) {
      throw IdentityErrors.AUTHENTICATION_FAILED();
    }
    return principal;
  }

  /**
   * Require a role from the principal's current (stored) role set
   *
   * @throws {IdentityError} FORBIDDEN if the role is not held
   */
  async authorize(accessToken: string, role: string): Promise<Principal> {
    const principal = await this.userInfo(accessToken);
    if (!principals.hasRole(principal, role)) {
      await this.audit('authorize', false, {
        userId: principal.id,
        reason: `missing role ${role}`,
      });
      throw IdentityErrors.FORBIDDEN(role);
    }
    return principal;
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  async listPrincipals(): Promise<Principal[]> {
    return this.fromStore('listAll', () => this.store.listAll());
  }

  async setActive(principalId: string, active: boolean): Promise<Principal> {
    return this.mutate(principalId, active ? 'activate' : 'deactivate', (p) =>
      principals.setActive(p, active)
    );
  }

  async grantRole(principalId: string, role: string): Promise<Principal> {
    this.assertKnownRole(role);
    return this.mutate(principalId, 'grant_role', (p) => principals.grantRole(p, role));
  }

  async revokeRole(principalId: string, role: string): Promise<Principal> {
    return this.mutate(principalId, 'revoke_role', (p) => principals.revokeRole(p, role));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async verifyAccessToken(token: string): Promise<AccessTokenClaims> {
    const claims = await this.codec.verify(token);
    if (claims.type !== TOKEN_TYPE_CLAIM.access) {
      throw IdentityErrors.TOKEN_VERIFICATION_ERROR(TOKEN_TYPE_CLAIM.access, claims.type);
    }
    return claims;
  }

  private async verifyRefreshToken(token: string): Promise<RefreshTokenClaims> {
    const claims = await this.codec.verify(token);
    if (claims.type !== TOKEN_TYPE_CLAIM.refresh) {
      throw IdentityErrors.TOKEN_VERIFICATION_ERROR(TOKEN_TYPE_CLAIM.refresh, claims.type);
    }
    return claims;
  }

  private async loadActiveSubject(id: string): Promise<Principal> {
    const principal = await this.fromStore('findById', () => this.store.findById(id));
    if (!principal) {
      throw IdentityErrors.AUTHENTICATION_FAILED();
    }
    if (!principal.active) {
      throw IdentityErrors.ACCOUNT_INACTIVE();
    }
    return principal;
  }

  private async mutate(
    principalId: string,
    action: string,
    change: (principal: Principal) => Principal
  ): Promise<Principal> {
    try {
      const current = await this.fromStore('findById', () => this.store.findById(principalId));
      if (!current) {
        throw IdentityErrors.PRINCIPAL_NOT_FOUND(principalId);
      }

      const next = change(current);
      const saved =
        next === current ? current : await this.fromStore('update', () => this.store.update(next));

      await this.audit(action, true, { userId: principalId });
      return saved;
    } catch (error) {
      await this.audit(action, false, { userId: principalId, error });
      throw error;
    }
  }

  private assertKnownRole(role: string): void {
    if (!KNOWN_ROLES.includes(role)) {
      throw IdentityErrors.VALIDATION_FAILED([`Unknown role: ${role}`]);
    }
  }

  /**
   * Run a store operation, converting foreign failures to STORE_UNAVAILABLE
   */
  private async fromStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof IdentityError) {
        throw error;
      }
      throw IdentityErrors.STORE_UNAVAILABLE(operation, error);
    }
  }

  private getPlaceholderHash(): Promise<string> {
    if (!this.placeholderHash) {
      this.placeholderHash = this.hasher.hash(PLACEHOLDER_PASSWORD);
    }
    return this.placeholderHash;
  }

  private async audit(
    action: string,
    success: boolean,
    extra: { userId?: string; reason?: string; error?: unknown; metadata?: Record<string, unknown> }
  ): Promise<void> {
    const entry: AuditEntry = {
      timestamp: new Date(),
      source: AUDIT_SOURCE,
      userId: extra.userId,
      action,
      success,
      reason: extra.reason,
      metadata: extra.metadata,
    };
    if (extra.error !== undefined) {
      entry.error = extra.error instanceof IdentityError ? extra.error.code : 'UNEXPECTED_ERROR';
    }
    await this.auditService.log(entry);
  }
}
