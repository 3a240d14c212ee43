/**
 * Token Codec - mints and verifies RS256 access/refresh tokens
 *
 * Responsibilities:
 * - Claim set construction per token kind
 * - Signing with the KeyManager's private key
 * - Signature, expiry and claim-shape verification with the public key only
 *
 * NOT responsible for:
 * - Token kind policy (AuthenticationEngine decides which kind it accepts)
 * - Principal lookups
 */

import { SignJWT, errors, importPKCS8, importSPKI, jwtVerify } from 'jose';
import type { JWTPayload, KeyLike } from 'jose';
import { z } from 'zod';
import { KeyManager, SIGNING_ALGORITHM } from './key-manager.js';
import { TOKEN_TYPE_CLAIM } from './types.js';
import type { Principal, TokenClaims, TokenKind } from './types.js';
import { IdentityErrors } from '../utils/errors.js';

export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 30 * 60;
export const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;
export const DEFAULT_SCOPES: readonly string[] = ['read', 'write'];

export interface TokenCodecOptions {
  /** Access token lifetime in seconds (default: 1800) */
  accessTokenTtlSeconds?: number;

  /** Refresh token lifetime in seconds (default: 604800) */
  refreshTokenTtlSeconds?: number;

  /** Scopes put in access tokens minted without explicit scopes */
  defaultScopes?: readonly string[];

  /** Clock source, read once per mint/verify call */
  clock?: () => Date;
}

const AccessTokenClaimsSchema = z
  .object({
    type: z.literal(TOKEN_TYPE_CLAIM.access),
    sub: z.string().min(1),
    username: z.string(),
    email: z.string(),
    roles: z.array(z.string()),
    scopes: z.array(z.string()),
    iat: z.number().int(),
    exp: z.number().int(),
  })
  .strict();

const RefreshTokenClaimsSchema = z
  .object({
    type: z.literal(TOKEN_TYPE_CLAIM.refresh),
    sub: z.string().min(1),
    iat: z.number().int(),
    exp: z.number().int(),
  })
  .strict();

const TokenClaimsSchema = z.discriminatedUnion('type', [
  AccessTokenClaimsSchema,
  RefreshTokenClaimsSchema,
]);

interface SigningMaterial {
  privateKey: KeyLike;
  kid: string;
}

export class TokenCodec {
  private readonly accessTtl: number;
  private readonly refreshTtl: number;
  private readonly defaultScopes: readonly string[];
  private readonly clock: () => Date;

  private signing: Promise<SigningMaterial> | null = null;
  private verifying: Promise<KeyLike> | null = null;

  constructor(
    private readonly keyManager: KeyManager,
    options: TokenCodecOptions = {}
  ) {
    this.accessTtl = options.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
    this.refreshTtl = options.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
    this.defaultScopes = options.defaultScopes ?? DEFAULT_SCOPES;
    this.clock = options.clock ?? (() => new Date());

    if (!(this.accessTtl > 0) || !(this.refreshTtl > 0)) {
      throw IdentityErrors.CONFIGURATION_ERROR('token lifetimes must be positive');
    }
  }

  /**
   * Mint a signed token for a principal
   *
   * @param principal - Subject of the token
   * @param kind - 'access' carries username, email, roles and scopes; 'refresh' carries none
   * @param scopes - Access token scopes (default: configured default scopes)
   * @returns Compact JWS
   */
  async mint(principal: Principal, kind: TokenKind, scopes?: readonly string[]): Promise<string> {
    const iat = Math.floor(this.clock().getTime() / 1000);
    const exp = iat + this.ttlFor(kind);

    const claims: JWTPayload =
      kind === 'access'
        ? {
            username: principal.username,
            email: principal.email,
            roles: [...principal.roles],
            scopes: [...(scopes ?? this.defaultScopes)],
            type: TOKEN_TYPE_CLAIM.access,
          }
        : { type: TOKEN_TYPE_CLAIM.refresh };

    const { privateKey, kid } = await this.signingMaterial();

    return new SignJWT(claims)
      .setProtectedHeader({ alg: SIGNING_ALGORITHM, typ: 'JWT', kid })
      .setSubject(principal.id)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(privateKey);
  }

  /**
   * Verify a token and return its claim set
   *
   * @throws {IdentityError} TOKEN_EXPIRED if the signature is valid but exp has passed
   * @throws {IdentityError} TOKEN_INVALID for any other failure
   */
  async verify(token: string): Promise<TokenClaims> {
    const publicKey = await this.verificationKey();

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, publicKey, {
        algorithms: [SIGNING_ALGORITHM],
        currentDate: this.clock(),
      }));
    } catch (error) {
      // jose checks the signature before any time-based claim
      if (error instanceof errors.JWTExpired) {
        throw IdentityErrors.TOKEN_EXPIRED();
      }
      throw IdentityErrors.TOKEN_INVALID({
        reason: error instanceof Error ? error.message : 'unknown error',
      });
    }

    const parsed = TokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw IdentityErrors.TOKEN_INVALID({ reason: 'unexpected claim set' });
    }
    if (parsed.data.exp <= parsed.data.iat) {
      throw IdentityErrors.TOKEN_INVALID({ reason: 'exp is not after iat' });
    }

    return parsed.data;
  }

  /**
   * Lifetime in seconds for tokens of the given kind
   */
  ttlFor(kind: TokenKind): number {
    return kind === 'access' ? this.accessTtl : this.refreshTtl;
  }

  getDefaultScopes(): string[] {
    return [...this.defaultScopes];
  }

  private signingMaterial(): Promise<SigningMaterial> {
    if (!this.signing) {
      // A failed load is not cached; the next call retries
      this.signing = this.loadSigningMaterial().catch((error: unknown) => {
        this.signing = null;
        throw error;
      });
    }
    return this.signing;
  }

  private async loadSigningMaterial(): Promise<SigningMaterial> {
    const pem = await this.keyManager.loadPrivateKey();
    const privateKey = await importPKCS8(pem, SIGNING_ALGORITHM);
    const kid = await this.keyManager.getKeyId();
    return { privateKey, kid };
  }

  private verificationKey(): Promise<KeyLike> {
    if (!this.verifying) {
      this.verifying = this.keyManager
        .loadPublicKey()
        .then((pem) => importSPKI(pem, SIGNING_ALGORITHM))
        .catch((error: unknown) => {
          this.verifying = null;
          throw error;
        });
    }
    return this.verifying;
  }
}
