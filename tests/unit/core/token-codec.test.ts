/**
 * TokenCodec Tests
 *
 * Minting, verification and expiry against a real RS256 key pair, with an
 * injected clock.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SignJWT, decodeProtectedHeader, importPKCS8 } from 'jose';
import { KeyManager } from '../../../src/core/key-manager.js';
import { TokenCodec } from '../../../src/core/token-codec.js';
import { createPrincipal } from '../../../src/core/principal.js';
import { captureIdentityError as rejection } from '../../helpers/identity-fixtures.js';

const START = new Date('2024-01-01T00:00:00.000Z');
const START_SECONDS = 1704067200;

describe('TokenCodec', () => {
  let root: string;
  let keyManager: KeyManager;
  let foreignKeys: KeyManager;
  let now: Date;
  let codec: TokenCodec;

  const principal = createPrincipal(
    { username: 'alice', email: 'a@x.io', passwordHash: 'hash', roles: ['admin'] },
    START
  );

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'token-codec-'));
    keyManager = new KeyManager({ directory: join(root, 'keys') });
    foreignKeys = new KeyManager({ directory: join(root, 'foreign') });
    await Promise.all([keyManager.ensureKeys(), foreignKeys.ensureKeys()]);
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    now = START;
    codec = new TokenCodec(keyManager, { clock: () => now });
  });

  describe('mint + verify', () => {
    it('should round-trip access token claims', async () => {
      const token = await codec.mint(principal, 'access');

      expect(await codec.verify(token)).toEqual({
        type: 'access_token',
        sub: principal.id,
        username: 'alice',
        email: 'a@x.io',
        roles: ['admin'],
        scopes: ['read', 'write'],
        iat: START_SECONDS,
        exp: START_SECONDS + 1800,
      });
    });

    it('should carry no role or scope claims in refresh tokens', async () => {
      const token = await codec.mint(principal, 'refresh');

      expect(await codec.verify(token)).toEqual({
        type: 'refresh_token',
        sub: principal.id,
        iat: START_SECONDS,
        exp: START_SECONDS + 604800,
      });
    });

    it('should use explicit scopes when given', async () => {
      const claims = await codec.verify(await codec.mint(principal, 'access', ['read']));

      expect(claims).toMatchObject({ scopes: ['read'] });
    });

    it('should use configured lifetimes and default scopes', async () => {
      const custom = new TokenCodec(keyManager, {
        accessTokenTtlSeconds: 60,
        refreshTokenTtlSeconds: 120,
        defaultScopes: ['profile'],
        clock: () => now,
      });

      const claims = await custom.verify(await custom.mint(principal, 'access'));

      expect(claims).toMatchObject({ exp: START_SECONDS + 60, scopes: ['profile'] });
      expect(custom.ttlFor('refresh')).toBe(120);
      expect(custom.getDefaultScopes()).toEqual(['profile']);
    });

    it('should sign with RS256 and the published key id', async () => {
      const token = await codec.mint(principal, 'access');

      expect(decodeProtectedHeader(token)).toEqual({
        alg: 'RS256',
        typ: 'JWT',
        kid: (await keyManager.publicJWK()).kid,
      });
    });
  });

  describe('expiry', () => {
    it('should accept a token one second before exp', async () => {
      const token = await codec.mint(principal, 'access');
      now = new Date(START.getTime() + 1799 * 1000);

      await expect(codec.verify(token)).resolves.toMatchObject({ sub: principal.id });
    });

    it('should fail with TOKEN_EXPIRED once exp is reached', async () => {
      const token = await codec.mint(principal, 'access');
      now = new Date(START.getTime() + 1800 * 1000);

      const error = await rejection(codec.verify(token));
      expect(error.code).toBe('TOKEN_EXPIRED');
      expect(error.message).toBe('Token has expired');
    });

    it('should expire refresh tokens after seven days', async () => {
      const token = await codec.mint(principal, 'refresh');
      now = new Date(START.getTime() + 604800 * 1000);

      expect((await rejection(codec.verify(token))).code).toBe('TOKEN_EXPIRED');
    });
  });

  describe('rejection', () => {
    it('should reject a token whose signature does not match its payload', async () => {
      const [header, payload] = (await codec.mint(principal, 'access')).split('.');
      const otherSignature = (await codec.mint(principal, 'refresh')).split('.')[2];

      const error = await rejection(codec.verify(`${header}.${payload}.${otherSignature}`));
      expect(error.code).toBe('TOKEN_INVALID');
    });

    it('should reject a token signed by another key', async () => {
      const foreign = new TokenCodec(foreignKeys, { clock: () => now });
      const token = await foreign.mint(principal, 'access');

      expect((await rejection(codec.verify(token))).code).toBe('TOKEN_INVALID');
    });

    it('should reject malformed input', async () => {
      expect((await rejection(codec.verify('not.a.jwt'))).code).toBe('TOKEN_INVALID');
      expect((await rejection(codec.verify(''))).code).toBe('TOKEN_INVALID');
    });

    it('should reject symmetric algorithms', async () => {
      const token = await new SignJWT({ type: 'access_token' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject(principal.id)
        .setIssuedAt(START_SECONDS)
        .setExpirationTime(START_SECONDS + 60)
        .sign(new TextEncoder().encode('test-secret'));

      expect((await rejection(codec.verify(token))).code).toBe('TOKEN_INVALID');
    });

    it('should reject a correctly signed token with an unexpected claim set', async () => {
      const privateKey = await importPKCS8(await keyManager.loadPrivateKey(), 'RS256');
      const token = await new SignJWT({ type: 'id_token' })
        .setProtectedHeader({ alg: 'RS256' })
        .setSubject(principal.id)
        .setIssuedAt(START_SECONDS)
        .setExpirationTime(START_SECONDS + 60)
        .sign(privateKey);

      const error = await rejection(codec.verify(token));
      expect(error.code).toBe('TOKEN_INVALID');
      expect(error.details).toEqual({ reason: 'unexpected claim set' });
    });
  });

  describe('configuration', () => {
    it('should default to 30 minute access and 7 day refresh lifetimes', () => {
      expect(codec.ttlFor('access')).toBe(1800);
      expect(codec.ttlFor('refresh')).toBe(604800);
    });

    it('should reject non-positive lifetimes', () => {
      expect(() => new TokenCodec(keyManager, { accessTokenTtlSeconds: 0 })).toThrow(
        'Configuration error: token lifetimes must be positive'
      );
    });
  });
});
