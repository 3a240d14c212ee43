/**
 * Identity handler table Tests
 *
 * Every command kind dispatched end to end through the engine.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { AuthenticationEngine } from '../../../src/core/authentication-engine.js';
import { KeyManager } from '../../../src/core/key-manager.js';
import { PasswordHasher } from '../../../src/core/password-hasher.js';
import { TokenCodec } from '../../../src/core/token-codec.js';
import { RequestDispatcher } from '../../../src/dispatch/request-dispatcher.js';
import { registerIdentityHandlers } from '../../../src/dispatch/handlers.js';
import { COMMAND_KINDS } from '../../../src/dispatch/commands.js';
import type { TokenResponse } from '../../../src/dispatch/commands.js';
import { InMemoryCredentialStore } from '../../../src/stores/in-memory-credential-store.js';
import { captureIdentityError, makeTempDir } from '../../helpers/identity-fixtures.js';

describe('registerIdentityHandlers', () => {
  let root: string;
  let keyManager: KeyManager;
  let codec: TokenCodec;
  let dispatcher: RequestDispatcher;

  beforeAll(async () => {
    root = await makeTempDir('handlers-');
    keyManager = new KeyManager({ directory: join(root, 'keys') });
    await keyManager.ensureKeys();
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  beforeEach(async () => {
    codec = new TokenCodec(keyManager);
    const engine = new AuthenticationEngine({
      store: new InMemoryCredentialStore(),
      hasher: new PasswordHasher(4),
      codec,
    });
    dispatcher = new RequestDispatcher();
    registerIdentityHandlers(dispatcher, engine, codec);

    await dispatcher.dispatch({
      kind: 'register',
      username: 'root',
      email: 'root@x.io',
      password: 'rootpass',
      roles: ['admin'],
    });
    await dispatcher.dispatch({
      kind: 'register',
      username: 'bob',
      email: 'b@x.io',
      password: 'secret2',
    });
  });

  async function login(username: string, password: string): Promise<TokenResponse> {
    return dispatcher.dispatch({ kind: 'login', username, password });
  }

  it('should register a handler for every command kind', () => {
    expect(dispatcher.kinds()).toEqual([...COMMAND_KINDS]);
  });

  it('should answer login with an OAuth token response', async () => {
    const response = await login('bob', 'secret2');

    expect(response).toEqual({
      access_token: expect.any(String),
      refresh_token: expect.any(String),
      token_type: 'Bearer',
      expires_in: 1800,
    });
    expect(await codec.verify(response.access_token)).toMatchObject({
      type: 'access_token',
      username: 'bob',
      roles: ['user'],
    });
  });

  it('should pass requested scopes into the access token', async () => {
    const response = await dispatcher.dispatch({
      kind: 'login',
      username: 'bob',
      password: 'secret2',
      scopes: ['read'],
    });

    expect(await codec.verify(response.access_token)).toMatchObject({ scopes: ['read'] });
  });

  it('should answer refresh with the same refresh token', async () => {
    const { refresh_token } = await login('bob', 'secret2');

    const response = await dispatcher.dispatch({ kind: 'refresh', refreshToken: refresh_token });

    expect(response.refresh_token).toBe(refresh_token);
    expect(response.token_type).toBe('Bearer');
    expect(response.expires_in).toBe(1800);
  });

  it('should return a public view from register and userinfo', async () => {
    const registered = await dispatcher.dispatch({
      kind: 'register',
      username: 'carol',
      email: 'c@x.io',
      password: 'secret3',
    });
    const { access_token } = await login('carol', 'secret3');

    const info = await dispatcher.dispatch({ kind: 'userinfo', accessToken: access_token });

    expect(info).toEqual(registered);
    expect(Object.keys(info).sort()).toEqual([
      'created_at',
      'email',
      'id',
      'is_active',
      'roles',
      'updated_at',
      'username',
    ]);
  });

  it('should introspect tokens', async () => {
    const { access_token } = await login('bob', 'secret2');

    expect(await dispatcher.dispatch({ kind: 'introspect', token: access_token })).toMatchObject({
      active: true,
      type: 'access_token',
      username: 'bob',
    });
    expect(await dispatcher.dispatch({ kind: 'introspect', token: 'garbage' })).toEqual({
      active: false,
    });
  });

  describe('admin commands', () => {
    it('should list principals for an admin', async () => {
      const { access_token } = await login('root', 'rootpass');

      const principals = await dispatcher.dispatch({
        kind: 'list-principals',
        accessToken: access_token,
      });

      expect(principals.map((p) => p.username)).toEqual(['root', 'bob']);
    });

    it('should refuse non-admins', async () => {
      const { access_token } = await login('bob', 'secret2');

      const error = await captureIdentityError(
        dispatcher.dispatch({ kind: 'list-principals', accessToken: access_token })
      );

      expect(error.code).toBe('FORBIDDEN');
    });

    it('should deactivate, grant and revoke', async () => {
      const { access_token: adminToken } = await login('root', 'rootpass');
      const { access_token: bobToken } = await login('bob', 'secret2');
      const bob = await dispatcher.dispatch({ kind: 'userinfo', accessToken: bobToken });

      const granted = await dispatcher.dispatch({
        kind: 'grant-role',
        accessToken: adminToken,
        principalId: bob.id,
        role: 'guest',
      });
      expect(granted.roles).toEqual(['user', 'guest']);

      const revoked = await dispatcher.dispatch({
        kind: 'revoke-role',
        accessToken: adminToken,
        principalId: bob.id,
        role: 'user',
      });
      expect(revoked.roles).toEqual(['guest']);

      const deactivated = await dispatcher.dispatch({
        kind: 'set-active',
        accessToken: adminToken,
        principalId: bob.id,
        active: false,
      });
      expect(deactivated.is_active).toBe(false);

      expect((await captureIdentityError(login('bob', 'secret2'))).code).toBe('ACCOUNT_INACTIVE');
    });
  });
});
