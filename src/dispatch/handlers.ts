/**
 * Identity command handlers
 *
 * Binds every command kind to an AuthenticationEngine operation and shapes
 * the result for the wire (TokenResponse, PrincipalView).
 */

import { ROLE_ADMIN, toPrincipalView } from '../core/index.js';
import type { AuthenticationEngine, TokenCodec, TokenPair } from '../core/index.js';
import type { TokenResponse } from './commands.js';
import type { RequestDispatcher } from './request-dispatcher.js';

export function toTokenResponse(pair: TokenPair, expiresIn: number): TokenResponse {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: 'Bearer',
    expires_in: expiresIn,
  };
}

export function registerIdentityHandlers(
  dispatcher: RequestDispatcher,
  engine: AuthenticationEngine,
  codec: TokenCodec
): void {
  const accessTtl = codec.ttlFor('access');

  dispatcher.register('login', async ({ username, password, scopes }) => {
    const principal = await engine.login(username, password);
    return toTokenResponse(await engine.issueTokenPair(principal, scopes), accessTtl);
  });

  dispatcher.register('refresh', async ({ refreshToken }) =>
    toTokenResponse(await engine.refresh(refreshToken), accessTtl)
  );

  dispatcher.register('introspect', async ({ token }) => engine.introspect(token));

  dispatcher.register('register', async ({ username, email, password, roles }) =>
    toPrincipalView(await engine.register({ username, email, password, roles }))
  );

  dispatcher.register('userinfo', async ({ accessToken }) =>
    toPrincipalView(await engine.userInfo(accessToken))
  );

  // Admin commands: the caller's stored roles are checked, not the token's
  dispatcher.register('list-principals', async ({ accessToken }) => {
    await engine.authorize(accessToken, ROLE_ADMIN);
    return (await engine.listPrincipals()).map(toPrincipalView);
  });

  dispatcher.register('set-active', async ({ accessToken, principalId, active }) => {
    await engine.authorize(accessToken, ROLE_ADMIN);
    return toPrincipalView(await engine.setActive(principalId, active));
  });

  dispatcher.register('grant-role', async ({ accessToken, principalId, role }) => {
    await engine.authorize(accessToken, ROLE_ADMIN);
    return toPrincipalView(await engine.grantRole(principalId, role));
  });

  dispatcher.register('revoke-role', async ({ accessToken, principalId, role }) => {
    await engine.authorize(accessToken, ROLE_ADMIN);
    return toPrincipalView(await engine.revokeRole(principalId, role));
  });
}
