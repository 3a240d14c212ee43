/**
 * Dispatch Command Types
 *
 * Each command is a plain object tagged with an explicit `kind`. The payload
 * and result types are looked up by kind, so a handler registered for
 * `'login'` can only accept a login command and must return a TokenResponse.
 */

import type { IntrospectionResult, PrincipalView } from '../core/index.js';

// ============================================================================
// Results
// ============================================================================

/**
 * OAuth 2.0 token endpoint response (RFC 6749 §5.1)
 */
export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  /** Access token lifetime in seconds */
  expires_in: number;
}

export type IntrospectionResponse = IntrospectionResult;

// ============================================================================
// Commands
// ============================================================================

/** Commands that require an admin access token */
interface AdminPayload {
  accessToken: string;
}

export interface CommandPayloads {
  login: { username: string; password: string; scopes?: readonly string[] };
  refresh: { refreshToken: string };
  introspect: { token: string };
  register: { username: string; email: string; password: string; roles?: readonly string[] };
  userinfo: { accessToken: string };
  'list-principals': AdminPayload;
  'set-active': AdminPayload & { principalId: string; active: boolean };
  'grant-role': AdminPayload & { principalId: string; role: string };
  'revoke-role': AdminPayload & { principalId: string; role: string };
}

export interface CommandResults {
  login: TokenResponse;
  refresh: TokenResponse;
  introspect: IntrospectionResponse;
  register: PrincipalView;
  userinfo: PrincipalView;
  'list-principals': PrincipalView[];
  'set-active': PrincipalView;
  'grant-role': PrincipalView;
  'revoke-role': PrincipalView;
}

export type CommandKind = keyof CommandPayloads & keyof CommandResults;

export type Command<K extends CommandKind> = { readonly kind: K } & Readonly<CommandPayloads[K]>;

/** Any command, discriminated on `kind` */
export type AnyCommand = { [K in CommandKind]: Command<K> }[CommandKind];

export type CommandHandler<K extends CommandKind> = (
  command: Command<K>
) => Promise<CommandResults[K]>;

export const COMMAND_KINDS: readonly CommandKind[] = [
  'login',
  'refresh',
  'introspect',
  'register',
  'userinfo',
  'list-principals',
  'set-active',
  'grant-role',
  'revoke-role',
];
