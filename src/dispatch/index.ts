/**
 * Dispatch Module Public API
 */

export { RequestDispatcher } from './request-dispatcher.js';
export { registerIdentityHandlers, toTokenResponse } from './handlers.js';
export { COMMAND_KINDS } from './commands.js';
export type {
  AnyCommand,
  Command,
  CommandHandler,
  CommandKind,
  CommandPayloads,
  CommandResults,
  IntrospectionResponse,
  TokenResponse,
} from './commands.js';
