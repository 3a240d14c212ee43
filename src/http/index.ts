/**
 * HTTP layer public API
 */

export { createIdentityServer, startHTTPServer } from './server.js';
export type { IdentityServerOptions } from './server.js';
export {
  generateDiscoveryDocument,
  generateWWWAuthenticateHeader,
  SUPPORTED_GRANT_TYPES,
} from './discovery.js';
export type { AuthorizationServerMetadata } from './discovery.js';
