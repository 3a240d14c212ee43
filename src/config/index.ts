/**
 * Configuration Module - Public API
 */

export { ConfigManager } from './manager.js';

export {
  IdentityConfigSchema,
  EnvironmentSchema,
  ServerConfigSchema,
  KeysConfigSchema,
  TokensConfigSchema,
  PasswordsConfigSchema,
  AuditConfigSchema,
  StoreConfigSchema,
  SeedConfigSchema,
  SeedPrincipalSchema,
} from './schema.js';

export type {
  IdentityConfig,
  IdentityConfigInput,
  StoreConfig,
  PostgresStoreSettings,
  SeedPrincipal,
  Environment,
} from './schema.js';
