/**
 * Composition root
 *
 * Builds the service graph once at startup:
 * AuditService → KeyManager → PasswordHasher → TokenCodec →
 * AuthenticationEngine → RequestDispatcher (handlers registered)
 *
 * Nothing here is a module-level singleton; every caller gets its own graph.
 */

import {
  AuditService,
  AuthenticationEngine,
  KeyManager,
  PasswordHasher,
  TokenCodec,
} from './core/index.js';
import type { AuditStorage, CredentialStore } from './core/index.js';
import { RequestDispatcher, registerIdentityHandlers } from './dispatch/index.js';
import { InMemoryCredentialStore, PostgresCredentialStore } from './stores/index.js';
import type { IdentityConfig, SeedPrincipal, StoreConfig } from './config/index.js';

export interface CoreContext {
  config: IdentityConfig;
  auditService: AuditService;
  keyManager: KeyManager;
  hasher: PasswordHasher;
  codec: TokenCodec;
  store: CredentialStore;
  engine: AuthenticationEngine;
  dispatcher: RequestDispatcher;
  /** Release resources owned by the context (database pool) */
  close(): Promise<void>;
}

export interface CoreContextOverrides {
  /** Use this store instead of the configured one */
  store?: CredentialStore;
  /** Clock for token minting and verification */
  clock?: () => Date;
  /** Audit storage (default: bounded in-memory buffer) */
  auditStorage?: AuditStorage;
}

/**
 * Build the service graph and make sure a signing key pair exists
 *
 * @throws {IdentityError} KEY_STORAGE_FAILED if keys cannot be generated or stored
 */
export async function createCoreContext(
  config: IdentityConfig,
  overrides: CoreContextOverrides = {}
): Promise<CoreContext> {
  const auditService = new AuditService({
    enabled: config.audit.enabled,
    maxEntries: config.audit.maxEntries,
    storage: overrides.auditStorage,
  });

  const keyManager = new KeyManager({
    directory: config.keys.directory,
    modulusLength: config.keys.modulusLength,
    keyId: config.keys.keyId,
  });

  const hasher = new PasswordHasher(config.passwords.bcryptRounds);

  const codec = new TokenCodec(keyManager, {
    accessTokenTtlSeconds: config.tokens.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.tokens.refreshTokenTtlSeconds,
    defaultScopes: config.tokens.defaultScopes,
    clock: overrides.clock,
  });

  const { store, close } = overrides.store
    ? { store: overrides.store, close: async () => undefined }
    : await openStore(config.store);

  const engine = new AuthenticationEngine({ store, hasher, codec, auditService });

  const dispatcher = new RequestDispatcher(auditService);
  registerIdentityHandlers(dispatcher, engine, codec);

  await keyManager.ensureKeys();

  return { config, auditService, keyManager, hasher, codec, store, engine, dispatcher, close };
}

async function openStore(
  config: StoreConfig
): Promise<{ store: CredentialStore; close: () => Promise<void> }> {
  if (config.type === 'memory') {
    console.log('[Bootstrap] Using in-memory credential store');
    return { store: new InMemoryCredentialStore(), close: async () => undefined };
  }

  console.log(`[Bootstrap] Using PostgreSQL credential store at ${config.host}:${config.port}`);
  const store = PostgresCredentialStore.connect(config);
  await store.ensureSchema();
  return { store, close: () => store.close() };
}

/**
 * Register configured principals that do not exist yet
 *
 * @returns Usernames that were created
 */
export async function seedPrincipals(
  context: Pick<CoreContext, 'engine' | 'store'>,
  seeds: readonly SeedPrincipal[]
): Promise<string[]> {
  const created: string[] = [];

  for (const seed of seeds) {
    if (await context.store.existsByUsername(seed.username)) {
      continue;
    }
    const principal = await context.engine.register(seed);
    console.log(`[Bootstrap] Seeded principal ${principal.username} (${principal.roles.join(', ')})`);
    created.push(principal.username);
  }

  return created;
}
