/**
 * Credential store implementations
 */

export { InMemoryCredentialStore } from './in-memory-credential-store.js';
export { PostgresCredentialStore } from './postgres-credential-store.js';
export type { PostgresStoreConfig, Queryable } from './postgres-credential-store.js';
