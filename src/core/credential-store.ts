/**
 * CredentialStore - persistence boundary for principals.
 *
 * Implementations live in src/stores/. Uniqueness of username and email is
 * the store's responsibility. Any operation may reject; the engine reports
 * such failures as STORE_UNAVAILABLE and never retries.
 */

import type { Principal } from './types.js';

export interface CredentialStore {
  findById(id: string): Promise<Principal | undefined>;
  findByUsername(username: string): Promise<Principal | undefined>;
  findByEmail(email: string): Promise<Principal | undefined>;
  existsByUsername(username: string): Promise<boolean>;
  existsByEmail(email: string): Promise<boolean>;
  create(principal: Principal): Promise<Principal>;
  update(principal: Principal): Promise<Principal>;
  /** @returns true when a principal was removed */
  delete(id: string): Promise<boolean>;
  listAll(): Promise<Principal[]>;
}
