/**
 * In-memory CredentialStore
 *
 * Principals keyed by id, with username and email indexes. Contents are lost
 * on restart; used for development, seeding and tests.
 */

import type { CredentialStore, Principal } from '../core/index.js';
import { IdentityErrors } from '../utils/errors.js';

export class InMemoryCredentialStore implements CredentialStore {
  private readonly principals = new Map<string, Principal>();
  private readonly idsByUsername = new Map<string, string>();
  private readonly idsByEmail = new Map<string, string>();

  async findById(id: string): Promise<Principal | undefined> {
    return this.principals.get(id);
  }

  async findByUsername(username: string): Promise<Principal | undefined> {
    const id = this.idsByUsername.get(username);
    return id === undefined ? undefined : this.principals.get(id);
  }

  async findByEmail(email: string): Promise<Principal | undefined> {
    const id = this.idsByEmail.get(email);
    return id === undefined ? undefined : this.principals.get(id);
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.idsByUsername.has(username);
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.idsByEmail.has(email);
  }

  /**
   * @throws {IdentityError} DUPLICATE_USERNAME / DUPLICATE_EMAIL
   */
  async create(principal: Principal): Promise<Principal> {
    if (this.idsByUsername.has(principal.username)) {
      throw IdentityErrors.DUPLICATE_USERNAME(principal.username);
    }
    if (this.idsByEmail.has(principal.email)) {
      throw IdentityErrors.DUPLICATE_EMAIL(principal.email);
    }

    this.principals.set(principal.id, principal);
    this.idsByUsername.set(principal.username, principal.id);
    this.idsByEmail.set(principal.email, principal.id);
    return principal;
  }

  /**
   * @throws {IdentityError} PRINCIPAL_NOT_FOUND if the id is unknown
   */
  async update(principal: Principal): Promise<Principal> {
    const existing = this.principals.get(principal.id);
    if (!existing) {
      throw IdentityErrors.PRINCIPAL_NOT_FOUND(principal.id);
    }

    const usernameOwner = this.idsByUsername.get(principal.username);
    if (usernameOwner !== undefined && usernameOwner !== principal.id) {
      throw IdentityErrors.DUPLICATE_USERNAME(principal.username);
    }
    const emailOwner = this.idsByEmail.get(principal.email);
    if (emailOwner !== undefined && emailOwner !== principal.id) {
      throw IdentityErrors.DUPLICATE_EMAIL(principal.email);
    }

    this.idsByUsername.delete(existing.username);
    this.idsByEmail.delete(existing.email);
    this.principals.set(principal.id, principal);
    this.idsByUsername.set(principal.username, principal.id);
    this.idsByEmail.set(principal.email, principal.id);
    return principal;
  }

  async delete(id: string): Promise<boolean> {
    const existing = this.principals.get(id);
    if (!existing) {
      return false;
    }
    this.principals.delete(id);
    this.idsByUsername.delete(existing.username);
    this.idsByEmail.delete(existing.email);
    return true;
  }

  async listAll(): Promise<Principal[]> {
    return Array.from(this.principals.values());
  }

  /** Number of stored principals */
  size(): number {
    return this.principals.size;
  }
}
