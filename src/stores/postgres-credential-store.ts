/**
 * PostgreSQL CredentialStore
 *
 * Security Features:
 * - Parameterized queries only
 * - Table name validated as a plain SQL identifier
 * - Unique violations mapped to DUPLICATE_USERNAME / DUPLICATE_EMAIL
 *
 * Any other driver failure surfaces as STORE_UNAVAILABLE.
 */

import pg from 'pg';
const { Pool } = pg;
import { z } from 'zod';
import type { CredentialStore, Principal } from '../core/index.js';
import { IdentityErrors, isIdentityError } from '../utils/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PostgresStoreConfig {
  host: string;
  /** Default: 5432 */
  port?: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  /** Default: 'principals' */
  table?: string;
  pool?: {
    max?: number;
    idleTimeoutMillis?: number;
    connectionTimeoutMillis?: number;
  };
}

/**
 * The part of pg.Pool / pg.Client this store uses
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

const DEFAULT_TABLE = 'principals';
const SQL_IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/;
const UNIQUE_VIOLATION = '23505';

const PrincipalRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  password_hash: z.string(),
  roles: z.array(z.string()).min(1),
  is_active: z.boolean(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const DriverErrorSchema = z.object({
  code: z.string(),
  constraint: z.string().optional(),
});

// ============================================================================
// PostgreSQL Credential Store
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const store = PostgresCredentialStore.connect({ host, database, user, password });
 * await store.ensureSchema();
 * ```
 */
export class PostgresCredentialStore implements CredentialStore {
  private readonly table: string;

  constructor(
    private readonly db: Queryable,
    table: string = DEFAULT_TABLE,
    private readonly ownedPool: pg.Pool | null = null
  ) {
    if (!SQL_IDENTIFIER.test(table)) {
      throw IdentityErrors.CONFIGURATION_ERROR(`invalid table name: ${table}`);
    }
    this.table = table;
  }

  /**
   * Create a store backed by its own connection pool
   */
  static connect(config: PostgresStoreConfig): PostgresCredentialStore {
    const pool = new Pool({
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ?? false,
      max: config.pool?.max ?? 10,
      idleTimeoutMillis: config.pool?.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.pool?.connectionTimeoutMillis ?? 5000,
    });

    pool.on('error', (error) => {
      console.error('[PostgresCredentialStore] Idle client error:', error.message);
    });

    return new PostgresCredentialStore(pool, config.table ?? DEFAULT_TABLE, pool);
  }

  /**
   * Create the principals table if it does not exist
   */
  async ensureSchema(): Promise<void> {
    await this.run(
      'ensureSchema',
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        id UUID PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        email TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        roles TEXT[] NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      )`
    );
  }

  async findById(id: string): Promise<Principal | undefined> {
    return this.findOne('findById', 'id', id);
  }

  async findByUsername(username: string): Promise<Principal | undefined> {
    return this.findOne('findByUsername', 'username', username);
  }

  async findByEmail(email: string): Promise<Principal | undefined> {
    return this.findOne('findByEmail', 'email', email);
  }

  async existsByUsername(username: string): Promise<boolean> {
    const result = await this.run(
      'existsByUsername',
      `SELECT 1 FROM ${this.table} WHERE username = $1 LIMIT 1`,
      [username]
    );
    return result.rows.length > 0;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const result = await this.run(
      'existsByEmail',
      `SELECT 1 FROM ${this.table} WHERE email = $1 LIMIT 1`,
      [email]
    );
    return result.rows.length > 0;
  }

  async create(principal: Principal): Promise<Principal> {
    const result = await this.run(
      'create',
      `INSERT INTO ${this.table}
        (id, username, email, password_hash, roles, is_active, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *`,
      [
        principal.id,
        principal.username,
        principal.email,
        principal.passwordHash,
        [...principal.roles],
        principal.active,
        principal.createdAt,
        principal.updatedAt,
      ],
      principal
    );
    return this.firstRow(result.rows) ?? principal;
  }

  async update(principal: Principal): Promise<Principal> {
    const result = await this.run(
      'update',
      `UPDATE ${this.table}
       SET username = $2, email = $3, password_hash = $4, roles = $5, is_active = $6, updated_at = $7
       WHERE id = $1
       RETURNING *`,
      [
        principal.id,
        principal.username,
        principal.email,
        principal.passwordHash,
        [...principal.roles],
        principal.active,
        principal.updatedAt,
      ],
      principal
    );
    const updated = this.firstRow(result.rows);
    if (!updated) {
      throw IdentityErrors.PRINCIPAL_NOT_FOUND(principal.id);
    }
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.run('delete', `DELETE FROM ${this.table} WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listAll(): Promise<Principal[]> {
    const result = await this.run(
      'listAll',
      `SELECT * FROM ${this.table} ORDER BY created_at, username`
    );
    return result.rows.map((row) => this.toPrincipal(row));
  }

  /**
   * Close the pool created by connect(). No-op for injected connections.
   */
  async close(): Promise<void> {
    await this.ownedPool?.end();
  }

  private async findOne(
    operation: string,
    column: 'id' | 'username' | 'email',
    value: string
  ): Promise<Principal | undefined> {
    const result = await this.run(
      operation,
      `SELECT * FROM ${this.table} WHERE ${column} = $1`,
      [value]
    );
    return this.firstRow(result.rows);
  }

  private firstRow(rows: unknown[]): Principal | undefined {
    return rows.length > 0 ? this.toPrincipal(rows[0]) : undefined;
  }

  private toPrincipal(row: unknown): Principal {
    const parsed = PrincipalRowSchema.safeParse(row);
    if (!parsed.success) {
      throw IdentityErrors.STORE_UNAVAILABLE('row mapping', parsed.error);
    }
    const data = parsed.data;
    return {
      id: data.id,
      username: data.username,
      email: data.email,
      passwordHash: data.password_hash,
      roles: data.roles,
      active: data.is_active,
      createdAt: data.created_at,
      updatedAt: data.updated_at,
    };
  }

  private async run(
    operation: string,
    sql: string,
    values?: unknown[],
    subject?: Principal
  ): Promise<{ rows: unknown[]; rowCount?: number | null }> {
    try {
      return await this.db.query(sql, values);
    } catch (error) {
      if (isIdentityError(error)) {
        throw error;
      }

      const driverError = DriverErrorSchema.safeParse(error);
      if (subject && driverError.success && driverError.data.code === UNIQUE_VIOLATION) {
        if (driverError.data.constraint?.endsWith('_email_key')) {
          throw IdentityErrors.DUPLICATE_EMAIL(subject.email);
        }
        throw IdentityErrors.DUPLICATE_USERNAME(subject.username);
      }

      throw IdentityErrors.STORE_UNAVAILABLE(operation, error);
    }
  }
}
