/**
 * Audit Service - security event trail with Null Object defaults
 *
 * The engine records one entry per login, refresh, registration and
 * administrative change. Disabled unless configured, so callers never need
 * to check whether auditing is on.
 */

import type { AuditEntry } from './types.js';

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Capacity of the default in-memory buffer (default: 10000) */
  maxEntries?: number;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Invoked with the full buffer before the oldest entry is dropped */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Write-only storage for audit entries. Querying belongs to whatever
 * indexed persistence sits behind an implementation.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

/**
 * Bounded in-memory buffer, oldest entry evicted first.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /** @internal test helper */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }
}

/**
 * Usage:
 * ```typescript
 * const audit = new AuditService({ enabled: true });
 * await audit.log({ timestamp: new Date(), source: 'auth:engine', action: 'login', success: true });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Record an entry. No-op while disabled.
   *
   * @throws {Error} If the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** @internal */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
