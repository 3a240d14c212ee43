/**
 * Composition root Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { createCoreContext, seedPrincipals } from '../../src/bootstrap.js';
import { InMemoryAuditStorage } from '../../src/core/audit-service.js';
import { COMMAND_KINDS } from '../../src/dispatch/commands.js';
import { InMemoryCredentialStore } from '../../src/stores/in-memory-credential-store.js';
import { makeTempDir, testConfig } from '../helpers/identity-fixtures.js';

describe('createCoreContext', () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    root = await makeTempDir('bootstrap-');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('should generate signing keys in the configured directory', async () => {
    const keys = join(root, 'keys');

    const context = await createCoreContext(testConfig(keys));

    await expect(access(join(keys, 'private_key.pem'))).resolves.toBeUndefined();
    await expect(access(join(keys, 'public_key.pem'))).resolves.toBeUndefined();
    expect(console.log).toHaveBeenCalledWith('[Bootstrap] Using in-memory credential store');
    await context.close();
  });

  it('should register a handler for every command kind', async () => {
    const context = await createCoreContext(testConfig(join(root, 'keys')));

    expect(context.dispatcher.kinds()).toEqual([...COMMAND_KINDS]);
    await context.close();
  });

  it('should use injected store, clock and audit storage', async () => {
    const store = new InMemoryCredentialStore();
    const auditStorage = new InMemoryAuditStorage();
    const now = new Date('2024-01-01T00:00:00.000Z');

    const context = await createCoreContext(testConfig(join(root, 'keys')), {
      store,
      clock: () => now,
      auditStorage,
    });
    await context.dispatcher.dispatch({
      kind: 'register',
      username: 'alice',
      email: 'a@x.io',
      password: 'secret1',
    });
    const tokens = await context.dispatcher.dispatch({
      kind: 'login',
      username: 'alice',
      password: 'secret1',
    });

    expect(context.store).toBe(store);
    expect(store.size()).toBe(1);
    expect(await context.codec.verify(tokens.access_token)).toMatchObject({
      iat: 1704067200,
      exp: 1704067200 + 1800,
    });
    expect(auditStorage.getEntries().map((e) => e.action)).toEqual(['register', 'login']);
    expect(console.log).not.toHaveBeenCalledWith('[Bootstrap] Using in-memory credential store');
    await context.close();
  });
});

describe('seedPrincipals', () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    root = await makeTempDir('seed-');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('should create missing principals and skip existing ones', async () => {
    const context = await createCoreContext(testConfig(join(root, 'keys')));
    const seeds = [
      { username: 'root', email: 'root@x.io', password: 'rootpass', roles: ['admin'] },
      { username: 'bob', email: 'b@x.io', password: 'secret2' },
    ];

    expect(await seedPrincipals(context, seeds)).toEqual(['root', 'bob']);
    expect(await seedPrincipals(context, seeds)).toEqual([]);

    const root1 = await context.store.findByUsername('root');
    expect(root1?.roles).toEqual(['admin']);
    expect(await context.hasher.verify('rootpass', root1?.passwordHash ?? '')).toBe(true);
    await context.close();
  });

  it('should surface validation failures', async () => {
    const context = await createCoreContext(testConfig(join(root, 'keys')));

    await expect(
      seedPrincipals(context, [{ username: 'x', email: 'x@x.io', password: 'secret1' }])
    ).rejects.toThrow('Validation failed: Username must be at least 3 characters long');
    await context.close();
  });
});
