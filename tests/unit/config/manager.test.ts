/**
 * ConfigManager Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigManager } from '../../../src/config/manager.js';
import { captureIdentityError, makeTempDir } from '../../helpers/identity-fixtures.js';

describe('ConfigManager', () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTempDir('config-');
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function writeConfig(name: string, content: unknown): Promise<string> {
    const path = join(root, name);
    await writeFile(path, JSON.stringify(content), 'utf-8');
    return path;
  }

  describe('loadConfig', () => {
    it('should fill in every default when no file is configured', async () => {
      const config = await new ConfigManager({}).loadConfig();

      expect(config).toEqual({
        server: { port: 3000, issuer: 'http://localhost:3000', corsOrigins: [] },
        keys: { directory: './keys', modulusLength: 2048 },
        tokens: {
          accessTokenTtlSeconds: 1800,
          refreshTokenTtlSeconds: 604800,
          defaultScopes: ['read', 'write'],
        },
        passwords: { bcryptRounds: 12 },
        audit: { enabled: false, maxEntries: 10000 },
        store: { type: 'memory' },
        seed: { principals: [] },
      });
    });

    it('should read and validate a file from an explicit path', async () => {
      const path = await writeConfig('postgres.json', {
        server: { port: 4000 },
        store: {
          type: 'postgres',
          host: 'db.internal',
          database: 'identity',
          user: 'idp',
          password: 'test-password',
        },
        seed: { principals: [{ username: 'root', email: 'root@x.io', password: 'rootpass' }] },
      });

      const config = await new ConfigManager({}).loadConfig(path);

      expect(config.server.port).toBe(4000);
      expect(config.store).toEqual({
        type: 'postgres',
        host: 'db.internal',
        port: 5432,
        database: 'identity',
        user: 'idp',
        password: 'test-password',
        ssl: false,
        table: 'principals',
      });
      expect(config.seed.principals).toEqual([
        { username: 'root', email: 'root@x.io', password: 'rootpass' },
      ]);
    });

    it('should fall back to CONFIG_PATH', async () => {
      const path = await writeConfig('env-path.json', { keys: { directory: '/var/keys' } });

      const config = await new ConfigManager({ CONFIG_PATH: path }).loadConfig();

      expect(config.keys.directory).toBe('/var/keys');
    });

    it('should apply SERVER_PORT and ISSUER overrides', async () => {
      const path = await writeConfig('overrides.json', {
        server: { port: 4000, issuer: 'http://file.example' },
      });

      const config = await new ConfigManager({
        SERVER_PORT: '8080',
        ISSUER: 'https://id.example.com',
      }).loadConfig(path);

      expect(config.server).toEqual({
        port: 8080,
        issuer: 'https://id.example.com',
        corsOrigins: [],
      });
    });

    it('should reject a modulus below 2048 bits', async () => {
      const path = await writeConfig('weak.json', { keys: { modulusLength: 1024 } });

      const error = await captureIdentityError(new ConfigManager({}).loadConfig(path));

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.message).toBe(
        'Configuration error: invalid configuration: keys.modulusLength: RSA modulus must be at least 2048 bits'
      );
    });

    it('should reject an unknown store type', async () => {
      const path = await writeConfig('store.json', { store: { type: 'redis' } });

      const error = await captureIdentityError(new ConfigManager({}).loadConfig(path));

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.message).toContain('store.type');
    });

    it('should require the access TTL to be shorter than the refresh TTL', async () => {
      const path = await writeConfig('ttl.json', {
        tokens: { accessTokenTtlSeconds: 3600, refreshTokenTtlSeconds: 3600 },
      });

      const error = await captureIdentityError(new ConfigManager({}).loadConfig(path));

      expect(error.message).toBe(
        'Configuration error: access token TTL must be shorter than refresh token TTL'
      );
    });

    it('should report a missing file', async () => {
      const error = await captureIdentityError(
        new ConfigManager({}).loadConfig(join(root, 'missing.json'))
      );

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.message.startsWith('Configuration error: failed to load configuration: ENOENT')).toBe(
        true
      );
    });

    it('should report malformed JSON', async () => {
      const path = join(root, 'broken.json');
      await writeFile(path, '{ "server": ', 'utf-8');

      const error = await captureIdentityError(new ConfigManager({}).loadConfig(path));

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.message.startsWith('Configuration error: failed to load configuration:')).toBe(
        true
      );
    });

    it('should reject a malformed environment', async () => {
      const error = await captureIdentityError(
        new ConfigManager({ SERVER_PORT: 'eighty' }).loadConfig()
      );

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.message).toContain('SERVER_PORT');
    });
  });

  describe('caching', () => {
    it('should return the cached configuration on later calls', async () => {
      const manager = new ConfigManager({});
      const first = await manager.loadConfig();

      expect(await manager.loadConfig()).toBe(first);
      expect(manager.getConfig()).toBe(first);
    });

    it('should throw from getConfig before loading', () => {
      expect(() => new ConfigManager({}).getConfig()).toThrow(
        'Configuration error: configuration not loaded; call loadConfig() first'
      );
    });

    it('should re-read the file on reload', async () => {
      const path = await writeConfig('reload.json', { server: { port: 4000 } });
      const manager = new ConfigManager({});
      await manager.loadConfig(path);

      await writeConfig('reload.json', { server: { port: 5000 } });

      expect((await manager.reloadConfig(path)).server.port).toBe(5000);
    });
  });

  describe('environment', () => {
    it('should default LOG_LEVEL to info', () => {
      expect(new ConfigManager({}).getLogLevel()).toBe('info');
      expect(new ConfigManager({ LOG_LEVEL: 'debug' }).getLogLevel()).toBe('debug');
    });

    it('should treat only production as a secure environment', () => {
      expect(new ConfigManager({ NODE_ENV: 'production' }).isSecureEnvironment()).toBe(true);
      expect(new ConfigManager({ NODE_ENV: 'test' }).isSecureEnvironment()).toBe(false);
    });

    it('should warn about insecure production settings', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      await new ConfigManager({ NODE_ENV: 'production' }).loadConfig();

      expect(warn).toHaveBeenCalledWith('[ConfigManager] Issuer should use HTTPS in production');
      expect(warn).toHaveBeenCalledWith(
        '[ConfigManager] Audit logging should be enabled in production environments'
      );
    });
  });
});
