import { readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';
import { EnvironmentSchema, IdentityConfigSchema } from './schema.js';
import type { Environment, IdentityConfig } from './schema.js';
import { IdentityErrors, isIdentityError } from '../utils/errors.js';

/**
 * ConfigManager - loads, validates and caches the identity provider configuration
 *
 * Resolution order for the file: explicit path, then CONFIG_PATH. With
 * neither, every section takes its defaults. SERVER_PORT and ISSUER override
 * the file's server settings.
 */
export class ConfigManager {
  private config: IdentityConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async loadConfig(configPath?: string): Promise<IdentityConfig> {
    if (this.config) {
      return this.config;
    }

    const environment = this.getEnvironment();
    const path = configPath ?? environment.CONFIG_PATH;

    try {
      const rawConfig: unknown = path ? JSON.parse(await readFile(path, 'utf-8')) : {};

      const parsed = IdentityConfigSchema.safeParse(rawConfig);
      if (!parsed.success) {
        throw IdentityErrors.CONFIGURATION_ERROR(
          `invalid configuration: ${formatIssues(parsed.error)}`
        );
      }

      const config = this.applyEnvironmentOverrides(parsed.data, environment);
      this.validateSecurityRequirements(config);

      this.config = config;
      console.log(
        `[ConfigManager] Configuration loaded${path ? ` from ${path}` : ' (defaults)'}`
      );
      return config;
    } catch (error) {
      if (isIdentityError(error)) {
        throw error;
      }
      throw IdentityErrors.CONFIGURATION_ERROR(
        `failed to load configuration: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  getConfig(): IdentityConfig {
    if (!this.config) {
      throw IdentityErrors.CONFIGURATION_ERROR('configuration not loaded; call loadConfig() first');
    }
    return this.config;
  }

  /**
   * Validated view of the process environment
   *
   * @throws {IdentityError} CONFIGURATION_ERROR for malformed variables
   */
  getEnvironment(): Environment {
    const parsed = EnvironmentSchema.safeParse(this.env);
    if (!parsed.success) {
      throw IdentityErrors.CONFIGURATION_ERROR(`invalid environment: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  async reloadConfig(configPath?: string): Promise<IdentityConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  isSecureEnvironment(): boolean {
    return this.getEnvironment().NODE_ENV === 'production';
  }

  getLogLevel(): Environment['LOG_LEVEL'] {
    return this.getEnvironment().LOG_LEVEL;
  }

  private applyEnvironmentOverrides(config: IdentityConfig, environment: Environment): IdentityConfig {
    return {
      ...config,
      server: {
        ...config.server,
        port: environment.SERVER_PORT ?? config.server.port,
        issuer: environment.ISSUER ?? config.server.issuer,
      },
    };
  }

  private validateSecurityRequirements(config: IdentityConfig): void {
    if (config.tokens.accessTokenTtlSeconds >= config.tokens.refreshTokenTtlSeconds) {
      throw IdentityErrors.CONFIGURATION_ERROR(
        'access token TTL must be shorter than refresh token TTL'
      );
    }

    if (this.isSecureEnvironment()) {
      if (!config.server.issuer.startsWith('https://')) {
        console.warn('[ConfigManager] Issuer should use HTTPS in production');
      }
      if (config.server.corsOrigins.includes('*')) {
        console.warn('[ConfigManager] Wildcard CORS origin enabled in production');
      }
      if (!config.audit.enabled) {
        console.warn('[ConfigManager] Audit logging should be enabled in production environments');
      }
    }
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
