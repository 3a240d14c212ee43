/**
 * Identity Provider Configuration Schema
 *
 * Every section is optional in the file; omitted values take the defaults
 * below. Environment variables are validated separately (EnvironmentSchema).
 */

import { z } from 'zod';

// ============================================================================
// Sections
// ============================================================================

export const ServerConfigSchema = z
  .object({
    port: z.number().int().min(1).max(65535).default(3000),
    issuer: z.string().url().default('http://localhost:3000'),
    corsOrigins: z.array(z.string()).default([]).describe('Allowed CORS origins ("*" allows any)'),
  })
  .default({});

export const KeysConfigSchema = z
  .object({
    directory: z.string().min(1).default('./keys'),
    modulusLength: z
      .number()
      .int()
      .min(2048, 'RSA modulus must be at least 2048 bits')
      .max(8192)
      .default(2048),
    keyId: z.string().min(1).optional().describe('Published kid (default: JWK thumbprint)'),
  })
  .default({});

export const TokensConfigSchema = z
  .object({
    accessTokenTtlSeconds: z.number().int().positive().default(1800),
    refreshTokenTtlSeconds: z.number().int().positive().default(604800),
    defaultScopes: z.array(z.string().min(1)).default(['read', 'write']),
  })
  .default({});

export const PasswordsConfigSchema = z
  .object({
    bcryptRounds: z.number().int().min(4).max(15).default(12),
  })
  .default({});

export const AuditConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    maxEntries: z.number().int().positive().default(10000),
  })
  .default({});

export const MemoryStoreConfigSchema = z.object({
  type: z.literal('memory'),
});

export const PostgresStoreConfigSchema = z.object({
  type: z.literal('postgres'),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string(),
  ssl: z.boolean().default(false),
  table: z
    .string()
    .regex(/^[a-z_][a-z0-9_]{0,62}$/, 'Table must be a lowercase SQL identifier')
    .default('principals'),
});

export const StoreConfigSchema = z
  .discriminatedUnion('type', [MemoryStoreConfigSchema, PostgresStoreConfigSchema])
  .default({ type: 'memory' });

export const SeedPrincipalSchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
  roles: z.array(z.string()).optional(),
});

export const SeedConfigSchema = z
  .object({
    principals: z.array(SeedPrincipalSchema).default([]),
  })
  .default({});

// ============================================================================
// Root
// ============================================================================

export const IdentityConfigSchema = z.object({
  server: ServerConfigSchema,
  keys: KeysConfigSchema,
  tokens: TokensConfigSchema,
  passwords: PasswordsConfigSchema,
  audit: AuditConfigSchema,
  store: StoreConfigSchema,
  seed: SeedConfigSchema,
});

export const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SERVER_PORT: z.string().regex(/^\d+$/).transform(Number).optional(),
  ISSUER: z.string().url().optional(),
  CONFIG_PATH: z.string().optional(),
});

export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;
export type IdentityConfigInput = z.input<typeof IdentityConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type PostgresStoreSettings = z.infer<typeof PostgresStoreConfigSchema>;
export type SeedPrincipal = z.infer<typeof SeedPrincipalSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;
