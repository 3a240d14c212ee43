#!/usr/bin/env node
import type { Server } from 'node:http';
import { ConfigManager } from './config/index.js';
import { createCoreContext, seedPrincipals } from './bootstrap.js';
import type { CoreContext } from './bootstrap.js';
import { createIdentityServer, startHTTPServer } from './http/index.js';

/**
 * Start the identity provider
 *
 * Configuration comes from CONFIG_PATH (or defaults); SERVER_PORT and ISSUER
 * override the file.
 */
async function main(): Promise<void> {
  const configManager = new ConfigManager();
  const config = await configManager.loadConfig();

  console.log('Starting identity provider...');
  console.log(`Issuer: ${config.server.issuer}`);
  console.log(`Port: ${config.server.port}`);
  console.log(`Store: ${config.store.type}`);
  console.log(`Keys: ${config.keys.directory}`);

  const context = await createCoreContext(config);
  await seedPrincipals(context, config.seed.principals);

  const app = createIdentityServer(context, {
    issuer: config.server.issuer,
    corsOrigins: config.server.corsOrigins,
  });
  const server = await startHTTPServer(app, config.server.port);

  console.log(`\n✓ Server is listening on http://localhost:${config.server.port}`);

  const shutdown = (signal: string) => {
    console.log(`\n\nReceived ${signal}, shutting down server...`);
    stop(server, context)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function stop(server: Server, context: CoreContext): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await context.close();
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
