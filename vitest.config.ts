import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // bcrypt and RSA key generation are CPU-bound
    testTimeout: 30000,
    hookTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        // Entry points (mostly imports/exports - no logic to test)
        'src/index.ts',
        'src/start-server.ts',
        'src/core/index.ts',
        'src/dispatch/index.ts',
        'src/stores/index.ts',
        'src/http/index.ts',
        'src/config/index.ts',
        // Type-only files
        'src/core/types.ts',
        'src/core/credential-store.ts',
        'src/dispatch/commands.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
