// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Dispatch layer exports
export * from './dispatch/index.js';

// Credential stores
export * from './stores/index.js';

// HTTP layer exports
export * from './http/index.js';

// Composition root
export { createCoreContext, seedPrincipals } from './bootstrap.js';
export type { CoreContext, CoreContextOverrides } from './bootstrap.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
