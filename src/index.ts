/**
 * stampkit - project scaffolding from declarative templates.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Variables and conditions
export * from './core/environment/index.js';
export * from './core/condition/index.js';

// Templates
export * from './core/descriptor/index.js';
export * from './core/locator/index.js';

// Rendering and materialization
export * from './core/render/index.js';
export * from './core/scaffold/index.js';

// Collaborators
export * from './core/hooks/index.js';
export * from './core/manifest/index.js';
export * from './core/next-steps/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
