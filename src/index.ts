/**
 * fixture-sample: small utilities, a status/user model and the entry
 * routine that ties them together.
 */

// Utilities
export * from './core/utilities/index.js';

// Domain model
export * from './core/models/index.js';

// Entry routine
export * from './core/entry/index.js';

// Configuration
export * from './core/config/index.js';

// Errors, logging, YAML
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
