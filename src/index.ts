/**
 * docstamp - text-substitution template engine and document generator.
 * Main library exports barrel file.
 */

// Template engine
export * from './core/template/index.js';

// Data loading
export * from './core/data/index.js';

// Configuration
export * from './core/config/index.js';

// Generation
export * from './core/generate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
