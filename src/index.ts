/**
 * Main library exports barrel file.
 */

// Calculator
export * from './core/calculator/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
