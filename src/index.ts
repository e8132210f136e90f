/**
 * @arch codeout.barrel
 *
 * codeout - write generated code to runnable, formatted test files.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Emit pipeline
export * from './core/emit/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
