/**
 * springinit library exports.
 */

// Version intervals
export * from './core/version/index.js';

// Archive extraction
export * from './core/archive/index.js';

// Component selection
export * from './core/components/index.js';

// Configuration
export * from './core/config/index.js';

// Service metadata
export * from './core/metadata/index.js';

// Project request
export * from './core/project/index.js';

// Generation
export * from './core/generator/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';

// CLI
export { createCli } from './cli/index.js';
