/**
 * @arch lintcache.barrel
 *
 * lintcache - persisted lint findings per file.
 * Main library exports barrel file.
 */

// Findings
export * from './core/findings/index.js';

// Cache
export * from './core/cache/index.js';

// Configuration
export * from './core/config/index.js';

export { getCurrentVersion } from './core/version.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
