/**
 * Ecosystem auditor library exports.
 */

// Configuration
export * from './core/config/index.js';

// Metadata loading
export * from './core/metadata/index.js';

// Graph
export * from './core/graph/index.js';

// Findings and rules
export * from './core/findings/index.js';
export * from './core/rules/index.js';

// Link probing
export * from './core/probe/index.js';

// Reports
export * from './core/report/index.js';

// Audit runs
export * from './core/audit/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
