/**
 * featurekit - feature scaffolding and Android code analysis.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Naming
export * from './core/naming/index.js';

// Scaffolding
export * from './core/scaffold/index.js';

// Stability reports
export * from './core/stability/index.js';

// Pre-commit scan
export * from './core/scan/index.js';

// Utilities
export * from './utils/index.js';

// Formatters
export { StabilityFormatter } from './cli/formatters/stability.js';
export type { StabilityFormatOptions, StabilityReportContext } from './cli/formatters/stability.js';
export { ScanFormatter } from './cli/formatters/scan.js';

// CLI
export { createCli } from './cli/index.js';
