/**
 * trajeval - tool-use trajectory metrics for agent simulation runs.
 * Main library exports barrel file.
 */

// Trace and plan model
export * from './core/trace/index.js';

// Metrics engines
export * from './core/metrics/index.js';

// Simulation and task ingestion
export * from './core/ingest/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
