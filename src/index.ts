/**
 * Seal Stack - coordinate-addressed code patterns across seven seal layers.
 * Main library exports barrel file.
 */

// Seal layers and coordinates
export * from './core/seals/index.js';
export * from './core/coordinate/index.js';

// Pattern table, store and index
export * from './core/patterns/index.js';
export * from './core/seal-index/index.js';

// Pipeline
export * from './core/query/index.js';
export * from './core/routing/index.js';
export * from './core/coherence/index.js';
export * from './core/assembly/index.js';

// Facade and configuration
export * from './core/engine/index.js';
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI and MCP
export { createCli } from './cli/index.js';
export { createMcpServer, startMcpServer } from './mcp/server.js';
