/**
 * Pattern table and store exports.
 */
export * from './types.js';
export * from './loader.js';
export * from './store.js';
export { PatternEntrySchema, PatternTableSchema } from './schema.js';
