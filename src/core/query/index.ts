/**
 * Query interpretation exports.
 */
export * from './types.js';
export * from './tokenizer.js';
export * from './vocabulary.js';
export * from './interpreter.js';
