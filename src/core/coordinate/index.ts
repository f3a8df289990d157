/**
 * Coordinate exports.
 */
export * from './types.js';
export * from './parser.js';
export * from './distance.js';
