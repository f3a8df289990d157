export * from './types.js';
export * from './layers.js';
