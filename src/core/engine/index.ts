export * from './types.js';
export * from './seal-stack.js';
export * from './loader.js';
export * from './views.js';
