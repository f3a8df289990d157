export * from './placeholders.js';
export * from './assembler.js';
