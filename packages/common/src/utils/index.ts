export * from './validation.js';
export * from './query.js';
export * from './formatting.js';
export * from './encoding.js';
