export * from './types.js';
export * from './convert.js';
export * from './merge.js';
