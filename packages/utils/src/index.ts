// packages/utils/src/index.ts
export * from './bytes.js';
export * from './base58.js';
export * from './buffer.js';
export * from './hash.js';
export * from './log.js';
