// packages/transactions/src/index.ts
export * from './types.js';
export * from './errors.js';
export * from './network.js';
export * from './slot.js';
export * from './codec.js';
export * from './assets.js';
export * from './encoder.js';
export * from './json.js';
export * from './transaction.js';
export * from './builder.js';
