// packages/crypto/src/index.ts
export * from './keys.js';
export * from './ecdsa.js';
export * from './address.js';
