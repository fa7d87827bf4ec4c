// packages/utils/src/hash.ts
import { sha256 as _sha256 } from '@noble/hashes/sha2.js';

export { sha256 } from '@noble/hashes/sha2.js';
export { ripemd160 } from '@noble/hashes/legacy.js';

/** sha256d(x) = SHA256(SHA256(x)); base58check checksums use the first 4 bytes. */
export function sha256d(x: Uint8Array): Uint8Array {
  return _sha256(_sha256(x));
}
