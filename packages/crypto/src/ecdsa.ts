// packages/crypto/src/ecdsa.ts
// secp256k1 ECDSA over an already-computed 32-byte hash.
// Signing produces DER, low-S, with RFC6979 nonces (noble's defaults).
// Verification accepts high-S as well: other signers do not normalise S.

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { bytesToHex, hexToBytes } from '@txcanon/utils';

const SIG_OPTS = { prehash: false, format: 'der' } as const;
const VERIFY_OPTS = { ...SIG_OPTS, lowS: false } as const;

function assertHash32(hash: Uint8Array, where: string): void {
  if (!(hash instanceof Uint8Array) || hash.length !== 32) {
    throw new Error(`${where}: hash must be 32 bytes`);
  }
}

export function signHash(hash: Uint8Array, privateKey: Uint8Array): string {
  assertHash32(hash, 'signHash');
  if (privateKey.length !== 32) throw new Error('signHash: private key must be 32 bytes');
  return bytesToHex(secp256k1.sign(hash, privateKey, SIG_OPTS));
}

/**
 * Returns false for any signature that does not match, including bytes that
 * do not parse as DER. Throws when the key or hash is malformed, or when the
 * signature is not hex.
 */
export function verifyHash(publicKeyHex: string, hash: Uint8Array, signatureHex: string): boolean {
  assertHash32(hash, 'verifyHash');

  let pubBytes: Uint8Array;
  try {
    pubBytes = hexToBytes(publicKeyHex);
    secp256k1.Point.fromBytes(pubBytes);
  } catch (err) {
    throw new Error(`verifyHash: malformed public key`, { cause: err });
  }

  let sigBytes: Uint8Array;
  try {
    sigBytes = hexToBytes(signatureHex);
  } catch (err) {
    throw new Error(`verifyHash: signature is not hex`, { cause: err });
  }

  try {
    secp256k1.Signature.fromBytes(sigBytes, 'der');
  } catch {
    // a tampered length or tag byte; still just a signature that does not match
    return false;
  }

  return secp256k1.verify(sigBytes, hash, pubBytes, VERIFY_OPTS);
}
