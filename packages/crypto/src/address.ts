// packages/crypto/src/address.ts
import { base58checkDecode, base58checkEncode, hexToBytes, ripemd160 } from '@txcanon/utils';

import { COMPRESSED_PUBLIC_KEY_LENGTH } from './keys.js';

/** Raw address width: 1 version byte + 20-byte RIPEMD-160 of the public key. */
export const ADDRESS_LENGTH = 21;

export function addressFromPublicKey(publicKeyHex: string, version: number): string {
  const pub = hexToBytes(publicKeyHex);
  if (pub.length !== COMPRESSED_PUBLIC_KEY_LENGTH) {
    throw new Error(`addressFromPublicKey: expected ${COMPRESSED_PUBLIC_KEY_LENGTH}-byte public key, got ${pub.length}`);
  }
  return base58checkEncode(version, ripemd160(pub));
}

/** True when `address` decodes with a valid checksum to 21 bytes (and the given version, if any). */
export function validateAddress(address: string, version?: number): boolean {
  try {
    const { version: v, payload } = base58checkDecode(address);
    if (payload.length !== ADDRESS_LENGTH - 1) return false;
    return version === undefined || v === version;
  } catch {
    return false;
  }
}
