// packages/crypto/src/keys.ts
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { bytesToHex, sha256, utf8ToBytes } from '@txcanon/utils';

export type KeyPair = {
  /** 32-byte secp256k1 scalar */
  privateKey: Uint8Array;
  /** compressed (33-byte) public key, hex */
  publicKey: string;
};

export const COMPRESSED_PUBLIC_KEY_LENGTH = 33;

/**
 * Passphrase keys: the private key is SHA-256 of the UTF-8 secret.
 * A Uint8Array secret is hashed as-is.
 */
export function deriveKeys(secret: string | Uint8Array): KeyPair {
  const seed = typeof secret === 'string' ? utf8ToBytes(secret) : secret;
  if (seed.length === 0) throw new Error('deriveKeys: secret must not be empty');

  const privateKey = sha256(seed);
  const publicKey = bytesToHex(secp256k1.getPublicKey(privateKey, true));
  return { privateKey, publicKey };
}

export function derivePublicKey(secret: string | Uint8Array): string {
  return deriveKeys(secret).publicKey;
}
