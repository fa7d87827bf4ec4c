import test from 'node:test';
import assert from 'node:assert/strict';

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { bytesToHex, hexToBytes, sha256, utf8ToBytes } from '@txcanon/utils';

import { deriveKeys, derivePublicKey } from '../keys.js';
import { signHash, verifyHash } from '../ecdsa.js';

const SECRET = 'test-secret';

function flipByte(hex: string, index: number): string {
  const bytes = hexToBytes(hex);
  bytes[index] ^= 0x01;
  return bytesToHex(bytes);
}

test('deriveKeys: private key is sha256 of the secret, public key is compressed', () => {
  const { privateKey, publicKey } = deriveKeys(SECRET);
  assert.deepEqual(privateKey, sha256(utf8ToBytes(SECRET)));
  assert.equal(publicKey, bytesToHex(secp256k1.getPublicKey(privateKey, true)));
  assert.equal(publicKey.length, 66);
  assert.match(publicKey, /^0[23]/);
  assert.equal(derivePublicKey(SECRET), publicKey);
});

test('deriveKeys: rejects an empty secret', () => {
  assert.throws(() => deriveKeys(''), /must not be empty/);
});

test('signHash: deterministic for the same hash and key', () => {
  const { privateKey } = deriveKeys(SECRET);
  const hash = sha256(utf8ToBytes('payload'));
  assert.equal(signHash(hash, privateKey), signHash(hash, privateKey));
  assert.equal(signHash(hash, privateKey).slice(0, 2), '30');
});

test('verifyHash: accepts the matching signature, rejects other hash or key', () => {
  const keys = deriveKeys(SECRET);
  const other = deriveKeys('another-test-secret');
  const hash = sha256(utf8ToBytes('payload'));
  const sig = signHash(hash, keys.privateKey);

  assert.equal(verifyHash(keys.publicKey, hash, sig), true);
  assert.equal(verifyHash(keys.publicKey, sha256(utf8ToBytes('other')), sig), false);
  assert.equal(verifyHash(other.publicKey, hash, sig), false);
});

test('verifyHash: a flipped byte inside r or s returns false', () => {
  const keys = deriveKeys(SECRET);
  const hash = sha256(utf8ToBytes('payload'));
  const sig = signHash(hash, keys.privateKey);
  const lastIndex = sig.length / 2 - 1;

  assert.equal(verifyHash(keys.publicKey, hash, flipByte(sig, lastIndex)), false);
  assert.equal(verifyHash(keys.publicKey, hash, flipByte(sig, 10)), false);
});

test('verifyHash: malformed inputs throw instead of returning false', () => {
  const keys = deriveKeys(SECRET);
  const hash = sha256(utf8ToBytes('payload'));
  const sig = signHash(hash, keys.privateKey);

  assert.throws(() => verifyHash('02' + '00'.repeat(32), hash, sig), /malformed public key/);
  assert.throws(() => verifyHash('xyz', hash, sig), /malformed public key/);
  assert.throws(() => verifyHash(keys.publicKey, hash, 'zz'), /signature is not hex/);
  assert.throws(() => verifyHash(keys.publicKey, new Uint8Array(31), sig), /hash must be 32 bytes/);
});

test('verifyHash: hex that is not DER returns false', () => {
  const keys = deriveKeys(SECRET);
  const hash = sha256(utf8ToBytes('payload'));
  assert.equal(verifyHash(keys.publicKey, hash, 'deadbeef'), false);
  assert.equal(verifyHash(keys.publicKey, hash, ''), false);
});

test('verifyHash: every single-byte flip returns false', () => {
  const keys = deriveKeys(SECRET);
  const hash = sha256(utf8ToBytes('payload'));
  const sig = signHash(hash, keys.privateKey);

  for (let i = 0; i < sig.length / 2; i++) {
    assert.equal(verifyHash(keys.publicKey, hash, flipByte(sig, i)), false, `byte ${i}`);
  }
});

test('verifyHash: accepts the high-S form of a valid signature', () => {
  const keys = deriveKeys(SECRET);
  const hash = sha256(utf8ToBytes('payload'));
  const low = secp256k1.Signature.fromBytes(hexToBytes(signHash(hash, keys.privateKey)), 'der');
  const high = new secp256k1.Signature(low.r, secp256k1.Point.Fn.ORDER - low.s);

  assert.equal(high.hasHighS(), true);
  assert.equal(verifyHash(keys.publicKey, hash, bytesToHex(high.toBytes('der'))), true);
});
