import test from 'node:test';
import assert from 'node:assert/strict';

import { base58checkDecode, hexToBytes, ripemd160 } from '@txcanon/utils';

import { addressFromPublicKey, validateAddress, ADDRESS_LENGTH } from '../address.js';
import { deriveKeys } from '../keys.js';

test('addressFromPublicKey: version byte + ripemd160(pubkey)', () => {
  const { publicKey } = deriveKeys('test-secret');
  const address = addressFromPublicKey(publicKey, 0x19);

  const { version, payload } = base58checkDecode(address);
  assert.equal(version, 0x19);
  assert.deepEqual(payload, ripemd160(hexToBytes(publicKey)));
  assert.equal(payload.length + 1, ADDRESS_LENGTH);
});

test('addressFromPublicKey: version 0x19 addresses start with B', () => {
  const { publicKey } = deriveKeys('test-secret');
  assert.match(addressFromPublicKey(publicKey, 0x19), /^B/);
});

test('addressFromPublicKey: rejects keys that are not 33 bytes', () => {
  assert.throws(() => addressFromPublicKey('02abcd', 0x19), /33-byte public key/);
});

test('validateAddress: checksum and version', () => {
  const { publicKey } = deriveKeys('test-secret');
  const address = addressFromPublicKey(publicKey, 0x19);

  assert.equal(validateAddress(address), true);
  assert.equal(validateAddress(address, 0x19), true);
  assert.equal(validateAddress(address, 0x52), false);
  assert.equal(validateAddress(address.slice(0, -1) + (address.endsWith('2') ? '3' : '2')), false);
  assert.equal(validateAddress('not-base58-0OIl'), false);
});
