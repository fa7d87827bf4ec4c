import test from 'node:test';
import assert from 'node:assert/strict';

import { base58checkEncode, bytesToHex } from '@txcanon/utils';

import {
  encodeFee,
  encodePublicKey,
  encodeRecipient,
  encodeTimestamp,
  encodeType,
  encodeVendorField,
  RECIPIENT_LENGTH,
  VENDOR_FIELD_LENGTH,
} from '../codec.js';
import {
  ErrorCode,
  InvalidAddressError,
  MalformedHexError,
  MalformedKeyError,
  MissingFeeError,
  VendorFieldTooLongError,
} from '../errors.js';
import { FIXED_KEY, RECIPIENT } from './fixtures.js';

test('encodeType / encodeTimestamp: 1 byte and 4 bytes little-endian', () => {
  assert.equal(bytesToHex(encodeType(3)), '03');
  assert.equal(bytesToHex(encodeTimestamp(10000000)), '80969800');
  assert.throws(() => encodeType(256), RangeError);
});

test('encodePublicKey: raw 33 bytes', () => {
  assert.equal(bytesToHex(encodePublicKey(FIXED_KEY)), FIXED_KEY);
});

test('encodePublicKey: malformed hex or wrong length is MalformedKeyError', () => {
  assert.throws(() => encodePublicKey('zz' + FIXED_KEY.slice(2)), MalformedKeyError);
  assert.throws(() => encodePublicKey(FIXED_KEY.slice(2)), /expected 33 bytes, got 32/);
  assert.throws(
    () => encodePublicKey('02', 'requesterPublicKey'),
    (err: unknown) => err instanceof MalformedKeyError && err.code === ErrorCode.MalformedKey && /^requesterPublicKey:/.test(err.message),
  );
});

test('encodeRecipient: absent recipient is 21 zero bytes', () => {
  assert.deepEqual(encodeRecipient(), new Uint8Array(RECIPIENT_LENGTH));
  assert.deepEqual(encodeRecipient(''), new Uint8Array(RECIPIENT_LENGTH));
});

test('encodeRecipient: decodes version + hash', () => {
  const raw = encodeRecipient(RECIPIENT);
  assert.equal(raw.length, 21);
  assert.equal(raw[0], 0x19);
});

test('encodeRecipient: bad checksum, bad alphabet and wrong length are InvalidAddressError', () => {
  const corrupted = RECIPIENT.slice(0, -1) + (RECIPIENT.endsWith('2') ? '3' : '2');
  assert.throws(() => encodeRecipient(corrupted), InvalidAddressError);
  assert.throws(() => encodeRecipient('B0OIl'), InvalidAddressError);
  assert.throws(() => encodeRecipient(base58checkEncode(0x19, new Uint8Array(19))), /expected 21 bytes, got 20/);
});

test('encodeVendorField: absent is 64 zero bytes', () => {
  assert.deepEqual(encodeVendorField(), new Uint8Array(VENDOR_FIELD_LENGTH));
});

test('encodeVendorField: L bytes followed by 64-L zero bytes', () => {
  for (const len of [0, 1, 32, 63, 64]) {
    const out = encodeVendorField('ab'.repeat(len));
    assert.equal(out.length, 64);
    assert.equal(bytesToHex(out), 'ab'.repeat(len) + '00'.repeat(64 - len));
  }
});

test('encodeVendorField: more than 64 bytes is rejected', () => {
  assert.throws(() => encodeVendorField('ab'.repeat(65)), VendorFieldTooLongError);
});

test('encodeVendorField: invalid hex is MalformedHexError', () => {
  assert.throws(() => encodeVendorField('hello'), MalformedHexError);
  assert.throws(() => encodeVendorField('abc'), MalformedHexError);
});

test('encodeFee: unset fee is MissingFeeError', () => {
  assert.throws(() => encodeFee(undefined), MissingFeeError);
  assert.equal(bytesToHex(encodeFee(10000000n)), '8096980000000000');
});
