import test from 'node:test';
import assert from 'node:assert/strict';

import { ByteBuffer } from '../buffer.js';
import { bytesToHex } from '../bytes.js';

test('ByteBuffer: writes in order with fixed widths', () => {
  const b = new ByteBuffer();
  b.writeUint8(3).writeUint32LE(1).writeUint64LE(2n).writeBytes(Uint8Array.from([0xaa, 0xbb]));
  assert.equal(b.length, 1 + 4 + 8 + 2);
  assert.equal(bytesToHex(b.toBytes()), '03' + '01000000' + '0200000000000000' + 'aabb');
});

test('ByteBuffer: grows past its initial capacity', () => {
  const b = new ByteBuffer(2);
  b.writeBytes(new Uint8Array(5).fill(1));
  b.writeUint8(9);
  const out = b.toBytes();
  assert.equal(out.length, 6);
  assert.equal(out[5], 9);
});

test('ByteBuffer: toBytes returns a copy', () => {
  const b = new ByteBuffer();
  b.writeUint8(1);
  const first = b.toBytes();
  b.writeUint8(2);
  assert.deepEqual(first, Uint8Array.from([1]));
  assert.deepEqual(b.toBytes(), Uint8Array.from([1, 2]));
});

test('ByteBuffer: rejects out-of-range integers without writing', () => {
  const b = new ByteBuffer();
  assert.throws(() => b.writeUint8(256), RangeError);
  assert.throws(() => b.writeUint32LE(-1), RangeError);
  assert.equal(b.length, 0);
});
