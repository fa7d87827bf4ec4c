// packages/utils/src/bytes.ts
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/utils.js';

const HEX_RE = /^[0-9a-fA-F]*$/;

/** Convert bytes to bigint (big-endian). */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  return bytesToNumberBE(bytes);
}

/** Convert bigint to fixed-length bytes (big-endian). */
export function bigIntToBytes(big: bigint, len: number): Uint8Array {
  return numberToBytesBE(big, len);
}

/** Strict hex decode. Accepts an optional 0x prefix, rejects odd length and non-hex characters. */
export function hexToBytes(hex: string): Uint8Array {
  if (typeof hex !== 'string') {
    throw new TypeError(`hexToBytes expected string, got ${typeof hex}`);
  }

  const h = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (h.length % 2 !== 0) throw new TypeError('hexToBytes: hex length must be even');
  if (!HEX_RE.test(h)) throw new TypeError('hexToBytes: invalid hex character');

  const out = new Uint8Array(h.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = Number.parseInt(h.slice(i * 2, i * 2 + 2), 16);
  return out;
}

export function bytesToHex(bytes: Uint8Array): string {
  let s = '';
  for (const b of bytes) s += b.toString(16).padStart(2, '0');
  return s;
}

export function utf8ToBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Concatenate Uint8Array chunks. */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const a of arrays) {
    if (!(a instanceof Uint8Array)) throw new TypeError('concat: all chunks must be Uint8Array');
    total += a.length;
  }

  const res = new Uint8Array(total);
  let off = 0;
  for (const a of arrays) {
    res.set(a, off);
    off += a.length;
  }
  return res;
}

export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

const U32_MAX = 0xffffffff;
const U64_MAX = (1n << 64n) - 1n;

export function uint32le(num: number): Uint8Array {
  if (!Number.isInteger(num) || num < 0 || num > U32_MAX) {
    throw new RangeError(`uint32le: ${num} is not an unsigned 32-bit integer`);
  }
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, num, true);
  return buf;
}

export function uint64le(num: number | bigint): Uint8Array {
  if (typeof num === 'number' && !Number.isSafeInteger(num)) {
    throw new RangeError(`uint64le: ${num} is not a safe integer`);
  }
  const n = BigInt(num);
  if (n < 0n || n > U64_MAX) throw new RangeError(`uint64le: ${n} is not an unsigned 64-bit integer`);

  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, n, true);
  return buf;
}
