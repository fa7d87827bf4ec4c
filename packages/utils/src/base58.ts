// packages/utils/src/base58.ts
// Base58 / Base58Check helpers (bitcoin alphabet, 4-byte sha256d checksum)

import { arraysEqual, bigIntToBytes, bytesToBigInt, concat } from './bytes.js';
import { sha256d } from './hash.js';

export const alphabet = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

function leadingCount<T>(items: ArrayLike<T>, zero: T): number {
  let count = 0;
  while (count < items.length && items[count] === zero) count++;
  return count;
}

export function base58encode(data: Uint8Array): string {
  let num = bytesToBigInt(data);
  let result = '';
  while (num > 0n) {
    const rem = Number(num % 58n);
    num = num / 58n;
    result = alphabet[rem] + result;
  }
  return '1'.repeat(leadingCount(data, 0)) + result;
}

export function base58decode(str: string): Uint8Array {
  let num = 0n;
  for (const char of str) {
    const idx = alphabet.indexOf(char);
    if (idx === -1) throw new Error(`Invalid base58 character "${char}"`);
    num = num * 58n + BigInt(idx);
  }

  const hexLen = num === 0n ? 0 : num.toString(16).length;
  const body = hexLen === 0 ? new Uint8Array() : bigIntToBytes(num, Math.ceil(hexLen / 2));
  return concat(new Uint8Array(leadingCount(str, '1')), body);
}

export function base58checkEncode(version: number, payload: Uint8Array): string {
  if (!Number.isInteger(version) || version < 0 || version > 0xff) {
    throw new RangeError(`base58checkEncode: version ${version} is not a byte`);
  }
  const data = concat(new Uint8Array([version]), payload);
  const checksum = sha256d(data).slice(0, 4);
  return base58encode(concat(data, checksum));
}

export function base58checkDecode(str: string): { version: number; payload: Uint8Array } {
  const bytes = base58decode(str);
  if (bytes.length < 5) throw new Error('Base58Check string too short');

  const data = bytes.slice(0, -4);
  const checksum = bytes.slice(-4);
  const computed = sha256d(data).slice(0, 4);
  if (!arraysEqual(checksum, computed)) throw new Error('Checksum mismatch');

  return { version: data[0], payload: data.slice(1) };
}
