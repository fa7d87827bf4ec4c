// packages/utils/src/buffer.ts
import { uint32le, uint64le } from './bytes.js';

/**
 * Append-only byte writer. Grows by doubling; `toBytes()` hands out a copy so
 * later writes never alter a value already returned.
 */
export class ByteBuffer {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  private ensure(extra: number): void {
    const need = this.len + extra;
    if (need <= this.buf.length) return;

    let cap = this.buf.length;
    while (cap < need) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }

  writeUint8(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new RangeError(`writeUint8: ${value} is not a byte`);
    }
    this.ensure(1);
    this.buf[this.len++] = value;
    return this;
  }

  writeUint32LE(value: number): this {
    return this.writeBytes(uint32le(value));
  }

  writeUint64LE(value: number | bigint): this {
    return this.writeBytes(uint64le(value));
  }

  writeBytes(bytes: Uint8Array): this {
    if (!(bytes instanceof Uint8Array)) throw new TypeError('writeBytes: expected Uint8Array');
    this.ensure(bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
    return this;
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}
