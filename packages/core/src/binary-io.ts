/**
 * aeropose — Little-endian record reader/writer
 *
 * Thin cursor over DataView. 64-bit unsigned values are exchanged as
 * bigint; `u64Number` narrows them for counts and identifiers.
 */

import { MalformedInputError } from './errors.js';

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export class BinaryWriter {
  private buffer = new Uint8Array(1024);
  private view = new DataView(this.buffer.buffer);
  private offset = 0;

  private reserve(bytes: number): number {
    const at = this.offset;
    const needed = at + bytes;
    if (needed > this.buffer.length) {
      let size = this.buffer.length * 2;
      while (size < needed) size *= 2;
      const grown = new Uint8Array(size);
      grown.set(this.buffer.subarray(0, at));
      this.buffer = grown;
      this.view = new DataView(grown.buffer);
    }
    this.offset = needed;
    return at;
  }

  u8(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new MalformedInputError(`Value ${value} does not fit in u8`);
    }
    this.view.setUint8(this.reserve(1), value);
    return this;
  }

  u32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
      throw new MalformedInputError(`Value ${value} does not fit in u32`);
    }
    this.view.setUint32(this.reserve(4), value, true);
    return this;
  }

  i32(value: number): this {
    if (!Number.isInteger(value) || value < -0x8000_0000 || value > 0x7fff_ffff) {
      throw new MalformedInputError(`Value ${value} does not fit in i32`);
    }
    this.view.setInt32(this.reserve(4), value, true);
    return this;
  }

  u64(value: number | bigint): this {
    if (typeof value === 'number' && (!Number.isSafeInteger(value) || value < 0)) {
      throw new MalformedInputError(`Value ${value} does not fit in u64`);
    }
    this.view.setBigUint64(this.reserve(8), BigInt(value), true);
    return this;
  }

  f64(value: number): this {
    this.view.setFloat64(this.reserve(8), value, true);
    return this;
  }

  /** UTF-8 bytes followed by a NUL. */
  cstring(value: string): this {
    if (value.includes('\0')) {
      throw new MalformedInputError(`String "${value}" contains a NUL character`);
    }
    const bytes = new TextEncoder().encode(value);
    this.buffer.set(bytes, this.reserve(bytes.length + 1));
    this.view.setUint8(this.offset - 1, 0);
    return this;
  }

  /** Copy of the bytes written so far. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}

export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly source = '<memory>',
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  private take(bytes: number, what: string): number {
    if (this.remaining < bytes) {
      throw new MalformedInputError(
        `Unexpected end of data reading ${what} at byte ${this.offset}`,
        this.source,
      );
    }
    const at = this.offset;
    this.offset += bytes;
    return at;
  }

  u8(what = 'u8'): number {
    return this.view.getUint8(this.take(1, what));
  }

  u32(what = 'u32'): number {
    return this.view.getUint32(this.take(4, what), true);
  }

  i32(what = 'i32'): number {
    return this.view.getInt32(this.take(4, what), true);
  }

  u64(what = 'u64'): bigint {
    return this.view.getBigUint64(this.take(8, what), true);
  }

  u64Number(what = 'u64'): number {
    return this.toSafeNumber(this.u64(what), what);
  }

  /** Reject u64 values a number cannot hold exactly. */
  toSafeNumber(value: bigint, what = 'u64'): number {
    if (value > MAX_SAFE) {
      throw new MalformedInputError(`${what} ${value} exceeds the safe integer range`, this.source);
    }
    return Number(value);
  }

  f64(what = 'f64'): number {
    return this.view.getFloat64(this.take(8, what), true);
  }

  cstring(what = 'string'): string {
    const end = this.bytes.indexOf(0, this.offset);
    if (end < 0) {
      throw new MalformedInputError(`Unterminated ${what} at byte ${this.offset}`, this.source);
    }
    const text = new TextDecoder('utf-8').decode(this.bytes.subarray(this.offset, end));
    this.offset = end + 1;
    return text;
  }
}
