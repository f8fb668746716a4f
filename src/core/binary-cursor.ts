/**
 * Big-endian read cursor over an asset payload.
 *
 * Every read checks the remaining length first and throws MalformedLayout
 * instead of letting Buffer raise a RangeError.
 */

import { MalformedLayout } from './errors';

export class BinaryCursor {
  public readonly data: Buffer;
  private _offset: number;

  constructor(data: Uint8Array, offset = 0) {
    this.data = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    this._offset = 0;
    this.seek(offset);
  }

  get offset(): number {
    return this._offset;
  }

  get length(): number {
    return this.data.length;
  }

  get remaining(): number {
    return this.data.length - this._offset;
  }

  /** Throw unless `size` more bytes can be read. */
  ensure(size: number, what: string): void {
    if (!Number.isInteger(size) || size < 0) {
      throw new MalformedLayout(`Invalid ${what} size ${size}`, this._offset);
    }
    if (size > this.remaining) {
      throw new MalformedLayout(
        `Truncated ${what}: need ${size} bytes, ${this.remaining} left`,
        this._offset,
      );
    }
  }

  // -- Positioning ----------------------------------------------------------

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.data.length) {
      throw new MalformedLayout(`Seek to ${offset} outside ${this.data.length}-byte buffer`, this._offset);
    }
    this._offset = offset;
  }

  skip(count: number): void {
    this.ensure(count, 'skip');
    this._offset += count;
  }

  /** Advance to the next multiple of `boundary`, measured from `origin`. */
  alignTo(boundary: number, origin = 0): void {
    if (!Number.isInteger(boundary) || boundary <= 0) {
      throw new MalformedLayout(`Invalid alignment ${boundary}`, this._offset);
    }
    const rel = this._offset - origin;
    const pad = (boundary - (rel % boundary)) % boundary;
    this.skip(pad);
  }

  /**
   * Split off the next `size` bytes as an independent cursor and move past them.
   */
  window(size: number): BinaryCursor {
    this.ensure(size, 'section');
    const sub = new BinaryCursor(this.data.subarray(this._offset, this._offset + size));
    this._offset += size;
    return sub;
  }

  // -- Fixed-width reads ----------------------------------------------------

  readU8(): number {
    this.ensure(1, 'u8');
    return this.data.readUInt8(this._offset++);
  }

  readI8(): number {
    this.ensure(1, 'i8');
    return this.data.readInt8(this._offset++);
  }

  readU16(): number {
    this.ensure(2, 'u16');
    const v = this.data.readUInt16BE(this._offset);
    this._offset += 2;
    return v;
  }

  readI16(): number {
    this.ensure(2, 'i16');
    const v = this.data.readInt16BE(this._offset);
    this._offset += 2;
    return v;
  }

  readU32(): number {
    this.ensure(4, 'u32');
    const v = this.data.readUInt32BE(this._offset);
    this._offset += 4;
    return v;
  }

  readI32(): number {
    this.ensure(4, 'i32');
    const v = this.data.readInt32BE(this._offset);
    this._offset += 4;
    return v;
  }

  readU64(): bigint {
    this.ensure(8, 'u64');
    const v = this.data.readBigUInt64BE(this._offset);
    this._offset += 8;
    return v;
  }

  readI64(): bigint {
    this.ensure(8, 'i64');
    const v = this.data.readBigInt64BE(this._offset);
    this._offset += 8;
    return v;
  }

  readF32(): number {
    this.ensure(4, 'f32');
    const v = this.data.readFloatBE(this._offset);
    this._offset += 4;
    return v;
  }

  // -- Byte strings ---------------------------------------------------------

  readBytes(count: number): Buffer {
    this.ensure(count, 'byte block');
    const out = this.data.subarray(this._offset, this._offset + count);
    this._offset += count;
    return out;
  }

  /** Null-terminated string; the terminator is consumed. */
  readCString(): string {
    const end = this.data.indexOf(0, this._offset);
    if (end < 0) {
      throw new MalformedLayout('Unterminated string', this._offset);
    }
    const s = this.data.toString('latin1', this._offset, end);
    this._offset = end + 1;
    return s;
  }
}
