import { describe, expect, it } from 'vitest';
import { BinaryCursor } from '../src/core/binary-cursor';
import { MalformedLayout } from '../src/core/errors';
import { ByteWriter } from './helpers/byte-writer';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('BinaryCursor', () => {
  it('reads big-endian values and advances', () => {
    const data = new ByteWriter().u8(0xfe).u16(0x1234).u32(0xdeadbeef).i32(-2).u64(0x0102030405060708n).f32(1.5).toBuffer();
    const c = new BinaryCursor(data);
    expect(c.readU8()).toBe(0xfe);
    expect(c.readU16()).toBe(0x1234);
    expect(c.readU32()).toBe(0xdeadbeef);
    expect(c.readI32()).toBe(-2);
    expect(c.readU64()).toBe(0x0102030405060708n);
    expect(c.readF32()).toBe(1.5);
    expect(c.remaining).toBe(0);
  });

  it('accepts a plain Uint8Array view', () => {
    const backing = new Uint8Array([9, 9, 0x00, 0x2a]);
    const c = new BinaryCursor(backing.subarray(2));
    expect(c.length).toBe(2);
    expect(c.readU16()).toBe(42);
  });

  it('throws MalformedLayout on a truncated read', () => {
    const c = new BinaryCursor(Buffer.from([0, 1, 2]));
    c.readU8();
    const err = thrown(() => c.readU32());
    expect(err).toBeInstanceOf(MalformedLayout);
    expect(err).toMatchObject({ offset: 1, message: 'Truncated u32: need 4 bytes, 2 left (at 0x1)' });
    expect(c.offset).toBe(1);
  });

  it('reads null-terminated strings and rejects unterminated ones', () => {
    const c = new BinaryCursor(new ByteWriter().cstring('idle').ascii('run').toBuffer());
    expect(c.readCString()).toBe('idle');
    expect(c.offset).toBe(5);
    expect(() => c.readCString()).toThrow('Unterminated string');
  });

  it('aligns relative to an origin', () => {
    const c = new BinaryCursor(Buffer.alloc(16), 3);
    c.alignTo(4);
    expect(c.offset).toBe(4);
    c.alignTo(4);
    expect(c.offset).toBe(4);
    c.seek(3);
    c.alignTo(4, 2);
    expect(c.offset).toBe(6);
  });

  it('rejects seeks outside the buffer', () => {
    const c = new BinaryCursor(Buffer.alloc(4));
    expect(() => c.seek(5)).toThrow(MalformedLayout);
    c.seek(4);
    expect(c.remaining).toBe(0);
  });

  it('splits off bounded windows', () => {
    const c = new BinaryCursor(Buffer.from([1, 2, 3, 4, 5]));
    const w = c.window(2);
    expect(c.offset).toBe(2);
    expect(w.readU16()).toBe(0x0102);
    expect(() => w.readU8()).toThrow(MalformedLayout);
    expect(() => c.window(4)).toThrow(MalformedLayout);
  });
});
