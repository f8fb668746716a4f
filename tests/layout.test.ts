import { describe, expect, it } from 'vitest';
import { BinaryCursor } from '../src/core/binary-cursor';
import { MalformedLayout } from '../src/core/errors';
import { Game } from '../src/core/game';
import {
  align,
  array,
  assetId,
  beforeVersion,
  constant,
  cstring,
  f32,
  forGames,
  i16,
  i8,
  lengthString,
  magic,
  parseLayout,
  pointer,
  prefixedArray,
  rootContext,
  struct,
  switchOn,
  u16,
  u32,
  u8,
  when,
  withVersion,
  map,
  custom,
  lazy,
  nested,
} from '../src/core/layout';
import type { Layout } from '../src/core/layout';
import { ByteWriter } from './helpers/byte-writer';

describe('layout primitives', () => {
  it('decodes signed and float fields', () => {
    const data = new ByteWriter().u8(0xff).i16(-300).f32(-2).toBuffer();
    const value = parseLayout(struct({ a: i8, b: i16, c: f32 }), data, Game.Prime);
    expect(value).toEqual({ a: -1, b: -300, c: -2 });
  });

  it('reads asset IDs at the width of the target game', () => {
    const data = new ByteWriter().u64(0x0000000100000002n).toBuffer();
    expect(parseLayout(assetId, data, Game.Prime)).toBe(1n);
    expect(parseLayout(assetId, data, Game.Echoes)).toBe(1n);
    expect(parseLayout(assetId, data, Game.Corruption)).toBe(0x0000000100000002n);
  });

  it('reads length-framed strings', () => {
    const data = new ByteWriter().u8(3).ascii('abcdef').toBuffer();
    expect(parseLayout(lengthString(u8), data, Game.Prime)).toBe('abc');
  });

  it('rejects a constant mismatch', () => {
    const data = new ByteWriter().u32(3).toBuffer();
    expect(() => parseLayout(constant(u32, 2), data, Game.Prime)).toThrow(MalformedLayout);
    expect(() => parseLayout(magic('PAS4'), Buffer.from('PAS3'), Game.Prime)).toThrow('Expected ascii(4) PAS4, got PAS3');
  });
});

describe('struct', () => {
  const versioned = struct(
    {
      version: u16,
      a: u32,
      b: withVersion(2, u32),
      old: beforeVersion(2, u8),
      c: u8,
    },
    { versionField: 'version' },
  );

  it('leaves version-gated fields absent below the threshold', () => {
    const data = new ByteWriter().u16(1).u32(7).u8(5).u8(9).toBuffer();
    const value = parseLayout(versioned, data, Game.Prime);
    expect(value).toEqual({ version: 1, a: 7, b: undefined, old: 5, c: 9 });
    expect('b' in value).toBe(true);
  });

  it('decodes version-gated fields at the threshold', () => {
    const data = new ByteWriter().u16(2).u32(7).u32(8).u8(9).toBuffer();
    expect(parseLayout(versioned, data, Game.Prime)).toEqual({ version: 2, a: 7, b: 8, old: undefined, c: 9 });
  });

  it('passes the version down to nested structs', () => {
    const outer = struct(
      { version: u16, inner: struct({ x: withVersion(3, u8), y: u8 }) },
      { versionField: 'version' },
    );
    const data = new ByteWriter().u16(3).u8(1).u8(2).toBuffer();
    expect(parseLayout(outer, data, Game.Prime)).toEqual({ version: 3, inner: { x: 1, y: 2 } });
  });

  it('gates fields on the target game without consuming bytes', () => {
    const layout = struct({ echoesOnly: forGames([Game.Echoes], u16), tail: u8 });
    const data = new ByteWriter().u16(0x0102).u8(3).toBuffer();
    expect(parseLayout(layout, data, Game.Prime)).toEqual({ echoesOnly: undefined, tail: 1 });
    expect(parseLayout(layout, data, Game.Echoes)).toEqual({ echoesOnly: 0x0102, tail: 3 });
  });

  it('gates fields on earlier siblings', () => {
    const layout = struct({
      count: u8,
      extra: when((ctx) => ctx.scope.count === 2, u8),
    });
    expect(parseLayout(layout, Buffer.from([1, 9]), Game.Prime)).toEqual({ count: 1, extra: undefined });
    expect(parseLayout(layout, Buffer.from([2, 9]), Game.Prime)).toEqual({ count: 2, extra: 9 });
  });

  it('takes array counts from a sibling field', () => {
    const layout = struct({ n: u8, items: array('n', u16) });
    const data = new ByteWriter().u8(2).u16(10).u16(20).toBuffer();
    expect(parseLayout(layout, data, Game.Prime)).toEqual({ n: 2, items: [10, 20] });
  });

  it('reads at an absolute pointer without moving the cursor', () => {
    const layout = struct({ a: u8, p: pointer(4, u16), b: u8 });
    const data = Buffer.from([1, 2, 0, 0, 0xab, 0xcd]);
    expect(parseLayout(layout, data, Game.Prime)).toEqual({ a: 1, p: 0xabcd, b: 2 });
  });

  it('aligns to a boundary', () => {
    const layout = struct({ a: u8, _pad: align(4), b: u8 });
    const data = Buffer.from([1, 0, 0, 0, 2]);
    expect(parseLayout(layout, data, Game.Prime)).toEqual({ a: 1, _pad: null, b: 2 });
  });

  it('is reusable across decodes', () => {
    const a = new ByteWriter().u16(1).u32(1).u8(1).u8(1).toBuffer();
    const b = new ByteWriter().u16(2).u32(2).u32(2).u8(2).toBuffer();
    const first = parseLayout(versioned, a, Game.Prime);
    parseLayout(versioned, b, Game.Prime);
    expect(parseLayout(versioned, a, Game.Prime)).toEqual(first);
    expect(Object.isFrozen(versioned)).toBe(true);
  });
});

describe('prefixedArray', () => {
  it('decodes count-prefixed elements', () => {
    const data = new ByteWriter().u32(2).cstring('a').cstring('bc').toBuffer();
    expect(parseLayout(prefixedArray(u32, cstring), data, Game.Prime)).toEqual(['a', 'bc']);
  });

  it('rejects counts larger than the remaining bytes', () => {
    const data = new ByteWriter().u32(1000).u8(0).toBuffer();
    expect(() => parseLayout(prefixedArray(u32, u8), data, Game.Prime)).toThrow(
      'Element count 1000 exceeds 1 remaining bytes',
    );
  });

  it('rejects truncated elements', () => {
    const data = new ByteWriter().u32(2).u16(1).toBuffer();
    expect(() => parseLayout(prefixedArray(u32, u16), data, Game.Prime)).toThrow(MalformedLayout);
  });
});

describe('switchOn', () => {
  const shape = switchOn<string>(u8, {
    0: map(u8, (v) => `small ${v}`),
    1: map(u16, (v) => `large ${v}`),
  });

  it('dispatches on the tag', () => {
    expect(parseLayout(shape, Buffer.from([0, 7]), Game.Prime)).toBe('small 7');
    expect(parseLayout(shape, Buffer.from([1, 1, 0]), Game.Prime)).toBe('large 256');
  });

  it('rejects unknown tags', () => {
    expect(() => parseLayout(shape, Buffer.from([4, 0]), Game.Prime)).toThrow('Unknown u8 tag 4');
  });
});

describe('nested', () => {
  const chain: Layout<number> = switchOn<number>(u8, {
    0: custom('leaf', () => 0),
    1: map(
      nested(3, lazy(() => chain)),
      (n) => n + 1,
    ),
  });

  it('decodes recursion up to the depth limit', () => {
    expect(parseLayout(chain, Buffer.from([1, 1, 1, 0]), Game.Prime)).toBe(3);
  });

  it('throws MalformedLayout past the depth limit', () => {
    const run = (): number => parseLayout(chain, Buffer.from([1, 1, 1, 1, 0]), Game.Prime);
    expect(run).toThrow(MalformedLayout);
    expect(run).toThrow('Nesting deeper than 3 levels (at 0x4)');
  });
});

describe('cursor advancement', () => {
  it('advances by exactly the bytes consumed', () => {
    const cursor = new BinaryCursor(new ByteWriter().u16(1).u32(5).u8(6).u8(7).u8(0xee).toBuffer());
    const layout = struct({ version: u16, a: u32, b: withVersion(2, u32), c: u8, d: u8 }, { versionField: 'version' });
    layout.decode(cursor, rootContext(Game.Prime));
    expect(cursor.offset).toBe(8);
    expect(cursor.readU8()).toBe(0xee);
  });
});
