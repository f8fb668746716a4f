/**
 * Layout descriptors
 *
 * Declarative descriptions of big-endian binary records. A descriptor is a
 * frozen { kind, decode } pair built once at module load and reused for every
 * decode; all per-call state lives in the cursor and the LayoutContext.
 *
 * Conditional fields decode to `undefined` when their gate is closed, so an
 * absent field is never confused with a zero value.
 */

import { BinaryCursor } from './binary-cursor';
import type { AssetId } from './dependency';
import { MalformedLayout } from './errors';
import { Game, idByteSize } from './game';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fields of the enclosing struct decoded so far. */
export type Scope = Readonly<Record<string, unknown>>;

export interface LayoutContext {
  readonly game: Game;
  /** Format version in effect; set by a struct's `versionField`. */
  readonly version: number;
  readonly scope: Scope;
  /** Levels of `nested` entered so far. */
  readonly depth: number;
}

export interface Layout<T> {
  readonly kind: string;
  decode(cursor: BinaryCursor, ctx: LayoutContext): T;
}

export type LayoutValue<L> = L extends Layout<infer T> ? T : never;

export type FieldMap = Readonly<Record<string, Layout<unknown>>>;

export type StructValue<F extends FieldMap> = { readonly [K in keyof F]: LayoutValue<F[K]> };

/** Element count: a constant, the name of an already decoded sibling, or a function of the context. */
export type Count = number | string | ((ctx: LayoutContext) => number);

const EMPTY_SCOPE: Scope = Object.freeze({});

// ---------------------------------------------------------------------------
// Construction helpers
// ---------------------------------------------------------------------------

/**
 * Build a descriptor from a decode function. Formats with jumps the
 * combinators cannot express use this directly.
 */
export function custom<T>(kind: string, decode: (cursor: BinaryCursor, ctx: LayoutContext) => T): Layout<T> {
  return Object.freeze({ kind, decode });
}

export function rootContext(game: Game, version = 0): LayoutContext {
  return { game, version, scope: EMPTY_SCOPE, depth: 0 };
}

/** Decode `layout` from the start of `data`. */
export function parseLayout<T>(layout: Layout<T>, data: Uint8Array, game: Game, version = 0): T {
  return layout.decode(new BinaryCursor(data), rootContext(game, version));
}

function resolveCount(count: Count, cursor: BinaryCursor, ctx: LayoutContext): number {
  let n: unknown;
  if (typeof count === 'number') n = count;
  else if (typeof count === 'string') n = ctx.scope[count];
  else n = count(ctx);
  return checkCount(n, cursor);
}

/**
 * Validate a declared element count against the bytes left in `cursor`.
 */
export function checkCount(n: unknown, cursor: BinaryCursor): number {
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) {
    throw new MalformedLayout(`Invalid element count ${String(n)}`, cursor.offset);
  }
  // Every element occupies at least one byte.
  if (n > cursor.remaining) {
    throw new MalformedLayout(`Element count ${n} exceeds ${cursor.remaining} remaining bytes`, cursor.offset);
  }
  return n;
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const u8 = custom('u8', (c) => c.readU8());
export const u16 = custom('u16', (c) => c.readU16());
export const u32 = custom('u32', (c) => c.readU32());
export const u64 = custom('u64', (c) => c.readU64());
export const i8 = custom('i8', (c) => c.readI8());
export const i16 = custom('i16', (c) => c.readI16());
export const i32 = custom('i32', (c) => c.readI32());
export const i64 = custom('i64', (c) => c.readI64());
export const f32 = custom('f32', (c) => c.readF32());
export const bool = custom('bool', (c) => c.readU8() !== 0);
export const cstring = custom('cstring', (c) => c.readCString());
export const fourcc = custom('fourcc', (c) => c.readBytes(4).toString('latin1'));

/** Asset ID at the width of the target game. */
export const assetId: Layout<AssetId> = custom('assetId', (c, ctx) =>
  idByteSize(ctx.game) === 4 ? BigInt(c.readU32()) : c.readU64(),
);

/** Asset ID for formats that only ever shipped with 32-bit IDs. */
export const assetId32: Layout<AssetId> = custom('assetId32', (c) => BigInt(c.readU32()));

export function bytes(size: number): Layout<Buffer> {
  return custom(`bytes(${size})`, (c) => c.readBytes(size));
}

/** String framed by a leading length field. */
export function lengthString(length: Layout<number>): Layout<string> {
  return custom(`lengthString(${length.kind})`, (c, ctx) => {
    const n = length.decode(c, ctx);
    return c.readBytes(n).toString('latin1');
  });
}

/** Require the decoded value to equal `expected`. */
export function constant<T extends number | bigint | string>(layout: Layout<T>, expected: T): Layout<T> {
  return custom(`const(${String(expected)})`, (c, ctx) => {
    const start = c.offset;
    const value = layout.decode(c, ctx);
    if (value !== expected) {
      throw new MalformedLayout(`Expected ${layout.kind} ${String(expected)}, got ${String(value)}`, start);
    }
    return value;
  });
}

/** ASCII magic of the same length as `text`. */
export function magic(text: string): Layout<string> {
  const raw = custom(`ascii(${text.length})`, (c) => c.readBytes(text.length).toString('latin1'));
  return constant(raw, text);
}

// ---------------------------------------------------------------------------
// Composites
// ---------------------------------------------------------------------------

function isStructValue<F extends FieldMap>(value: unknown, fields: F): value is StructValue<F> {
  return typeof value === 'object' && value !== null && Object.keys(fields).every((name) => name in value);
}

export interface StructOptions<F extends FieldMap> {
  /** Field whose decoded value becomes the format version for the fields after it. */
  versionField?: keyof F & string;
}

export function struct<F extends FieldMap>(fields: F, options: StructOptions<F> = {}): Layout<StructValue<F>> {
  const entries = Object.entries(fields);
  return custom('struct', (c, ctx) => {
    const out: Record<string, unknown> = {};
    let inner: LayoutContext = { ...ctx, scope: out };
    for (const [name, field] of entries) {
      const value = field.decode(c, inner);
      out[name] = value;
      if (name === options.versionField) {
        if (typeof value !== 'number') {
          throw new MalformedLayout(`Version field ${name} is not numeric`, c.offset);
        }
        inner = { ...inner, version: value };
      }
    }
    if (!isStructValue(out, fields)) {
      throw new MalformedLayout('Struct decode left fields unset', c.offset);
    }
    return out;
  });
}

export function array<T>(count: Count, element: Layout<T>): Layout<T[]> {
  return custom(`array(${element.kind})`, (c, ctx) => {
    const n = resolveCount(count, c, ctx);
    const out: T[] = [];
    for (let i = 0; i < n; i++) {
      out.push(element.decode(c, ctx));
    }
    return out;
  });
}

/** Leading count field followed by that many elements. */
export function prefixedArray<T>(count: Layout<number>, element: Layout<T>): Layout<T[]> {
  return custom(`prefixedArray(${element.kind})`, (c, ctx) => {
    const n = resolveCount(count.decode(c, ctx), c, ctx);
    const out: T[] = [];
    for (let i = 0; i < n; i++) {
      out.push(element.decode(c, ctx));
    }
    return out;
  });
}

export function map<A, B>(layout: Layout<A>, fn: (value: A, ctx: LayoutContext) => B): Layout<B> {
  return custom(layout.kind, (c, ctx) => fn(layout.decode(c, ctx), ctx));
}

/** Pick a case layout by a leading numeric tag. */
export function switchOn<T>(tag: Layout<number>, cases: Readonly<Record<number, Layout<T>>>): Layout<T> {
  return custom(`switch(${tag.kind})`, (c, ctx) => {
    const start = c.offset;
    const t = tag.decode(c, ctx);
    const branch: Layout<T> | undefined = cases[t];
    if (branch === undefined) {
      throw new MalformedLayout(`Unknown ${tag.kind} tag ${t}`, start);
    }
    return branch.decode(c, ctx);
  });
}

/**
 * One level of a recursive layout. Throws once `maxDepth` levels are open,
 * before the call stack runs out.
 */
export function nested<T>(maxDepth: number, layout: Layout<T>): Layout<T> {
  return custom(`nested(${maxDepth})`, (c, ctx) => {
    if (ctx.depth >= maxDepth) {
      throw new MalformedLayout(`Nesting deeper than ${maxDepth} levels`, c.offset);
    }
    return layout.decode(c, { ...ctx, depth: ctx.depth + 1 });
  });
}

/** Defer to a descriptor defined later, for recursive layouts. */
export function lazy<T>(thunk: () => Layout<T>): Layout<T> {
  return custom('lazy', (c, ctx) => thunk().decode(c, ctx));
}

// ---------------------------------------------------------------------------
// Conditional fields
// ---------------------------------------------------------------------------

export function withVersion<T>(min: number, layout: Layout<T>): Layout<T | undefined> {
  return custom(`withVersion(${min})`, (c, ctx) => (ctx.version >= min ? layout.decode(c, ctx) : undefined));
}

export function beforeVersion<T>(max: number, layout: Layout<T>): Layout<T | undefined> {
  return custom(`beforeVersion(${max})`, (c, ctx) => (ctx.version < max ? layout.decode(c, ctx) : undefined));
}

export function forGames<T>(games: readonly Game[], layout: Layout<T>): Layout<T | undefined> {
  return custom(`forGames(${games.join(',')})`, (c, ctx) =>
    games.includes(ctx.game) ? layout.decode(c, ctx) : undefined,
  );
}

export function when<T>(predicate: (ctx: LayoutContext) => boolean, layout: Layout<T>): Layout<T | undefined> {
  return custom('when', (c, ctx) => (predicate(ctx) ? layout.decode(c, ctx) : undefined));
}

// ---------------------------------------------------------------------------
// Positioning
// ---------------------------------------------------------------------------

export function skip(size: number): Layout<null> {
  return custom(`skip(${size})`, (c) => {
    c.skip(size);
    return null;
  });
}

export function seekTo(offset: number): Layout<null> {
  return custom(`seek(0x${offset.toString(16)})`, (c) => {
    c.seek(offset);
    return null;
  });
}

/** Pad forward to the next multiple of `boundary` measured from `origin`. */
export function align(boundary: number, origin = 0): Layout<null> {
  return custom(`align(${boundary})`, (c) => {
    c.alignTo(boundary, origin);
    return null;
  });
}

/** Read at an absolute offset without moving the cursor. */
export function pointer<T>(offset: number, layout: Layout<T>): Layout<T> {
  return custom(`pointer(0x${offset.toString(16)})`, (c, ctx) => {
    const saved = c.offset;
    c.seek(offset);
    const value = layout.decode(c, ctx);
    c.seek(saved);
    return value;
  });
}
