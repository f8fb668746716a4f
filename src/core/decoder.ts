/**
 * Structured decoder contract
 *
 * A structured decoder parses the whole asset eagerly and reports either a
 * lazy, restartable dependency sequence or the reason its assumptions about
 * the layout did not hold. MalformedLayout never crosses this boundary.
 */

import type { AssetCatalog } from './catalog';
import { restartable } from './dependency';
import type { AssetId, AssetType, Dependency } from './dependency';
import { MalformedLayout } from './errors';
import { Game, isValidAssetId } from './game';
import { parseLayout } from './layout';
import type { Layout } from './layout';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DecodeContext {
  readonly game: Game;
  readonly catalog: AssetCatalog;
  /** Propagated into catalog validity judgments. */
  readonly containerContext: boolean;
  /** Restrict ANCS to the player's default character. */
  readonly playerActor: boolean;
}

export type DecodeResult =
  | { readonly ok: true; readonly dependencies: Iterable<Dependency> }
  | { readonly ok: false; readonly reason: string };

export interface StructuredDecoder {
  readonly type: AssetType;
  readonly description: string;
  decode(data: Uint8Array, ctx: DecodeContext): DecodeResult;
}

export interface LayoutDecoderOptions<T> {
  type: AssetType;
  description: string;
  layout: Layout<T>;
  /** Reason the game cannot carry this layout, or null. */
  supports?: (game: Game) => string | null;
  /** Post-parse assumption checks; return a reason to fall back. */
  check?: (value: T, ctx: DecodeContext) => string | null;
  dependencies: (value: T, ctx: DecodeContext) => Iterator<Dependency>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function violated(reason: string): DecodeResult {
  return { ok: false, reason };
}

/**
 * Records for each referenced ID, skipping absent and implausible ones.
 * An ID the catalog does not know surfaces as UnknownAssetId.
 */
export function* references(ids: Iterable<AssetId | undefined>, ctx: DecodeContext): Generator<Dependency> {
  for (const id of ids) {
    if (id === undefined || !isValidAssetId(ctx.game, id)) continue;
    yield* ctx.catalog.dependenciesFor(id, { containerContext: ctx.containerContext });
  }
}

/**
 * Build a StructuredDecoder from a layout, optional assumption checks and a
 * dependency walk over the decoded value.
 */
export function layoutDecoder<T>(options: LayoutDecoderOptions<T>): StructuredDecoder {
  return {
    type: options.type,
    description: options.description,
    decode(data: Uint8Array, ctx: DecodeContext): DecodeResult {
      const unsupported = options.supports?.(ctx.game) ?? null;
      if (unsupported) return violated(unsupported);

      let value: T;
      try {
        value = parseLayout(options.layout, data, ctx.game);
      } catch (err) {
        if (err instanceof MalformedLayout) return violated(err.message);
        throw err;
      }

      const problem = options.check?.(value, ctx) ?? null;
      if (problem) return violated(problem);

      return { ok: true, dependencies: restartable(() => options.dependencies(value, ctx)) };
    },
  };
}
