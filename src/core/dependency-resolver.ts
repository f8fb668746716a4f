/**
 * Dispatch layer
 *
 * Start -> structured decoder (if registered) -> done, or on a violated
 * assumption -> heuristic scan -> done. A structured result is never merged
 * with a heuristic one.
 */

import type { AssetCatalog } from './catalog';
import type { Dependency, RawAsset } from './dependency';
import type { DecodeContext } from './decoder';
import { defaultRegistry } from './decoder-registry';
import type { DecoderRegistry } from './decoder-registry';
import { gameName } from './game';
import type { Game } from './game';
import { scanForDependencies } from './heuristic-scanner';
import { debug } from './logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** The asset is a level/container descriptor referencing other containers. */
  containerContext?: boolean;
  /** Walk only the player's default character of an ANCS. */
  playerActor?: boolean;
  registry?: DecoderRegistry;
}

export type DecodePath = 'structured' | 'heuristic';

export interface DecodePlan {
  path: DecodePath;
  /** Why the structured decoder was skipped or abandoned. */
  reason: string | null;
  dependencies: Iterable<Dependency>;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Choose the decode path for one asset and return its lazy dependency sequence.
 */
export function plan(asset: RawAsset, game: Game, catalog: AssetCatalog, options: ResolveOptions = {}): DecodePlan {
  const registry = options.registry ?? defaultRegistry;
  const ctx: DecodeContext = {
    game,
    catalog,
    containerContext: options.containerContext ?? false,
    playerActor: options.playerActor ?? false,
  };

  let reason: string;
  const decoder = registry.get(asset.type);
  if (decoder) {
    const result = decoder.decode(asset.data, ctx);
    if (result.ok) {
      return { path: 'structured', reason: null, dependencies: result.dependencies };
    }
    reason = result.reason;
    debug(`${asset.type} (${gameName(game)}): structured decode abandoned, scanning: ${reason}`);
  } else {
    reason = `no structured decoder for ${asset.type}`;
  }

  return {
    path: 'heuristic',
    reason,
    dependencies: scanForDependencies(asset.data, game, catalog, { containerContext: ctx.containerContext }),
  };
}

/** Direct (one-hop) dependencies of `asset`. */
export function decode(
  asset: RawAsset,
  game: Game,
  catalog: AssetCatalog,
  options: ResolveOptions = {},
): Iterable<Dependency> {
  return plan(asset, game, catalog, options).dependencies;
}
