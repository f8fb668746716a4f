/**
 * Target game variants
 *
 * Each supported engine release fixes the asset ID width and decides which
 * game-conditional fields a layout contains.
 */

import type { AssetId } from './dependency';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum Game {
  Prime = 1,
  Echoes = 2,
  Corruption = 3,
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const GAME_NAMES: Record<Game, string> = {
  [Game.Prime]: 'prime',
  [Game.Echoes]: 'echoes',
  [Game.Corruption]: 'corruption',
};

const MAX_ID_32 = 0xffffffffn;
const MAX_ID_64 = 0xffffffffffffffffn;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function gameName(game: Game): string {
  return GAME_NAMES[game];
}

export function parseGame(name: string): Game | null {
  const wanted = name.trim().toLowerCase();
  for (const game of [Game.Prime, Game.Echoes, Game.Corruption]) {
    if (GAME_NAMES[game] === wanted) return game;
  }
  return null;
}

export function usesAssetId32(game: Game): boolean {
  return game <= Game.Echoes;
}

/** Size in bytes of one asset ID for the game. */
export function idByteSize(game: Game): 4 | 8 {
  return usesAssetId32(game) ? 4 : 8;
}

/** The all-ones ID the engine uses for "no asset". */
export function invalidAssetId(game: Game): AssetId {
  return usesAssetId32(game) ? MAX_ID_32 : MAX_ID_64;
}

/**
 * Plausibility check applied before any ID is reported: non-null, not the
 * "no asset" sentinel, and representable in the game's ID width.
 */
export function isValidAssetId(game: Game, id: AssetId): boolean {
  return id > 0n && id < invalidAssetId(game);
}

/**
 * Character index of the default suit inside the player's ANCS.
 */
export function playerActorCharacterIndex(game: Game): number {
  return game === Game.Prime ? 5 : 3;
}
