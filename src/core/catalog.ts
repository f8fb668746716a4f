/**
 * Asset catalog collaborator
 *
 * The decoders only ever see a catalog through AssetCatalog. InMemoryCatalog
 * is the reference implementation used by the CLI and the tests.
 */

import { dependency, isFourCC } from './dependency';
import type { AssetId, AssetType, Dependency, RawAsset } from './dependency';
import { UnknownAssetId } from './errors';
import { Game, isValidAssetId } from './game';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface DependencyQuery {
  /** The referencing asset is a level/container descriptor. */
  containerContext: boolean;
  /** Yield nothing for an unknown ID instead of throwing UnknownAssetId. */
  missingOk?: boolean;
}

export interface AssetCatalog {
  /** Throws UnknownAssetId when the ID is not in the catalog. */
  resolve(id: AssetId): RawAsset;
  /** Never throws; any integer may be probed. */
  isValid(id: AssetId): boolean;
  /** Records for one referenced ID. Invalid IDs yield nothing. */
  dependenciesFor(id: AssetId, query: DependencyQuery): Iterable<Dependency>;
}

// ---------------------------------------------------------------------------
// InMemoryCatalog
// ---------------------------------------------------------------------------

export class InMemoryCatalog implements AssetCatalog {
  public readonly game: Game;
  private readonly assets: Map<AssetId, RawAsset> = new Map();

  constructor(game: Game) {
    this.game = game;
  }

  get size(): number {
    return this.assets.size;
  }

  add(id: AssetId, type: AssetType, data: Uint8Array): this {
    if (!isFourCC(type)) {
      throw new Error(`Invalid asset type "${type}"`);
    }
    if (!isValidAssetId(this.game, id)) {
      throw new Error(`Asset id 0x${id.toString(16)} is not valid for this game`);
    }
    this.assets.set(id, { type, data });
    return this;
  }

  ids(): AssetId[] {
    return [...this.assets.keys()];
  }

  resolve(id: AssetId): RawAsset {
    const asset = this.assets.get(id);
    if (!asset) throw new UnknownAssetId(id);
    return asset;
  }

  isValid(id: AssetId): boolean {
    return isValidAssetId(this.game, id) && this.assets.has(id);
  }

  *dependenciesFor(id: AssetId, query: DependencyQuery): Iterable<Dependency> {
    if (!isValidAssetId(this.game, id)) return;
    const asset = this.assets.get(id);
    if (!asset) {
      if (query.missingOk) return;
      throw new UnknownAssetId(id);
    }
    yield dependency(asset.type, id);
  }
}
