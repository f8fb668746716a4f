/**
 * Dependency records: a (type tag, asset ID) pair naming one referenced asset.
 */

import { idByteSize } from './game';
import type { Game } from './game';

export type AssetId = bigint;

/** Four-character asset format code, e.g. "ANCS". */
export type AssetType = string;

export interface Dependency {
  readonly type: AssetType;
  readonly id: AssetId;
}

/** Opaque asset bytes plus their type tag, as handed out by a catalog. */
export interface RawAsset {
  readonly type: AssetType;
  readonly data: Uint8Array;
}

const FOURCC_RE = /^[\x20-\x7e]{4}$/;

export function isFourCC(value: string): boolean {
  return FOURCC_RE.test(value);
}

export function dependency(type: AssetType, id: AssetId): Dependency {
  return Object.freeze({ type, id });
}

/** Hex rendering padded to the game's ID width, e.g. 0x0000BEEF. */
export function formatAssetId(id: AssetId, game: Game): string {
  return `0x${id.toString(16).toUpperCase().padStart(idByteSize(game) * 2, '0')}`;
}

export function formatDependency(dep: Dependency, game: Game): string {
  return `${dep.type} ${formatAssetId(dep.id, game)}`;
}

/**
 * Wrap a generator function so the sequence can be iterated more than once.
 */
export function restartable<T>(produce: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: produce };
}
