/**
 * Loose asset directories
 *
 * A directory of extracted assets, one file per asset, named
 * `<hex id>.<TYPE>` (e.g. `1A2B3C4D.ANCS`). Files that do not follow the
 * pattern are skipped.
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { InMemoryCatalog } from './catalog';
import type { AssetId, AssetType } from './dependency';
import { isFourCC } from './dependency';
import { Game, idByteSize, isValidAssetId } from './game';
import { warn } from './logger';

export interface AssetFileName {
  id: AssetId;
  type: AssetType;
}

const NAME_RE = /^([0-9A-Fa-f]+)\.([^.]{4})$/;

/**
 * Parse `<hex id>.<TYPE>`; null if the name does not fit the game's ID width.
 */
export function parseAssetFileName(name: string, game: Game): AssetFileName | null {
  const m = NAME_RE.exec(name);
  if (!m) return null;
  const [, hex, type] = m;
  if (hex.length > idByteSize(game) * 2 || !isFourCC(type)) return null;
  const id = BigInt(`0x${hex}`);
  if (!isValidAssetId(game, id)) return null;
  return { id, type: type.toUpperCase() };
}

export function assetFileName(id: AssetId, type: AssetType, game: Game): string {
  return `${id.toString(16).toUpperCase().padStart(idByteSize(game) * 2, '0')}.${type}`;
}

/**
 * Read every asset file in `dir` into an in-memory catalog.
 */
export function loadAssetDirectory(dir: string, game: Game): InMemoryCatalog {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new Error(`Not a directory: ${dir}`);
  }

  const catalog = new InMemoryCatalog(game);
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const parsed = parseAssetFileName(entry.name, game);
    if (!parsed) {
      warn(`Skipping ${entry.name}: not an <id>.<TYPE> asset file`);
      continue;
    }
    catalog.add(parsed.id, parsed.type, readFileSync(join(dir, entry.name)));
  }
  return catalog;
}
