/**
 * Heuristic fallback scanner
 *
 * Treats the payload as a dense run of candidate IDs: every byte offset, not
 * just ID-aligned ones, is read as a big-endian ID of the game's width and
 * probed against the catalog. Over-reports by construction; never misses a
 * reference stored whole in the payload.
 */

import type { AssetCatalog } from './catalog';
import { restartable } from './dependency';
import type { AssetId, Dependency } from './dependency';
import { Game, idByteSize, isValidAssetId } from './game';

export interface Candidate {
  offset: number;
  id: AssetId;
}

export interface ScanOptions {
  containerContext?: boolean;
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Every window of the game's ID width, offsets 0 through length - width.
 */
export function* candidateIds(data: Uint8Array, game: Game): Generator<Candidate> {
  const buf = toBuffer(data);
  const width = idByteSize(game);
  for (let offset = 0; offset + width <= buf.length; offset++) {
    const id = width === 4 ? BigInt(buf.readUInt32BE(offset)) : buf.readBigUInt64BE(offset);
    yield { offset, id };
  }
}

/** Candidates the catalog accepts, with the offset they were found at. */
export function* matchingCandidates(data: Uint8Array, game: Game, catalog: AssetCatalog): Generator<Candidate> {
  for (const candidate of candidateIds(data, game)) {
    if (isValidAssetId(game, candidate.id) && catalog.isValid(candidate.id)) {
      yield candidate;
    }
  }
}

/**
 * Dependencies found by brute force. Probes never throw: unknown candidates
 * are filtered by isValid and expanded with missingOk.
 */
export function scanForDependencies(
  data: Uint8Array,
  game: Game,
  catalog: AssetCatalog,
  options: ScanOptions = {},
): Iterable<Dependency> {
  const query = { containerContext: options.containerContext ?? false, missingOk: true };
  return restartable(function* () {
    for (const candidate of matchingCandidates(data, game, catalog)) {
      yield* catalog.dependenciesFor(candidate.id, query);
    }
  });
}
