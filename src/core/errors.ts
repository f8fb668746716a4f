/**
 * Error types shared by the layout engine, the decoders and the catalogs.
 */

import type { AssetId } from './dependency';

/**
 * A binary record did not match the layout it was decoded with: a constant
 * mismatch, a read past the end of the buffer, or an absurd declared length.
 */
export class MalformedLayout extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at 0x${offset.toString(16)})`);
    this.name = 'MalformedLayout';
    this.offset = offset;
  }
}

/**
 * A catalog was asked to resolve an ID it does not know.
 */
export class UnknownAssetId extends Error {
  readonly assetId: AssetId;

  constructor(assetId: AssetId) {
    super(`Unknown asset id 0x${assetId.toString(16).toUpperCase()}`);
    this.name = 'UnknownAssetId';
    this.assetId = assetId;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
