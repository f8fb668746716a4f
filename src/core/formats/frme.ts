/**
 * FRME: GUI frame. Only the leading dependency table is decoded.
 *
 * Unlike the other formats, a declared dependency the catalog does not know
 * sends the asset to the heuristic scanner instead of failing the lookup.
 */

import { layoutDecoder, references } from '../decoder';
import { isValidAssetId } from '../game';
import { assetId, prefixedArray, struct, u32 } from '../layout';

export const frme = struct({
  version: u32,
  dependencies: prefixedArray(u32, assetId),
});

export const frmeDecoder = layoutDecoder({
  type: 'FRME',
  description: 'GUI frame',
  layout: frme,
  check(value, ctx) {
    const missing = value.dependencies.find((id) => isValidAssetId(ctx.game, id) && !ctx.catalog.isValid(id));
    return missing === undefined ? null : `FRME references unknown asset 0x${missing.toString(16).toUpperCase()}`;
  },
  *dependencies(value, ctx) {
    yield* references(value.dependencies, ctx);
  },
});
