/**
 * HINT: hint system definitions.
 *
 *   0x00BADBAD, version u32, count-prefixed hints. Each hint has a popup
 *   string table and count-prefixed location records (world, area, index,
 *   map text string table).
 */

import { dependency } from '../dependency';
import { layoutDecoder, references } from '../decoder';
import { isValidAssetId } from '../game';
import { assetId, constant, cstring, f32, prefixedArray, struct, u32 } from '../layout';
import type { LayoutValue } from '../layout';

const location = struct({
  worldId: assetId,
  areaId: assetId,
  index: u32,
  mapTextId: assetId,
});

const hintEntry = struct({
  name: cstring,
  immediateTime: f32,
  normalTime: f32,
  popupTextId: assetId,
  textTime: f32,
  locations: prefixedArray(u32, location),
});

export const hint = struct({
  magic: constant(u32, 0x00badbad),
  version: u32,
  hints: prefixedArray(u32, hintEntry),
});

export type Hint = LayoutValue<typeof hint>;

export const hintDecoder = layoutDecoder({
  type: 'HINT',
  description: 'Hint definitions',
  layout: hint,
  *dependencies(value, ctx) {
    for (const h of value.hints) {
      yield* references([h.popupTextId], ctx);
      for (const loc of h.locations) {
        yield* references([loc.mapTextId], ctx);
        // World and area are reported as-is, never expanded through the catalog.
        if (!ctx.containerContext) {
          if (isValidAssetId(ctx.game, loc.worldId)) yield dependency('MLVL', loc.worldId);
          if (isValidAssetId(ctx.game, loc.areaId)) yield dependency('MREA', loc.areaId);
        }
      }
    }
  },
});
