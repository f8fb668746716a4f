/**
 * CMDL: static model. Only the material sets are decoded.
 *
 *   0xDEADBABE, version u32, flags u32, AABox,
 *   dataSectionCount u32, materialSetCount u32, dataSectionCount × u32 sizes,
 *   padding to 32 bytes, then the data sections in order. The first
 *   materialSetCount sections each start with a count-prefixed texture ID list.
 */

import { layoutDecoder, references } from '../decoder';
import { MalformedLayout } from '../errors';
import { usesAssetId32 } from '../game';
import { align, array, assetId32, constant, custom, prefixedArray, struct, u32 } from '../layout';
import type { Layout } from '../layout';
import type { AssetId } from '../dependency';
import { aabox } from './common';

const header = struct({
  magic: constant(u32, 0xdeadbabe),
  version: u32,
  flags: u32,
  bounds: aabox,
  dataSectionCount: u32,
  materialSetCount: u32,
  dataSectionSizes: array('dataSectionCount', u32),
  _align: align(32),
});

const textureList = prefixedArray(u32, assetId32);

export interface Cmdl {
  version: number;
  materialSets: AssetId[][];
}

export const cmdl: Layout<Cmdl> = custom('cmdl', (c, ctx) => {
  const h = header.decode(c, ctx);
  if (h.materialSetCount > h.dataSectionCount) {
    throw new MalformedLayout(
      `${h.materialSetCount} material sets but only ${h.dataSectionCount} data sections`,
      c.offset,
    );
  }
  const materialSets: AssetId[][] = [];
  for (let i = 0; i < h.materialSetCount; i++) {
    const section = c.window(h.dataSectionSizes[i]);
    materialSets.push(textureList.decode(section, ctx));
  }
  return { version: h.version, materialSets };
});

export const cmdlDecoder = layoutDecoder({
  type: 'CMDL',
  description: 'Static model',
  layout: cmdl,
  supports: (game) => (usesAssetId32(game) ? null : 'CMDL material layout differs with 64-bit asset IDs'),
  *dependencies(value, ctx) {
    for (const textures of value.materialSets) {
      yield* references(textures, ctx);
    }
  },
});
