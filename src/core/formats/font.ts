/**
 * FONT: the font name starts at absolute offset 0x22 and is followed by the
 * glyph texture ID.
 */

import { layoutDecoder, references } from '../decoder';
import { assetId, cstring, magic, seekTo, struct } from '../layout';

export const font = struct({
  magic: magic('FONT'),
  _seek: seekTo(0x22),
  name: cstring,
  textureId: assetId,
});

export const fontDecoder = layoutDecoder({
  type: 'FONT',
  description: 'Font',
  layout: font,
  *dependencies(value, ctx) {
    yield* references([value.textureId], ctx);
  },
});
