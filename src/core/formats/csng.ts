/**
 * CSNG: MIDI song. Constant 2 at the start, audio group ID at 0xC.
 */

import { layoutDecoder, references } from '../decoder';
import { assetId, constant, seekTo, struct, u32 } from '../layout';

export const csng = struct({
  magic: constant(u32, 2),
  _seek: seekTo(0xc),
  audioGroupId: assetId,
});

export const csngDecoder = layoutDecoder({
  type: 'CSNG',
  description: 'MIDI song',
  layout: csng,
  *dependencies(value, ctx) {
    yield* references([value.audioGroupId], ctx);
  },
});
