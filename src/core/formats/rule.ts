/**
 * RULE: rule set. The string table ID sits at absolute offset 5, after the
 * magic and a one-byte version.
 */

import { layoutDecoder, references } from '../decoder';
import { assetId, magic, pointer, struct } from '../layout';

export const rule = struct({
  magic: magic('RULE'),
  stringTableId: pointer(0x5, assetId),
});

export const ruleDecoder = layoutDecoder({
  type: 'RULE',
  description: 'Rule set',
  layout: rule,
  *dependencies(value, ctx) {
    yield* references([value.stringTableId], ctx);
  },
});
