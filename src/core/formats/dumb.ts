/**
 * DUMB scan hierarchy: count-prefixed entries, each naming a string table
 * and a scan.
 */

import { layoutDecoder, references } from '../decoder';
import { assetId, cstring, prefixedArray, struct, u32 } from '../layout';
import type { LayoutValue } from '../layout';

const hierEntry = struct({
  stringTableId: assetId,
  name: cstring,
  scanId: assetId,
  parentId: u32,
});

export const hier = struct({
  entries: prefixedArray(u32, hierEntry),
});

export type Hier = LayoutValue<typeof hier>;

export const dumbDecoder = layoutDecoder({
  type: 'DUMB',
  description: 'Scan hierarchy',
  layout: hier,
  *dependencies(value, ctx) {
    for (const entry of value.entries) {
      yield* references([entry.stringTableId, entry.scanId], ctx);
    }
  },
});
