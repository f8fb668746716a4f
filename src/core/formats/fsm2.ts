/**
 * FSM2: AI finite state machine.
 *
 *   "FSM2", version u32, four table counts, then the four tables. From
 *   version 2 each entry carries 16 extra bytes after its name. Only the
 *   last table holds an asset reference.
 */

import { layoutDecoder, references } from '../decoder';
import {
  array,
  assetId,
  cstring,
  magic,
  prefixedArray,
  skip,
  struct,
  u32,
  withVersion,
} from '../layout';
import type { LayoutValue } from '../layout';

const trigger = struct({ name: cstring, _unknown: skip(4) });
const triggers = prefixedArray(u32, trigger);
const extra = withVersion(2, skip(0x10));

const state = struct({ name: cstring, _extra: extra, triggers });

const transition = struct({
  name: cstring,
  _extra: extra,
  _unknown: skip(4),
  triggers,
  _flag: skip(1),
});

const condition = struct({ name: cstring, _extra: extra, triggers });

const scriptBinding = struct({ name: cstring, _extra: extra, triggers, dependency: assetId });

export const fsm2 = struct(
  {
    magic: magic('FSM2'),
    version: u32,
    stateCount: u32,
    transitionCount: u32,
    conditionCount: u32,
    bindingCount: u32,
    states: array('stateCount', state),
    transitions: array('transitionCount', transition),
    conditions: array('conditionCount', condition),
    bindings: array('bindingCount', scriptBinding),
  },
  { versionField: 'version' },
);

export type Fsm2 = LayoutValue<typeof fsm2>;

export const fsm2Decoder = layoutDecoder({
  type: 'FSM2',
  description: 'AI state machine',
  layout: fsm2,
  *dependencies(value, ctx) {
    yield* references(
      value.bindings.map((b) => b.dependency),
      ctx,
    );
  },
});
