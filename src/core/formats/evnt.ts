/**
 * EVNT event sets
 *
 * Standalone asset on Prime, embedded in the ANCS animation set on Echoes.
 * Every event starts with the same point-of-interest node; effect events
 * name a particle system by object tag, and sound events exist from
 * version 2.
 */

import type { Dependency } from '../dependency';
import { layoutDecoder, references } from '../decoder';
import type { DecodeContext } from '../decoder';
import { Game, usesAssetId32 } from '../game';
import { bool, cstring, f32, forGames, i32, prefixedArray, struct, u16, u32, u8, withVersion } from '../layout';
import type { LayoutValue } from '../layout';
import { charAnimTime, objectTag32 } from './common';

const poiNode = {
  unknown: u16,
  name: cstring,
  eventType: u16,
  timestamp: charAnimTime,
  index: u32,
  unknownFlag: bool,
  weight: f32,
  characterIndex: i32,
  flags: u32,
};

const loopEvent = struct({ ...poiNode, looping: u8 });

const userEvent = struct({ ...poiNode, userType: u32, boneName: cstring });

const effectEvent = struct({
  ...poiNode,
  frameCount: u32,
  effect: objectTag32,
  boneName: forGames([Game.Prime], cstring),
  boneId: forGames([Game.Echoes], u32),
  scale: f32,
  parentMode: u32,
});

const soundEvent = struct({ ...poiNode, soundId: u32, referenceAmplitude: f32, referenceDistance: f32 });

export const evnt = struct(
  {
    version: u32,
    loopEvents: prefixedArray(u32, loopEvent),
    userEvents: prefixedArray(u32, userEvent),
    effectEvents: prefixedArray(u32, effectEvent),
    soundEvents: withVersion(2, prefixedArray(u32, soundEvent)),
  },
  { versionField: 'version' },
);

export type EventSet = LayoutValue<typeof evnt>;

/** Particle systems named by effect events. */
export function* eventSetDependencies(events: EventSet, ctx: DecodeContext): Generator<Dependency> {
  yield* references(
    events.effectEvents.map((e) => e.effect.id),
    ctx,
  );
}

export const evntDecoder = layoutDecoder({
  type: 'EVNT',
  description: 'Animation event set',
  layout: evnt,
  supports: (game) => (usesAssetId32(game) ? null : 'EVNT layout uses 32-bit object tags'),
  dependencies: eventSetDependencies,
});
