/**
 * ANCS: animation character set
 *
 * Layout (big-endian, 32-bit IDs):
 *   u16 version = 1
 *   CharacterSet   u16 version = 1, u32 count × Character
 *   AnimationSet   u16 tableCount, animations, transitions, default transition,
 *                  additive block (tableCount >= 2), half transitions
 *                  (tableCount >= 3), then ANIM/EVNT pairs on Prime or
 *                  embedded event sets on Echoes.
 *
 * Each Character carries its own u16 format version; the optional fields
 * after the particle lists appear at versions 2, 4, 5, 6 and 10.
 */

import type { Dependency } from '../dependency';
import { layoutDecoder, references } from '../decoder';
import type { DecodeContext } from '../decoder';
import { Game, playerActorCharacterIndex, usesAssetId32 } from '../game';
import {
  assetId32,
  beforeVersion,
  constant,
  cstring,
  f32,
  forGames,
  prefixedArray,
  struct,
  u16,
  u32,
  u8,
  when,
  withVersion,
} from '../layout';
import type { LayoutContext, LayoutValue } from '../layout';
import { aabox, objectTag32 } from './common';
import { eventSetDependencies, evnt } from './evnt';
import { metaAnimation, metaAnimationDependencies } from './meta-animation';
import { metaTransition } from './meta-transition';
import { pasDatabase } from './pas-database';

// ---------------------------------------------------------------------------
// Character set
// ---------------------------------------------------------------------------

const idList = prefixedArray(u32, assetId32);

const animationName = struct({
  animationId: u32,
  unknown: beforeVersion(10, cstring),
  name: cstring,
});

const particleResourceData = struct({
  genericParticles: idList,
  swooshParticles: idList,
  unknown: withVersion(6, u32),
  electricParticles: idList,
  spawnParticles: withVersion(10, idList),
});

const effectComponent = struct({
  name: cstring,
  particle: objectTag32,
  boneName: forGames([Game.Prime], cstring),
  boneId: forGames([Game.Echoes], u32),
  scale: f32,
  parentedMode: u32,
  flags: u32,
});

const effect = struct({
  name: cstring,
  components: prefixedArray(u32, effectComponent),
});

const character = struct(
  {
    id: u32,
    version: u16,
    name: cstring,
    modelId: assetId32,
    skinId: assetId32,
    skeletonId: assetId32,
    animationNames: prefixedArray(u32, animationName),
    pasDatabase,
    particleResourceData,
    unknown1: u32,
    unknown2: withVersion(10, u32),
    animationAabbs: withVersion(2, prefixedArray(u32, struct({ name: cstring, bounds: aabox }))),
    effects: withVersion(2, prefixedArray(u32, effect)),
    frozenModel: withVersion(4, assetId32),
    frozenSkin: withVersion(4, assetId32),
    animationIdMap: withVersion(5, prefixedArray(u32, u32)),
    spatialPrimitivesId: withVersion(10, assetId32),
    unknown3: withVersion(10, u8),
    indexedAnimationAabbs: withVersion(10, prefixedArray(u32, struct({ id: u32, bounds: aabox }))),
  },
  { versionField: 'version' },
);

const characterSet = struct({
  version: constant(u16, 1),
  characters: prefixedArray(u32, character),
});

// ---------------------------------------------------------------------------
// Animation set
// ---------------------------------------------------------------------------

function tableCountAtLeast(min: number): (ctx: LayoutContext) => boolean {
  return (ctx) => {
    const n = ctx.scope.tableCount;
    return typeof n === 'number' && n >= min;
  };
}

const animationSet = struct({
  tableCount: u16,
  animations: prefixedArray(u32, struct({ name: cstring, meta: metaAnimation })),
  transitions: prefixedArray(
    u32,
    struct({ unknown: u32, animationIdA: u32, animationIdB: u32, transition: metaTransition }),
  ),
  defaultTransition: metaTransition,
  additive: when(
    tableCountAtLeast(2),
    struct({
      animations: prefixedArray(u32, struct({ animationId: u32, fadeInTime: f32, fadeOutTime: f32 })),
      defaultFadeInTime: f32,
      defaultFadeOutTime: f32,
    }),
  ),
  halfTransitions: when(
    tableCountAtLeast(3),
    prefixedArray(u32, struct({ animationId: u32, transition: metaTransition })),
  ),
  animationResources: forGames(
    [Game.Prime],
    prefixedArray(u32, struct({ animId: assetId32, eventId: assetId32 })),
  ),
  eventSets: forGames([Game.Echoes], prefixedArray(u32, evnt)),
});

export const ancs = struct({
  version: constant(u16, 1),
  characterSet,
  animationSet,
});

export type Ancs = LayoutValue<typeof ancs>;
export type Character = LayoutValue<typeof character>;
export type AnimationSet = LayoutValue<typeof animationSet>;

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Per-character references, in field order. */
export function* characterDependencies(ch: Character, ctx: DecodeContext): Generator<Dependency> {
  yield* references(
    [ch.modelId, ch.skinId, ch.skeletonId, ch.frozenModel, ch.frozenSkin, ch.spatialPrimitivesId],
    ctx,
  );

  const prd = ch.particleResourceData;
  yield* references(prd.genericParticles, ctx);
  yield* references(prd.swooshParticles, ctx);
  yield* references(prd.electricParticles, ctx);
  yield* references(prd.spawnParticles ?? [], ctx);

  for (const fx of ch.effects ?? []) {
    yield* references(
      fx.components.map((comp) => comp.particle.id),
      ctx,
    );
  }
}

/** References owned by the shared animation set rather than a character. */
export function* animationSetDependencies(set: AnimationSet, ctx: DecodeContext): Generator<Dependency> {
  for (const animation of set.animations) {
    yield* metaAnimationDependencies(animation.meta, ctx);
  }

  for (const res of set.animationResources ?? []) {
    yield* references([res.animId, res.eventId], ctx);
  }

  for (const events of set.eventSets ?? []) {
    yield* eventSetDependencies(events, ctx);
  }
}

/**
 * All references of an ANCS. For the player actor only the default-suit
 * character is walked, plus the shared animation set.
 */
export function* ancsDependencies(value: Ancs, ctx: DecodeContext): Generator<Dependency> {
  const { characters } = value.characterSet;
  if (ctx.playerActor) {
    yield* characterDependencies(characters[playerActorCharacterIndex(ctx.game)], ctx);
  } else {
    for (const ch of characters) {
      yield* characterDependencies(ch, ctx);
    }
  }
  yield* animationSetDependencies(value.animationSet, ctx);
}

export const ancsDecoder = layoutDecoder({
  type: 'ANCS',
  description: 'Animation character set',
  layout: ancs,
  supports: (game) => (usesAssetId32(game) ? null : 'ANCS only exists with 32-bit asset IDs'),
  check: (value, ctx) => {
    if (!ctx.playerActor) return null;
    const index = playerActorCharacterIndex(ctx.game);
    const count = value.characterSet.characters.length;
    return index < count ? null : `Player character index ${index} out of range (${count} characters)`;
  },
  dependencies: ancsDependencies,
});
