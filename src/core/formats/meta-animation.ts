/**
 * Meta-animation trees
 *
 * A tree of play/blend/random/sequence nodes; every Play leaf names an ANIM.
 * Layout (tag u32, then body):
 *   0 Play        animId, primitiveId u32, name, CharAnimTime
 *   1 Blend       metaAnim A, metaAnim B, weight f32, flag u8
 *   2 PhaseBlend  same as Blend
 *   3 Random      u32 count of { metaAnim, probability u32 }
 *   4 Sequence    u32 count of metaAnim
 */

import type { AssetId, Dependency } from '../dependency';
import { references } from '../decoder';
import type { DecodeContext } from '../decoder';
import { assetId32, bool, cstring, f32, lazy, map, nested, prefixedArray, struct, switchOn, u32 } from '../layout';
import type { Layout } from '../layout';
import { charAnimTime } from './common';
import type { CharAnimTime } from './common';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum MetaAnimationType {
  Play = 0,
  Blend = 1,
  PhaseBlend = 2,
  Random = 3,
  Sequence = 4,
}

export interface MetaAnimationPlay {
  type: MetaAnimationType.Play;
  animationId: AssetId;
  primitiveId: number;
  name: string;
  time: CharAnimTime;
}

export interface MetaAnimationBlend {
  type: MetaAnimationType.Blend | MetaAnimationType.PhaseBlend;
  a: MetaAnimation;
  b: MetaAnimation;
  weight: number;
  flag: boolean;
}

export interface MetaAnimationRandom {
  type: MetaAnimationType.Random;
  choices: { animation: MetaAnimation; probability: number }[];
}

export interface MetaAnimationSequence {
  type: MetaAnimationType.Sequence;
  animations: MetaAnimation[];
}

export type MetaAnimation = MetaAnimationPlay | MetaAnimationBlend | MetaAnimationRandom | MetaAnimationSequence;

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

export const MAX_META_ANIMATION_DEPTH = 256;

const child: Layout<MetaAnimation> = nested(MAX_META_ANIMATION_DEPTH, lazy(() => metaAnimation));

const blendBody = struct({ a: child, b: child, weight: f32, flag: bool });

function blend(type: MetaAnimationType.Blend | MetaAnimationType.PhaseBlend): Layout<MetaAnimation> {
  return map(blendBody, (v): MetaAnimation => ({ type, a: v.a, b: v.b, weight: v.weight, flag: v.flag }));
}

export const metaAnimation: Layout<MetaAnimation> = switchOn<MetaAnimation>(u32, {
  [MetaAnimationType.Play]: map(
    struct({ animationId: assetId32, primitiveId: u32, name: cstring, time: charAnimTime }),
    (v): MetaAnimation => ({ type: MetaAnimationType.Play, ...v }),
  ),
  [MetaAnimationType.Blend]: blend(MetaAnimationType.Blend),
  [MetaAnimationType.PhaseBlend]: blend(MetaAnimationType.PhaseBlend),
  [MetaAnimationType.Random]: map(
    prefixedArray(u32, struct({ animation: child, probability: u32 })),
    (choices): MetaAnimation => ({ type: MetaAnimationType.Random, choices }),
  ),
  [MetaAnimationType.Sequence]: map(
    prefixedArray(u32, child),
    (animations): MetaAnimation => ({ type: MetaAnimationType.Sequence, animations }),
  ),
});

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Every Play leaf's animation, depth first, in field order. */
export function* metaAnimationDependencies(meta: MetaAnimation, ctx: DecodeContext): Generator<Dependency> {
  switch (meta.type) {
    case MetaAnimationType.Play:
      yield* references([meta.animationId], ctx);
      break;
    case MetaAnimationType.Blend:
    case MetaAnimationType.PhaseBlend:
      yield* metaAnimationDependencies(meta.a, ctx);
      yield* metaAnimationDependencies(meta.b, ctx);
      break;
    case MetaAnimationType.Random:
      for (const choice of meta.choices) {
        yield* metaAnimationDependencies(choice.animation, ctx);
      }
      break;
    case MetaAnimationType.Sequence:
      for (const animation of meta.animations) {
        yield* metaAnimationDependencies(animation, ctx);
      }
      break;
  }
}
