/**
 * Meta-transitions between animations.
 *
 *   0 MetaAnimation    embedded meta-animation tree
 *   1 Transition       duration f32, durationMode u32, flag u8, runA u8, flags u32
 *   2 PhaseTransition  same body as Transition
 *   3 Snap             no body
 */

import { bool, custom, f32, map, struct, switchOn, u32 } from '../layout';
import type { Layout, LayoutValue } from '../layout';
import { metaAnimation } from './meta-animation';
import type { MetaAnimation } from './meta-animation';

export enum MetaTransitionType {
  MetaAnimation = 0,
  Transition = 1,
  PhaseTransition = 2,
  Snap = 3,
}

const transitionData = struct({
  duration: f32,
  durationMode: u32,
  flag: bool,
  runA: bool,
  flags: u32,
});

export type TransitionData = LayoutValue<typeof transitionData>;

export type MetaTransition =
  | { type: MetaTransitionType.MetaAnimation; animation: MetaAnimation }
  | { type: MetaTransitionType.Transition | MetaTransitionType.PhaseTransition; data: TransitionData }
  | { type: MetaTransitionType.Snap };

export const metaTransition: Layout<MetaTransition> = switchOn<MetaTransition>(u32, {
  [MetaTransitionType.MetaAnimation]: map(
    metaAnimation,
    (animation): MetaTransition => ({ type: MetaTransitionType.MetaAnimation, animation }),
  ),
  [MetaTransitionType.Transition]: map(
    transitionData,
    (data): MetaTransition => ({ type: MetaTransitionType.Transition, data }),
  ),
  [MetaTransitionType.PhaseTransition]: map(
    transitionData,
    (data): MetaTransition => ({ type: MetaTransitionType.PhaseTransition, data }),
  ),
  [MetaTransitionType.Snap]: custom('snap', (): MetaTransition => ({ type: MetaTransitionType.Snap })),
});
