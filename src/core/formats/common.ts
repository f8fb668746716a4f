/**
 * Small records shared by several formats.
 */

import { assetId32, f32, fourcc, struct, u32 } from '../layout';
import type { LayoutValue } from '../layout';

export const vector3 = struct({ x: f32, y: f32, z: f32 });

export const aabox = struct({ min: vector3, max: vector3 });

/** Time value plus differential-state word. */
export const charAnimTime = struct({ time: f32, differentialState: u32 });

/** Type tag + 32-bit ID, as embedded in effect records. */
export const objectTag32 = struct({ type: fourcc, id: assetId32 });

export type AABox = LayoutValue<typeof aabox>;
export type CharAnimTime = LayoutValue<typeof charAnimTime>;
