/**
 * PAS4 animation-state database embedded in every ANCS character.
 *
 *   "PAS4" magic, stateCount u32, defaultState u32, then per state:
 *     stateType u32, parmCount u32, animCount u32,
 *     parmCount × { parmType u32, weightFunction u32, weight f32, low, high },
 *     animCount × { animId u32, parmCount values }
 *
 * A parameter value is 1 byte for Bool and 4 bytes for every other type.
 */

import type { BinaryCursor } from '../binary-cursor';
import { MalformedLayout } from '../errors';
import { array, checkCount, custom, f32, magic, map, struct, u32 } from '../layout';
import type { Layout, LayoutContext } from '../layout';

export enum ParmType {
  Int32 = 0,
  UInt32 = 1,
  Float = 2,
  Bool = 3,
  Enum = 4,
}

export type ParmValue = number | boolean;

export interface ParmInfo {
  parmType: ParmType;
  weightFunction: number;
  weight: number;
  low: ParmValue;
  high: ParmValue;
}

export interface AnimInfo {
  animId: number;
  values: ParmValue[];
}

export interface AnimState {
  stateType: number;
  parms: ParmInfo[];
  anims: AnimInfo[];
}

export interface PASDatabase {
  defaultState: number;
  states: AnimState[];
}

function toParmType(raw: number, offset: number): ParmType {
  switch (raw) {
    case ParmType.Int32:
    case ParmType.UInt32:
    case ParmType.Float:
    case ParmType.Bool:
    case ParmType.Enum:
      return raw;
    default:
      throw new MalformedLayout(`Unknown PAS parameter type ${raw}`, offset);
  }
}

function readParmValue(c: BinaryCursor, type: ParmType): ParmValue {
  switch (type) {
    case ParmType.Int32:
      return c.readI32();
    case ParmType.UInt32:
    case ParmType.Enum:
      return c.readU32();
    case ParmType.Float:
      return c.readF32();
    case ParmType.Bool:
      return c.readU8() !== 0;
  }
}

const stateHeader = struct({ stateType: u32, parmCount: u32, animCount: u32 });
const parmHeader = struct({ parmType: u32, weightFunction: u32, weight: f32 });

function readParmInfo(c: BinaryCursor, ctx: LayoutContext): ParmInfo {
  const start = c.offset;
  const h = parmHeader.decode(c, ctx);
  const parmType = toParmType(h.parmType, start);
  const low = readParmValue(c, parmType);
  const high = readParmValue(c, parmType);
  return { parmType, weightFunction: h.weightFunction, weight: h.weight, low, high };
}

function readAnimState(c: BinaryCursor, ctx: LayoutContext): AnimState {
  const h = stateHeader.decode(c, ctx);

  const parms: ParmInfo[] = [];
  const parmCount = checkCount(h.parmCount, c);
  for (let i = 0; i < parmCount; i++) {
    parms.push(readParmInfo(c, ctx));
  }

  const anims: AnimInfo[] = [];
  const animCount = checkCount(h.animCount, c);
  for (let i = 0; i < animCount; i++) {
    const animId = c.readU32();
    anims.push({ animId, values: parms.map((p) => readParmValue(c, p.parmType)) });
  }

  return { stateType: h.stateType, parms, anims };
}

const animState = custom('pasAnimState', readAnimState);

export const pasDatabase: Layout<PASDatabase> = map(
  struct({ magic: magic('PAS4'), stateCount: u32, defaultState: u32, states: array('stateCount', animState) }),
  (v): PASDatabase => ({ defaultState: v.defaultState, states: v.states }),
);
