/**
 * Structured decoder registry
 *
 * Maps a four-character type tag to the decoder for that format. The default
 * registry is built once at startup; callers wire extra formats in with
 * register() without touching the dispatch logic.
 */

import type { AssetType } from './dependency';
import { isFourCC } from './dependency';
import type { StructuredDecoder } from './decoder';
import { ancsDecoder } from './formats/ancs';
import { cmdlDecoder } from './formats/cmdl';
import { csngDecoder } from './formats/csng';
import { dumbDecoder } from './formats/dumb';
import { evntDecoder } from './formats/evnt';
import { fontDecoder } from './formats/font';
import { frmeDecoder } from './formats/frme';
import { fsm2Decoder } from './formats/fsm2';
import { hintDecoder } from './formats/hint';
import { ruleDecoder } from './formats/rule';

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class DecoderRegistry {
  private readonly decoders: Map<AssetType, StructuredDecoder> = new Map();

  register(decoder: StructuredDecoder): this {
    if (!isFourCC(decoder.type)) {
      throw new Error(`Invalid type tag "${decoder.type}"`);
    }
    this.decoders.set(decoder.type, decoder);
    return this;
  }

  get(type: AssetType): StructuredDecoder | undefined {
    return this.decoders.get(type);
  }

  has(type: AssetType): boolean {
    return this.decoders.has(type);
  }

  types(): AssetType[] {
    return [...this.decoders.keys()].sort();
  }

  /** Independent copy, for callers that extend the defaults. */
  clone(): DecoderRegistry {
    const copy = new DecoderRegistry();
    for (const decoder of this.decoders.values()) copy.register(decoder);
    return copy;
  }
}

export const BUILTIN_DECODERS: readonly StructuredDecoder[] = [
  ancsDecoder,
  cmdlDecoder,
  csngDecoder,
  dumbDecoder,
  evntDecoder,
  fontDecoder,
  frmeDecoder,
  fsm2Decoder,
  hintDecoder,
  ruleDecoder,
];

export function createDefaultRegistry(): DecoderRegistry {
  const registry = new DecoderRegistry();
  for (const decoder of BUILTIN_DECODERS) registry.register(decoder);
  return registry;
}

export const defaultRegistry = createDefaultRegistry();
