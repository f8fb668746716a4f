import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryCatalog } from '../src/core/catalog';
import { walkDependencies } from '../src/core/dependency-graph';
import { Game } from '../src/core/game';
import { ByteWriter } from './helpers/byte-writer';

describe('walkDependencies', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('terminates on reference cycles and deduplicates references', () => {
    const catalog = new InMemoryCatalog(Game.Prime)
      .add(0x10n, 'CSNG', new ByteWriter().u32(2).zeros(8).u32(0x20).toBuffer())
      .add(0x20n, 'AGSC', new ByteWriter().u32(0x10).u32(0x10).toBuffer());

    const graph = walkDependencies(catalog, 0x10n);

    expect(graph.root).toBe(0x10n);
    expect([...graph.nodes.keys()]).toEqual([0x10n, 0x20n]);
    expect(graph.nodes.get(0x10n)).toEqual({ dependency: { type: 'CSNG', id: 0x10n }, path: 'structured', references: [0x20n] });
    expect(graph.nodes.get(0x20n)).toEqual({ dependency: { type: 'AGSC', id: 0x20n }, path: 'heuristic', references: [0x10n] });
  });

  it('records references the catalog cannot resolve as leaves', () => {
    const hint = new ByteWriter()
      .u32(0x00badbad)
      .u32(1)
      .u32(1)
      .cstring('h')
      .f32(0)
      .f32(0)
      .u32(0x40)
      .f32(0)
      .u32(1)
      .u32(0x50)
      .u32(0x51)
      .u32(0)
      .u32(0x41)
      .toBuffer();
    const catalog = new InMemoryCatalog(Game.Prime)
      .add(0x99n, 'HINT', hint)
      .add(0x40n, 'STRG', Buffer.alloc(0))
      .add(0x41n, 'STRG', Buffer.alloc(0));

    const graph = walkDependencies(catalog, 0x99n);

    expect(graph.nodes.get(0x99n)?.references).toEqual([0x40n, 0x41n, 0x50n, 0x51n]);
    expect(graph.nodes.get(0x40n)).toEqual({ dependency: { type: 'STRG', id: 0x40n }, path: 'heuristic', references: [] });
    expect(graph.nodes.get(0x50n)).toEqual({ dependency: { type: 'MLVL', id: 0x50n }, path: null, references: [] });
    expect(graph.nodes.size).toBe(5);
  });

  it('keeps walking when one asset names an unknown reference', () => {
    const dumb = new ByteWriter().u32(1).u32(0x20).cstring('entry').u32(0x21).u32(0).toBuffer();
    const catalog = new InMemoryCatalog(Game.Prime)
      .add(0x99n, 'DUMB', dumb)
      .add(0x20n, 'CSNG', new ByteWriter().u32(2).zeros(8).u32(0x30).toBuffer())
      .add(0x21n, 'SCAN', Buffer.alloc(0));

    const graph = walkDependencies(catalog, 0x99n);

    expect(graph.nodes.get(0x99n)?.references).toEqual([0x20n, 0x21n]);
    expect(graph.nodes.get(0x20n)).toEqual({
      dependency: { type: 'CSNG', id: 0x20n },
      path: 'structured',
      references: [],
      error: 'Unknown asset id 0x30',
    });
    expect(graph.nodes.get(0x21n)).toEqual({ dependency: { type: 'SCAN', id: 0x21n }, path: 'heuristic', references: [] });
    expect(graph.nodes.size).toBe(3);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('throws for a root outside the catalog', () => {
    expect(() => walkDependencies(new InMemoryCatalog(Game.Prime), 0x10n)).toThrow('Unknown asset id 0x10');
  });
});
