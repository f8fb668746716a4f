import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getConfigPath, initConfig, loadConfig, resetConfig, updateConfig } from '../src/core/config';
import { Game } from '../src/core/game';

describe('config', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'asset-deps-config-'));
    path = join(dir, 'nested', 'asset-deps.json');
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetConfig();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when no file is configured', () => {
    resetConfig();
    expect(getConfigPath()).toBe('');
    expect(loadConfig()).toEqual({
      game: Game.Prime,
      containerContext: false,
      playerActor: false,
      verbose: false,
      logDir: null,
    });
  });

  it('persists updates with the game stored by name', () => {
    initConfig(path);
    const updated = updateConfig({ game: Game.Echoes, playerActor: true });
    expect(updated.game).toBe(Game.Echoes);

    const stored: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    expect(stored).toEqual({
      game: 'echoes',
      containerContext: false,
      playerActor: true,
      verbose: false,
      logDir: null,
    });

    resetConfig();
    initConfig(path);
    expect(loadConfig()).toMatchObject({ game: Game.Echoes, playerActor: true, containerContext: false });
  });

  it('replaces malformed values with defaults', () => {
    initConfig(join(dir, 'asset-deps.json'));
    writeFileSync(join(dir, 'asset-deps.json'), JSON.stringify({ game: 'bogus', verbose: 'yes', logDir: '', containerContext: true }));
    expect(loadConfig()).toEqual({
      game: Game.Prime,
      containerContext: true,
      playerActor: false,
      verbose: false,
      logDir: null,
    });
  });

  it('falls back to defaults on a corrupt file', () => {
    const file = join(dir, 'asset-deps.json');
    writeFileSync(file, '{ not json');
    initConfig(file);
    expect(loadConfig().game).toBe(Game.Prime);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
