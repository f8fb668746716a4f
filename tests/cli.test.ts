import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { run } from '../src/cli';
import { resetConfig } from '../src/core/config';
import { ByteWriter } from './helpers/byte-writer';

describe('cli', () => {
  let dir: string;
  let assets: string;
  let configFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'asset-deps-cli-'));
    assets = join(dir, 'assets');
    mkdirSync(assets);
    writeFileSync(join(assets, '00001000.CSNG'), new ByteWriter().u32(2).zeros(8).u32(0x2000).toBuffer());
    writeFileSync(join(assets, '00002000.AGSC'), Buffer.alloc(0));
    configFile = join(dir, 'asset-deps.json');
    writeFileSync(configFile, JSON.stringify({ game: 'prime', logDir: dir }));

    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetConfig();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('prints direct dependencies', () => {
    expect(run(['deps', assets, '1000', '--config', configFile])).toBe(0);
    expect(console.log).toHaveBeenCalledWith('  AGSC 0x00002000');
  });

  it('reports failures and still flushes the log file', async () => {
    expect(run(['deps', assets, 'XYZ', '--config', configFile])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error: Bad asset id "XYZ" for prime');

    const logFile = join(dir, 'logs', 'asset-deps.log');
    await vi.waitFor(() => {
      expect(existsSync(logFile)).toBe(true);
      expect(readFileSync(logFile, 'utf-8')).toContain(`Loaded 2 assets from ${assets} (prime)`);
    });
  });

  it('returns 1 for an unknown command and 0 for none', () => {
    expect(run(['frobnicate', '--config', configFile])).toBe(1);
    expect(run(['--config', configFile])).toBe(0);
  });
});
