/**
 * asset-deps CLI: headless tool for inspecting asset dependencies
 *
 * Usage:
 *   npx tsx scripts/cli.ts <command> [args...] [flags]
 *
 * Commands:
 *   formats                     List registered structured decoders
 *   deps <dir> <id>             Direct dependencies of one asset
 *   graph <dir> <id>            Transitive dependencies of one asset
 *   scan <dir> <id>             Heuristic scan only, with match offsets
 *   ancs <dir> <id>             Dump an ANCS character set
 *   hexdump <dir> <id> [rows]   Hex dump an asset's payload
 *   config [key value]          Show or change asset-deps.json
 *
 * Flags:
 *   --game <prime|echoes|corruption>  --container  --player-actor
 *   --verbose  --config <file>
 *
 * <dir> holds loose asset files named <hex id>.<TYPE>.
 */

import { resolve } from 'path';
import type { InMemoryCatalog } from './core/catalog';
import { formatAssetId, formatDependency } from './core/dependency';
import type { AssetId } from './core/dependency';
import { defaultRegistry } from './core/decoder-registry';
import { plan } from './core/dependency-resolver';
import { walkDependencies } from './core/dependency-graph';
import { loadAssetDirectory } from './core/asset-directory';
import { getConfigPath, initConfig, loadConfig, updateConfig } from './core/config';
import type { ResolverConfig } from './core/config';
import { describeError } from './core/errors';
import { Game, gameName, idByteSize, parseGame } from './core/game';
import { matchingCandidates } from './core/heuristic-scanner';
import { parseLayout } from './core/layout';
import { ancs } from './core/formats/ancs';
import { closeLogger, getLogPath, initLogger, log, setVerbose } from './core/logger';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function hexdump(data: Uint8Array, maxRows = 32): void {
  const rows = Math.min(maxRows, Math.ceil(data.length / 16));
  for (let row = 0; row < rows; row++) {
    const off = row * 16;
    const bytes = data.subarray(off, Math.min(off + 16, data.length));
    const hex: string[] = [];
    for (let i = 0; i < 16; i++) {
      hex.push(i < bytes.length ? bytes[i].toString(16).padStart(2, '0') : '  ');
    }
    let ascii = '';
    for (let i = 0; i < bytes.length; i++) {
      const b = bytes[i];
      ascii += (b >= 0x20 && b <= 0x7e) ? String.fromCharCode(b) : '.';
    }
    console.log(
      `  ${off.toString(16).padStart(8, '0')}  ${hex.slice(0, 8).join(' ')}  ${hex.slice(8).join(' ')}  |${ascii}|`
    );
  }
  if (data.length > maxRows * 16) {
    console.log(`  ... ${formatSize(data.length - maxRows * 16)} remaining`);
  }
}

/** Failure reported to the user as `Error: <message>`, exit status 1. */
class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

function die(msg: string): never {
  throw new CliError(msg);
}

interface Args {
  positional: string[];
  flags: Map<string, string | true>;
}

function parseArgs(argv: string[]): Args {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) {
      positional.push(a);
      continue;
    }
    const name = a.slice(2);
    if ((name === 'game' || name === 'config') && i + 1 < argv.length) {
      flags.set(name, argv[++i]);
    } else {
      flags.set(name, true);
    }
  }
  return { positional, flags };
}

function effectiveConfig(args: Args): ResolverConfig {
  const config = { ...loadConfig() };
  const game = args.flags.get('game');
  if (typeof game === 'string') {
    config.game = parseGame(game) ?? die(`Unknown game "${game}"`);
  }
  if (args.flags.has('container')) config.containerContext = true;
  if (args.flags.has('player-actor')) config.playerActor = true;
  if (args.flags.has('verbose')) config.verbose = true;
  return config;
}

function parseId(text: string | undefined, game: Game): AssetId {
  if (!text) die('Missing asset id');
  const clean = text.replace(/^0x/i, '');
  if (!/^[0-9a-f]+$/i.test(clean) || clean.length > idByteSize(game) * 2) {
    die(`Bad asset id "${text}" for ${gameName(game)}`);
  }
  return BigInt(`0x${clean}`);
}

function openCatalog(dir: string | undefined, config: ResolverConfig): InMemoryCatalog {
  if (!dir) die('Missing asset directory');
  const catalog = loadAssetDirectory(resolve(dir), config.game);
  log(`Loaded ${catalog.size} assets from ${dir} (${gameName(config.game)})`);
  return catalog;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdFormats(): void {
  console.log(`\n=== Structured decoders ===\n`);
  for (const type of defaultRegistry.types()) {
    const decoder = defaultRegistry.get(type);
    console.log(`  ${type}  ${decoder?.description ?? ''}`);
  }
  console.log(`\nAnything else is scanned heuristically.`);
}

function cmdDeps(args: Args, config: ResolverConfig): void {
  const catalog = openCatalog(args.positional[1], config);
  const id = parseId(args.positional[2], config.game);
  const asset = catalog.resolve(id);

  const result = plan(asset, config.game, catalog, {
    containerContext: config.containerContext,
    playerActor: config.playerActor,
  });

  console.log(`\n=== ${asset.type} ${formatAssetId(id, config.game)} (${formatSize(asset.data.length)}) ===\n`);
  console.log(`Path: ${result.path}${result.reason ? ` (${result.reason})` : ''}\n`);
  let count = 0;
  for (const dep of result.dependencies) {
    console.log(`  ${formatDependency(dep, config.game)}`);
    count++;
  }
  console.log(`\n${count} dependencies`);
}

function cmdGraph(args: Args, config: ResolverConfig): void {
  const catalog = openCatalog(args.positional[1], config);
  const id = parseId(args.positional[2], config.game);
  const graph = walkDependencies(catalog, id, {
    containerContext: config.containerContext,
    playerActor: config.playerActor,
  });

  console.log(`\n=== Dependency graph of ${formatAssetId(id, config.game)} ===\n`);
  for (const node of graph.nodes.values()) {
    const path = node.path ?? 'missing';
    const failed = node.error ? `  (${node.error})` : '';
    console.log(
      `  ${formatDependency(node.dependency, config.game).padEnd(24)} [${path}] -> ${node.references.length} refs${failed}`,
    );
  }
  console.log(`\n${graph.nodes.size} assets`);
}

function cmdScan(args: Args, config: ResolverConfig): void {
  const catalog = openCatalog(args.positional[1], config);
  const id = parseId(args.positional[2], config.game);
  const asset = catalog.resolve(id);

  console.log(`\n=== Heuristic scan: ${asset.type} ${formatAssetId(id, config.game)} ===\n`);
  let count = 0;
  for (const c of matchingCandidates(asset.data, config.game, catalog)) {
    const target = catalog.resolve(c.id);
    console.log(`  +0x${c.offset.toString(16).padStart(6, '0')}  ${target.type} ${formatAssetId(c.id, config.game)}`);
    count++;
  }
  console.log(`\n${count} matches`);
}

function cmdAncs(args: Args, config: ResolverConfig): void {
  const catalog = openCatalog(args.positional[1], config);
  const id = parseId(args.positional[2], config.game);
  const asset = catalog.resolve(id);
  if (asset.type !== 'ANCS') die(`${formatAssetId(id, config.game)} is ${asset.type}, not ANCS`);

  const value = parseLayout(ancs, asset.data, config.game);
  const fmt = (v: AssetId | undefined): string => (v === undefined ? '-' : formatAssetId(v, config.game));

  console.log(`\n=== ANCS ${formatAssetId(id, config.game)} ===\n`);
  value.characterSet.characters.forEach((ch, i) => {
    console.log(`[${i}] ${ch.name} (id=${ch.id}, version=${ch.version})`);
    console.log(`    model=${fmt(ch.modelId)} skin=${fmt(ch.skinId)} skeleton=${fmt(ch.skeletonId)}`);
    console.log(`    frozen=${fmt(ch.frozenModel)}/${fmt(ch.frozenSkin)} spatial=${fmt(ch.spatialPrimitivesId)}`);
    const prd = ch.particleResourceData;
    console.log(
      `    particles: part=${prd.genericParticles.length} swhc=${prd.swooshParticles.length} ` +
        `elsc=${prd.electricParticles.length} spsc=${prd.spawnParticles?.length ?? '-'}`,
    );
    console.log(`    animations=${ch.animationNames.length} pasStates=${ch.pasDatabase.states.length} effects=${ch.effects?.length ?? '-'}`);
  });

  const set = value.animationSet;
  console.log(`\nAnimation set: tableCount=${set.tableCount}`);
  console.log(`  animations=${set.animations.length} transitions=${set.transitions.length}`);
  console.log(`  additive=${set.additive ? set.additive.animations.length : '-'} half=${set.halfTransitions?.length ?? '-'}`);
  console.log(`  resources=${set.animationResources?.length ?? '-'} eventSets=${set.eventSets?.length ?? '-'}`);
}

function cmdHexdump(args: Args, config: ResolverConfig): void {
  const catalog = openCatalog(args.positional[1], config);
  const id = parseId(args.positional[2], config.game);
  const rows = args.positional[3] ? parseInt(args.positional[3], 10) : 32;
  const asset = catalog.resolve(id);
  console.log(`\n=== ${asset.type} ${formatAssetId(id, config.game)} (${formatSize(asset.data.length)}) ===\n`);
  hexdump(asset.data, Number.isFinite(rows) && rows > 0 ? rows : 32);
}

function cmdConfig(args: Args): void {
  const [, key, value] = args.positional;
  if (key !== undefined) {
    if (value === undefined) die(`Missing value for ${key}`);
    switch (key) {
      case 'game':
        updateConfig({ game: parseGame(value) ?? die(`Unknown game "${value}"`) });
        break;
      case 'containerContext':
        updateConfig({ containerContext: value === 'true' });
        break;
      case 'playerActor':
        updateConfig({ playerActor: value === 'true' });
        break;
      case 'verbose':
        updateConfig({ verbose: value === 'true' });
        break;
      case 'logDir':
        updateConfig({ logDir: value === '' || value === 'null' ? null : value });
        break;
      default:
        die(`Unknown config key "${key}"`);
    }
  }

  const config = loadConfig();
  console.log(`\n=== ${getConfigPath()} ===\n`);
  console.log(`  game:             ${gameName(config.game)}`);
  console.log(`  containerContext: ${config.containerContext}`);
  console.log(`  playerActor:      ${config.playerActor}`);
  console.log(`  verbose:          ${config.verbose}`);
  console.log(`  logDir:           ${config.logDir ?? '-'}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run one command. Returns the process exit status; the log file is closed
 * on every path so buffered lines reach disk.
 */
export function run(argv: string[]): number {
  try {
    return dispatch(parseArgs(argv));
  } catch (e) {
    console.error(`Error: ${describeError(e)}`);
    return 1;
  } finally {
    closeLogger();
  }
}

function dispatch(args: Args): number {
  const configFlag = args.flags.get('config');
  initConfig(typeof configFlag === 'string' ? resolve(configFlag) : undefined);

  const config = effectiveConfig(args);
  setVerbose(config.verbose);
  if (config.logDir) {
    initLogger(config.logDir);
    log(`Logging to ${getLogPath()}`);
  }

  const command = args.positional[0];
  switch (command) {
    case 'formats':
      cmdFormats();
      break;
    case 'deps':
      cmdDeps(args, config);
      break;
    case 'graph':
      cmdGraph(args, config);
      break;
    case 'scan':
      cmdScan(args, config);
      break;
    case 'ancs':
      cmdAncs(args, config);
      break;
    case 'hexdump':
      cmdHexdump(args, config);
      break;
    case 'config':
      cmdConfig(args);
      break;
    default:
      console.log('Usage: npx tsx scripts/cli.ts <formats|deps|graph|scan|ancs|hexdump|config> [args...]');
      return command ? 1 : 0;
  }
  return 0;
}
