/**
 * Resolver settings.
 * Persists as JSON, by default `asset-deps.json` in the working directory.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs'
import { join, dirname } from 'path'
import { Game, gameName, parseGame } from './game'
import { describeError } from './errors'
import { error, warn } from './logger'

export const CONFIG_FILE = 'asset-deps.json'

export interface ResolverConfig {
  game: Game
  containerContext: boolean
  playerActor: boolean
  verbose: boolean
  logDir: string | null
}

interface StoredConfig {
  game: string
  containerContext: boolean
  playerActor: boolean
  verbose: boolean
  logDir: string | null
}

const defaults: ResolverConfig = {
  game: Game.Prime,
  containerContext: false,
  playerActor: false,
  verbose: false,
  logDir: null,
}

let configPath = ''
let cached: ResolverConfig | null = null

/** Point at a config file (defaults to ./asset-deps.json) and drop the cache. */
export function initConfig(path?: string): void {
  configPath = path ?? join(process.cwd(), CONFIG_FILE)
  cached = null
}

export function getConfigPath(): string {
  return configPath
}

export function resetConfig(): void {
  configPath = ''
  cached = null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function sanitize(raw: Record<string, unknown>): ResolverConfig {
  return {
    game: (typeof raw.game === 'string' ? parseGame(raw.game) : null) ?? defaults.game,
    containerContext: raw.containerContext === true,
    playerActor: raw.playerActor === true,
    verbose: raw.verbose === true,
    logDir: typeof raw.logDir === 'string' && raw.logDir.length > 0 ? raw.logDir : null,
  }
}

export function loadConfig(): ResolverConfig {
  if (cached) return cached

  if (!configPath) return { ...defaults }

  try {
    if (existsSync(configPath)) {
      const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
      cached = isRecord(raw) ? sanitize(raw) : { ...defaults }
      return cached
    }
  } catch (e) {
    // Unreadable file: fall back to defaults
    warn(`Ignoring unreadable config ${configPath}: ${describeError(e)}`)
  }

  cached = { ...defaults }
  return cached
}

function save(): void {
  if (!configPath || !cached) return
  const stored: StoredConfig = { ...cached, game: gameName(cached.game) }
  try {
    const dir = dirname(configPath)
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
    writeFileSync(configPath, JSON.stringify(stored, null, 2), 'utf-8')
  } catch (e) {
    error('Failed to save config:', e)
  }
}

export function updateConfig(partial: Partial<ResolverConfig>): ResolverConfig {
  const config = loadConfig()
  if (partial.game !== undefined) config.game = partial.game
  if (partial.containerContext !== undefined) config.containerContext = partial.containerContext
  if (partial.playerActor !== undefined) config.playerActor = partial.playerActor
  if (partial.verbose !== undefined) config.verbose = partial.verbose
  if (partial.logDir !== undefined) config.logDir = partial.logDir
  save()
  return config
}
