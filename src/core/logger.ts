import { createWriteStream, mkdirSync, existsSync } from 'fs'
import { join } from 'path'
import type { WriteStream } from 'fs'

const LOG_FILE = 'asset-deps.log'

let stream: WriteStream | null = null
let logDir = ''
let verbose = false

function ts(): string { return new Date().toISOString().slice(11, 23) }

export function initLogger(baseDir: string): void {
  logDir = join(baseDir, 'logs')
  if (!existsSync(logDir)) mkdirSync(logDir, { recursive: true })
  stream = createWriteStream(join(logDir, LOG_FILE), { flags: 'w' })
  stream.write(`=== asset-deps started ${new Date().toISOString()} ===\n`)
}

export function closeLogger(): void {
  stream?.end()
  stream = null
}

/** Echo debug lines to the console as well as the log file. */
export function setVerbose(on: boolean): void {
  verbose = on
}

function write(level: string, msg: string): void {
  const line = `${ts()} [${level}] ${msg}\n`
  stream?.write(line)
}

export function debug(msg: string): void {
  if (verbose) console.log(`${ts()} [DEBUG] ${msg}`)
  write('DEBUG', msg)
}

export function log(msg: string): void {
  console.log(`${ts()} ${msg}`)
  write('INFO', msg)
}

export function warn(msg: string): void {
  console.warn(`${ts()} [WARN] ${msg}`)
  write('WARN', msg)
}

export function error(msg: string, err?: unknown): void {
  const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : ''
  console.error(`${ts()} [ERROR] ${msg}${detail}`)
  write('ERROR', `${msg}${detail}`)
}

export function getLogPath(): string {
  return logDir ? join(logDir, LOG_FILE) : ''
}
