/**
 * Console + file logger for CLI runs.
 *
 * Console output is always on. `initLogger(dir)` additionally mirrors every
 * line, tagged with its level, into <dir>/mesh-recover.log (truncated per run).
 */

import { createWriteStream, mkdirSync } from 'fs'
import { join } from 'path'
import type { WriteStream } from 'fs'

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

export const LOG_FILE = 'mesh-recover.log'

const CONSOLE: Record<LogLevel, (line: string) => void> = {
  DEBUG: line => console.log(line),
  INFO: line => console.log(line),
  WARN: line => console.warn(line),
  ERROR: line => console.error(line),
}

let stream: WriteStream | null = null
let logPath = ''

function ts(): string { return new Date().toISOString().slice(11, 23) }

function emit(level: LogLevel, msg: string): void {
  const stamp = ts()
  CONSOLE[level](level === 'INFO' ? `${stamp} ${msg}` : `${stamp} [${level}] ${msg}`)
  stream?.write(`${stamp} [${level}] ${msg}\n`)
}

export function initLogger(dir: string): void {
  mkdirSync(dir, { recursive: true })
  logPath = join(dir, LOG_FILE)
  stream = createWriteStream(logPath, { flags: 'w' })
  stream.write(`=== mesh-recover ${new Date().toISOString()} ===\n`)
}

/** Flush and detach the log file; console logging continues. */
export function closeLogger(): Promise<void> {
  const s = stream
  stream = null
  logPath = ''
  if (!s) return Promise.resolve()
  return new Promise(resolve => s.end(() => resolve()))
}

export function getLogPath(): string {
  return logPath
}

export function log(msg: string): void {
  emit('INFO', msg)
}

export function warn(msg: string): void {
  emit('WARN', msg)
}

export function error(msg: string, err?: unknown): void {
  const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : ''
  emit('ERROR', `${msg}${detail}`)
}

/** Decoder trace sink; only wired in when the caller asks for tracing. */
export function debug(msg: string): void {
  emit('DEBUG', msg)
}
