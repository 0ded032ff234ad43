/**
 * Converter settings.
 * Read from mesh-recover.json in the working directory; every field is
 * sanitised on load and command-line flags are applied on top.
 */

import { readFileSync, existsSync } from 'fs'
import { join } from 'path'
import { STRATEGY_MODES, type StrategyMode } from './strategies'

export interface DecoderConfig {
  lz4LibraryPath: string | null
  outputDir: string
  exportUvs: boolean
  maxIndexIterations: number
  indexSearchStep: number
  zeroRatioThreshold: number
  minVertexCount: number
  metadataPath: string | null
  writeReport: boolean
  logDir: string | null
  mode: StrategyMode
}

export const CONFIG_FILE = 'mesh-recover.json'

export const DEFAULT_CONFIG: DecoderConfig = {
  lz4LibraryPath: null,
  outputDir: '.',
  exportUvs: true,
  maxIndexIterations: 5000,
  indexSearchStep: 4,
  zeroRatioThreshold: 0.1,
  minVertexCount: 10,
  metadataPath: null,
  writeReport: true,
  logDir: null,
  mode: 'hybrid',
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function str(v: unknown, fallback: string): string {
  return typeof v === 'string' && v.length > 0 ? v : fallback
}

function optStr(v: unknown): string | null {
  return typeof v === 'string' && v.length > 0 ? v : null
}

function mode(v: unknown, fallback: StrategyMode): StrategyMode {
  return STRATEGY_MODES.find(m => m === v) ?? fallback
}

function int(v: unknown, fallback: number, min: number, max: number): number {
  return typeof v === 'number' && Number.isFinite(v) ? Math.max(min, Math.min(max, Math.floor(v))) : fallback
}

/** Apply the field rules to an already-parsed JSON value. */
export function sanitizeConfig(raw: unknown): DecoderConfig {
  if (!isRecord(raw)) return { ...DEFAULT_CONFIG }
  const d = DEFAULT_CONFIG
  return {
    lz4LibraryPath: optStr(raw.lz4LibraryPath),
    outputDir: str(raw.outputDir, d.outputDir),
    exportUvs: typeof raw.exportUvs === 'boolean' ? raw.exportUvs : d.exportUvs,
    maxIndexIterations: int(raw.maxIndexIterations, d.maxIndexIterations, 1, 10_000_000),
    indexSearchStep: int(raw.indexSearchStep, d.indexSearchStep, 1, 64),
    zeroRatioThreshold: typeof raw.zeroRatioThreshold === 'number' && raw.zeroRatioThreshold >= 0 && raw.zeroRatioThreshold <= 1
      ? raw.zeroRatioThreshold
      : d.zeroRatioThreshold,
    minVertexCount: int(raw.minVertexCount, d.minVertexCount, 1, 1_000_000),
    metadataPath: optStr(raw.metadataPath),
    writeReport: typeof raw.writeReport === 'boolean' ? raw.writeReport : d.writeReport,
    logDir: optStr(raw.logDir),
    mode: mode(raw.mode, d.mode),
  }
}

/**
 * Load the config at `filepath` (default: ./mesh-recover.json).
 * A missing file gives the defaults; an unreadable one throws.
 */
export function loadConfig(filepath: string = join(process.cwd(), CONFIG_FILE)): DecoderConfig {
  if (!existsSync(filepath)) return { ...DEFAULT_CONFIG }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filepath, 'utf-8'))
  } catch (e) {
    throw new Error(`Invalid config ${filepath}: ${e instanceof Error ? e.message : String(e)}`)
  }
  return sanitizeConfig(raw)
}

/** Overlay command-line values; undefined leaves the loaded value alone. */
export function applyOverrides(config: DecoderConfig, overrides: Partial<DecoderConfig>): DecoderConfig {
  const merged = { ...config }
  if (overrides.lz4LibraryPath !== undefined) merged.lz4LibraryPath = overrides.lz4LibraryPath
  if (overrides.outputDir !== undefined) merged.outputDir = overrides.outputDir
  if (overrides.exportUvs !== undefined) merged.exportUvs = overrides.exportUvs
  if (overrides.maxIndexIterations !== undefined) merged.maxIndexIterations = overrides.maxIndexIterations
  if (overrides.indexSearchStep !== undefined) merged.indexSearchStep = overrides.indexSearchStep
  if (overrides.zeroRatioThreshold !== undefined) merged.zeroRatioThreshold = overrides.zeroRatioThreshold
  if (overrides.minVertexCount !== undefined) merged.minVertexCount = overrides.minVertexCount
  if (overrides.metadataPath !== undefined) merged.metadataPath = overrides.metadataPath
  if (overrides.writeReport !== undefined) merged.writeReport = overrides.writeReport
  if (overrides.logDir !== undefined) merged.logDir = overrides.logDir
  if (overrides.mode !== undefined) merged.mode = overrides.mode
  return merged
}
