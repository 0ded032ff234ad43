/**
 * MeshDefs.lua reader
 *
 * The game ships a Lua table of mesh resources:
 *
 *   resource "Mesh" "BirdZipPos" { compressPositions = true, lods = 2, shader = "Bird" }
 *
 * Only the flat key = value pairs are read. The table is advisory: it biases
 * which strategies run for an asset and is never required to decode one.
 */

import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import type { DecodeHints } from './mesh-types'

export type MeshDefValue = boolean | number | string

export interface MeshDef {
  compressPositions?: boolean
  compressUvs?: boolean
  [key: string]: MeshDefValue | undefined
}

const RESOURCE_PATTERN = /resource\s+"Mesh"\s+"([^"]+)"\s*\{([^}]+)\}/g

/** Name fragments the exporter appends to assets with packed vertex data. */
export const SPECIAL_KEYWORDS = ['StripAnim', 'CompOcc', 'ZipPos', 'ZipUvs', 'StripNorm', 'StripUv13', 'CopyFrameDelay']

function parseValue(raw: string): MeshDefValue {
  const v = raw.trim()
  if (v.toLowerCase() === 'true') return true
  if (v.toLowerCase() === 'false') return false
  if (v.length >= 2 && v.startsWith('"') && v.endsWith('"')) return v.slice(1, -1)
  if (/^-?\d+$/.test(v)) return parseInt(v, 10)
  return v
}

export function parseMeshDefs(text: string): Map<string, MeshDef> {
  const defs = new Map<string, MeshDef>()

  for (const match of text.matchAll(RESOURCE_PATTERN)) {
    const [, name, block] = match
    const def: MeshDef = {}
    for (const entry of block.split(',')) {
      const eq = entry.indexOf('=')
      if (eq === -1) continue
      const key = entry.slice(0, eq).trim()
      if (!key) continue
      def[key] = parseValue(entry.slice(eq + 1))
    }
    defs.set(name, def)
  }

  return defs
}

/** Looked up in the working directory when no path is configured. */
export const DEFAULT_MESH_DEFS_FILE = 'MeshDefs.lua'

/** The configured table, else ./MeshDefs.lua when it exists, else null. */
export function resolveMeshDefsPath(configured: string | null, cwd: string = process.cwd()): string | null {
  if (configured) return configured
  const fallback = join(cwd, DEFAULT_MESH_DEFS_FILE)
  return existsSync(fallback) ? fallback : null
}

/** Parse the table at `filepath`; a missing file yields an empty map. */
export function loadMeshDefs(filepath: string): Map<string, MeshDef> {
  if (!existsSync(filepath)) return new Map()
  return parseMeshDefs(readFileSync(filepath, 'utf-8'))
}

/**
 * Decode hints for an asset base name (no extension).
 * Only the name identifies ZipPos layouts; compressPositions alone means the
 * 16-bit quantized encoding.
 */
export function hintsForAsset(name: string, defs: Map<string, MeshDef>): DecodeHints {
  const def = defs.get(name)
  const zipPositions = name.includes('ZipPos')
  const compressed = def?.compressPositions === true
    || def?.compressUvs === true
    || SPECIAL_KEYWORDS.some(k => name.includes(k))
  return { zipPositions, compressed }
}
