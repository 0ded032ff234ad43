/**
 * Batch driver: decode each .mesh file in turn and write <name>.obj beside
 * the others in the output directory. Files are independent; one failure is
 * recorded and the batch moves on.
 */

import { readFileSync } from 'fs'
import { basename, extname, join } from 'path'
import type { DecoderConfig } from './config'
import type { BlockCodec } from './lz4'
import { decodeMesh } from './mesh-decoder'
import { hintsForAsset, type MeshDef } from './mesh-defs'
import { writeObj, type ObjExportStats } from './obj-writer'
import { strategiesForMode } from './strategies'
import type { BatchResult } from './report'
import { log, warn } from './logger'

export interface BatchOptions {
  codec: BlockCodec
  config: DecoderConfig
  defs?: Map<string, MeshDef>
  trace?: (msg: string) => void
  signal?: AbortSignal
}

/** Asset name used for metadata lookup and the output file name. */
export function assetName(filepath: string): string {
  return basename(filepath, extname(filepath))
}

export function objPathFor(filepath: string, outputDir: string): string {
  return join(outputDir, `${assetName(filepath)}.obj`)
}

export function convertFile(filepath: string, options: BatchOptions): BatchResult {
  const { codec, config } = options
  const name = assetName(filepath)
  const started = performance.now()
  const elapsed = () => performance.now() - started

  let data: Buffer
  try {
    data = readFileSync(filepath)
  } catch (e) {
    return failed(filepath, elapsed(), e instanceof Error ? e.message : String(e))
  }

  const outcome = decodeMesh(data, {
    codec,
    hints: hintsForAsset(name, options.defs ?? new Map()),
    minVertexCount: config.minVertexCount,
    search: {
      step: config.indexSearchStep,
      maxIterations: config.maxIndexIterations,
      zeroRatioThreshold: config.zeroRatioThreshold,
      signal: options.signal,
    },
    trace: options.trace,
    strategies: strategiesForMode(config.mode),
  })

  if (!outcome.ok) return failed(filepath, elapsed(), outcome.message)

  const { mesh, strategy } = outcome
  let stats: ObjExportStats
  try {
    stats = writeObj(objPathFor(filepath, config.outputDir), mesh, { exportUvs: config.exportUvs })
  } catch (e) {
    return failed(filepath, elapsed(), `writing OBJ: ${e instanceof Error ? e.message : String(e)}`)
  }
  if (stats.skipped > 0) warn(`${name}: skipped ${stats.skipped} degenerate faces`)

  return {
    file: filepath,
    status: 'success',
    vertexCount: mesh.vertexCount,
    faceCount: mesh.faceCount,
    strategy,
    elapsedMs: elapsed(),
  }
}

function failed(file: string, elapsedMs: number, error: string): BatchResult {
  return { file, status: 'failed', vertexCount: 0, faceCount: 0, strategy: null, elapsedMs, error }
}

export function processFiles(files: string[], options: BatchOptions): BatchResult[] {
  const results: BatchResult[] = []

  files.forEach((file, i) => {
    log(`[${i + 1}/${files.length}] ${basename(file)}`)
    const r = convertFile(file, options)
    if (r.status === 'success') {
      log(`  ok: ${r.vertexCount} vertices, ${r.faceCount} faces via ${r.strategy} (${(r.elapsedMs / 1000).toFixed(2)}s)`)
    } else {
      warn(`  failed: ${r.error}`)
    }
    results.push(r)
  })

  return results
}
