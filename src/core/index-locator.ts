/**
 * Index region locator.
 *
 * Quantized and ZipPos payloads do not record where the triangle list starts:
 * the UV and skip regions before it vary in length. The locator walks
 * candidate start offsets from one or more anchors and accepts the first
 * start where `faceCount` consecutive triples all stay below `vertexCount`.
 *
 * Cheap rejections first: a short prefix is bounds-checked and its share of
 * zero indices measured. Scanning into zero padding otherwise produces runs
 * that satisfy the bounds test trivially.
 *
 * Each width is searched at the configured step first, then byte by byte over
 * the offsets the coarse pass skipped, so a run at any alignment is found.
 * 16-bit indices are searched across every anchor before 32-bit ones, and
 * the total number of start offsets examined is capped.
 */

import { DecodeError } from './errors'
import type { IndexWidth } from './extractors'

export interface IndexSearchTunables {
  /** Byte distance between candidate starts in the first pass. */
  step: number
  /** Prefix zero share above which a start is rejected. */
  zeroRatioThreshold: number
  /** Total candidate starts examined across all anchors and widths. */
  maxIterations: number
  /** Triples decoded for the prefix checks. */
  prefixTriples: number
  /** Runs shorter than this are never searched for. */
  minFaceCount: number
  signal?: AbortSignal
}

export interface IndexSearchRequest {
  vertexCount: number
  faceCount: number
  /** Start offsets in priority order; duplicates are searched once. */
  anchors: number[]
  /** Widths to try, in order. */
  widths?: IndexWidth[]
}

export interface IndexRegion {
  offset: number
  width: IndexWidth
  indices: Uint32Array
  /** Candidate starts examined before the match. */
  iterations: number
}

export const DEFAULT_INDEX_SEARCH: IndexSearchTunables = {
  step: 4,
  zeroRatioThreshold: 0.1,
  maxIterations: 5000,
  prefixTriples: 5,
  minFaceCount: 1,
}

function readIndex(dv: DataView, off: number, width: IndexWidth): number {
  return width === 16 ? dv.getUint16(off, true) : dv.getUint32(off, true)
}

/**
 * Check the first `prefixTriples` triples at `start`.
 * Returns false on any out-of-range index or too many zeros.
 */
function prefixLooksLikeIndices(
  dv: DataView,
  start: number,
  width: IndexWidth,
  count: number,
  vertexCount: number,
  zeroRatioThreshold: number,
): boolean {
  const bytes = width / 8
  let zeros = 0
  for (let i = 0; i < count; i++) {
    const idx = readIndex(dv, start + i * bytes, width)
    if (idx >= vertexCount) return false
    if (idx === 0) zeros++
  }
  return zeros / count <= zeroRatioThreshold
}

function readRun(dv: DataView, start: number, width: IndexWidth, count: number, vertexCount: number): Uint32Array | null {
  const bytes = width / 8
  const indices = new Uint32Array(count)
  for (let i = 0; i < count; i++) {
    const idx = readIndex(dv, start + i * bytes, width)
    if (idx >= vertexCount) return null
    indices[i] = idx
  }
  return indices
}

export function locateIndexRegion(
  payload: Buffer,
  request: IndexSearchRequest,
  tunables: IndexSearchTunables = DEFAULT_INDEX_SEARCH,
): IndexRegion {
  const { vertexCount, faceCount } = request
  const widths = request.widths ?? [16, 32]
  const { step, maxIterations, zeroRatioThreshold } = tunables

  if (faceCount < Math.max(1, tunables.minFaceCount)) {
    throw new DecodeError('IndexRegionNotFound', `face count ${faceCount} below minimum ${tunables.minFaceCount}`)
  }
  if (vertexCount <= 0) {
    throw new DecodeError('IndexRegionNotFound', 'no vertices to index')
  }
  if (!(step >= 1)) {
    throw new DecodeError('IndexRegionNotFound', `invalid search step ${step}`)
  }

  const anchors = [...new Set(request.anchors.filter(a => a >= 0))]
  const dv = new DataView(payload.buffer, payload.byteOffset, payload.byteLength)
  const indexCount = faceCount * 3
  const prefixCount = Math.min(faceCount, tunables.prefixTriples) * 3
  let iterations = 0

  const visit = (start: number, width: IndexWidth): Uint32Array | null => {
    if (++iterations > maxIterations) {
      throw new DecodeError(
        'IndexRegionNotFound',
        `no index run of ${faceCount} faces within ${maxIterations} candidate offsets`,
      )
    }
    if (tunables.signal?.aborted) {
      throw new DecodeError('IndexRegionNotFound', 'index search cancelled')
    }
    if (!prefixLooksLikeIndices(dv, start, width, prefixCount, vertexCount, zeroRatioThreshold)) return null
    return readRun(dv, start, width, indexCount, vertexCount)
  }

  for (const width of widths) {
    const lastStart = payload.length - indexCount * (width / 8)
    const seen = new Set<number>()
    // Coarse pass at `step`, then every byte offset the coarse pass skipped
    const passes = step > 1 ? [step, 1] : [step]

    for (const stride of passes) {
      for (const anchor of anchors) {
        for (let start = anchor; start <= lastStart; start += stride) {
          if (seen.has(start)) continue
          seen.add(start)
          const indices = visit(start, width)
          if (indices) return { offset: start, width, indices, iterations }
        }
      }
    }
  }

  throw new DecodeError(
    'IndexRegionNotFound',
    `no index run of ${faceCount} faces below vertex ${vertexCount} (${iterations} offsets examined)`,
  )
}
