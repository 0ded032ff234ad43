/**
 * Canonical mesh representation produced by every strategy.
 *
 * Layout the OBJ writer consumes:
 *   positions  xyz interleaved, 3 floats per vertex
 *   uvs        uv interleaved, either empty or 2 floats per vertex
 *   indices    3 per triangle, widened to uint32
 *   normals    xyz interleaved, only when the layout stores them
 */

import type { DecodeErrorKind } from './errors'

export interface DecodedMesh {
  positions: Float32Array
  uvs: Float32Array
  indices: Uint32Array
  normals?: Float32Array
  vertexCount: number
  faceCount: number
}

export type StrategyName = 'structured-header' | 'heuristic-offset' | 'quantized' | 'index-unknown'

export interface StrategyAttempt {
  strategy: StrategyName
  ok: boolean
  errorKind?: DecodeErrorKind
  message?: string
}

export type ParseOutcome =
  | { ok: true; mesh: DecodedMesh; strategy: StrategyName; attempts: StrategyAttempt[] }
  | { ok: false; error: DecodeErrorKind; message: string; attempts: StrategyAttempt[] }

/** Per-asset hints taken from the file name and the optional metadata table. */
export interface DecodeHints {
  zipPositions: boolean  // 8-bit positions stored at the payload tail
  compressed: boolean    // asset exported with compressPositions/compressUvs
}

export const NO_HINTS: DecodeHints = { zipPositions: false, compressed: false }

export function makeMesh(
  positions: Float32Array,
  uvs: Float32Array,
  indices: Uint32Array,
  normals?: Float32Array,
): DecodedMesh {
  const mesh: DecodedMesh = {
    positions,
    uvs,
    indices,
    vertexCount: positions.length / 3,
    faceCount: Math.floor(indices.length / 3),
  }
  if (normals) mesh.normals = normals
  return mesh
}

/** Largest index referenced by any face, or -1 for an index-less mesh. */
export function maxIndex(indices: Uint32Array): number {
  let max = -1
  for (let i = 0; i < indices.length; i++) {
    if (indices[i] > max) max = indices[i]
  }
  return max
}
