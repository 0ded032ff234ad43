/**
 * Field extractors for the three positional encodings found in .mesh payloads.
 *
 * Direct float (uncompressed exports):
 *   +0:  float32×3 position + padding up to the vertex stride
 *   then an optional skip, then one UV record per vertex:
 *   +k:  float16×2 (or float32×2) UV inside a fixed-size record
 *   then a fixed skip and uint16×3 faces
 *
 * Quantized (compressPositions exports):
 *   header: float32 min_x, min_y, min_z, range_x, range_y   (range_z = range_y)
 *   uint16×3 position per vertex, then uint16×2 UV per vertex,
 *   faces at an offset that has to be searched for
 *
 * Normalized byte (ZipPos exports):
 *   uint8×4 per vertex appended at the very end of the payload,
 *   byte 0 unused, bytes 1..3 are x, y, z centred on 128
 *
 * Every extractor returns the positions, the UVs (zeroed when absent) and
 * the byte offset right after the UV block, which seeds the index search.
 */

import { DecodeError } from './errors'
import { dequantize16, halfToFloat, normalizeByte, normalizeUint16 } from './float16'

// ---- Types ----

export interface ExtractedFields {
  positions: Float32Array
  uvs: Float32Array
  anchor: number
}

export interface UvBlockLayout {
  skip: number              // bytes between the vertex block and the first UV record
  stride: number            // bytes per UV record
  fieldOffset: number       // where the (u, v) pair sits inside a record
  encoding: 'half' | 'float32'
  overflow: 'error' | 'default'
}

export interface DirectFloatLayout {
  vertexOffset: number
  vertexStride: number      // >= 12; anything past the xyz floats is padding
  uv: UvBlockLayout | null
}

export interface QuantizationRange {
  min: [number, number, number]
  range: [number, number, number]
}

export interface QuantizedLayout {
  /** Offset of the five-float range header, or null for raw integer grids. */
  rangeHeaderOffset: number | null
  vertexOffset: number
}

export type IndexWidth = 16 | 32

/** Range used when a layout stores positions on the raw uint16 grid. */
export const IDENTITY_RANGE: QuantizationRange = {
  min: [0, 0, 0],
  range: [65535, 65535, 65535],
}

function viewOf(buf: Buffer): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength)
}

function requireBytes(payload: Buffer, end: number, what: string): void {
  if (end > payload.length) {
    throw new DecodeError('SizeMismatch', `${what} needs ${end} bytes, payload has ${payload.length}`)
  }
}

// ---- Direct float ----

export function extractDirectFloat(payload: Buffer, vertexCount: number, layout: DirectFloatLayout): ExtractedFields {
  const { vertexOffset, vertexStride, uv } = layout
  const dv = viewOf(payload)

  if (vertexCount > 0) {
    requireBytes(payload, vertexOffset + (vertexCount - 1) * vertexStride + 12, 'float vertex block')
  }

  const positions = new Float32Array(vertexCount * 3)
  for (let v = 0; v < vertexCount; v++) {
    const off = vertexOffset + v * vertexStride
    positions[v * 3] = dv.getFloat32(off, true)
    positions[v * 3 + 1] = dv.getFloat32(off + 4, true)
    positions[v * 3 + 2] = dv.getFloat32(off + 8, true)
  }

  const vertexEnd = vertexOffset + vertexCount * vertexStride
  if (!uv) {
    return { positions, uvs: new Float32Array(vertexCount * 2), anchor: vertexEnd }
  }

  const uvStart = vertexEnd + uv.skip
  const fieldBytes = uv.encoding === 'half' ? 4 : 8
  const uvs = new Float32Array(vertexCount * 2)

  for (let v = 0; v < vertexCount; v++) {
    const off = uvStart + v * uv.stride + uv.fieldOffset
    if (off + fieldBytes > payload.length) {
      if (uv.overflow === 'error') requireBytes(payload, off + fieldBytes, 'UV block')
      continue // stays (0, 0)
    }
    if (uv.encoding === 'half') {
      uvs[v * 2] = halfToFloat(dv.getUint16(off, true))
      uvs[v * 2 + 1] = halfToFloat(dv.getUint16(off + 2, true))
    } else {
      uvs[v * 2] = dv.getFloat32(off, true)
      uvs[v * 2 + 1] = dv.getFloat32(off + 4, true)
    }
  }

  return { positions, uvs, anchor: uvStart + vertexCount * uv.stride }
}

// ---- Faces ----

/** Read `faceCount` contiguous index triples. */
export function readFaces(payload: Buffer, offset: number, faceCount: number, width: IndexWidth): Uint32Array {
  const bytes = width === 16 ? 2 : 4
  requireBytes(payload, offset + faceCount * 3 * bytes, `${width}-bit index block`)

  const dv = viewOf(payload)
  const indices = new Uint32Array(faceCount * 3)
  for (let i = 0; i < indices.length; i++) {
    const off = offset + i * bytes
    indices[i] = width === 16 ? dv.getUint16(off, true) : dv.getUint32(off, true)
  }
  return indices
}

// ---- Quantized ----

/**
 * Read the range header. Only five floats exist: the encoder never writes a
 * separate z range, so range_z reuses range_y. Kept as-is; the exact meaning
 * is unconfirmed.
 */
export function readQuantizationRange(payload: Buffer, offset: number): QuantizationRange {
  requireBytes(payload, offset + 20, 'quantization header')
  const dv = viewOf(payload)
  const minX = dv.getFloat32(offset, true)
  const minY = dv.getFloat32(offset + 4, true)
  const minZ = dv.getFloat32(offset + 8, true)
  const rangeX = dv.getFloat32(offset + 12, true)
  const rangeY = dv.getFloat32(offset + 16, true)
  return { min: [minX, minY, minZ], range: [rangeX, rangeY, rangeY] }
}

export function extractQuantized(
  payload: Buffer,
  vertexCount: number,
  layout: QuantizedLayout,
): ExtractedFields & { range: QuantizationRange } {
  const range = layout.rangeHeaderOffset === null
    ? IDENTITY_RANGE
    : readQuantizationRange(payload, layout.rangeHeaderOffset)

  const { vertexOffset } = layout
  requireBytes(payload, vertexOffset + vertexCount * 6, 'quantized vertex block')

  const dv = viewOf(payload)
  const positions = new Float32Array(vertexCount * 3)
  for (let v = 0; v < vertexCount; v++) {
    const off = vertexOffset + v * 6
    for (let axis = 0; axis < 3; axis++) {
      const raw = dv.getUint16(off + axis * 2, true)
      positions[v * 3 + axis] = dequantize16(raw, range.min[axis], range.range[axis])
    }
  }

  // UVs follow directly; a truncated tail leaves the remaining entries at (0, 0)
  const uvStart = vertexOffset + vertexCount * 6
  const uvs = new Float32Array(vertexCount * 2)
  for (let v = 0; v < vertexCount; v++) {
    const off = uvStart + v * 4
    if (off + 4 > payload.length) break
    uvs[v * 2] = normalizeUint16(dv.getUint16(off, true))
    uvs[v * 2 + 1] = normalizeUint16(dv.getUint16(off + 2, true))
  }

  return { positions, uvs, anchor: uvStart + vertexCount * 4, range }
}

// ---- Normalized byte ----

/** Start of the tail-anchored 4-byte vertex block. */
export function normalizedBlockStart(payloadLength: number, vertexCount: number): number {
  return payloadLength - vertexCount * 4
}

export function extractNormalizedBytes(payload: Buffer, vertexCount: number): ExtractedFields {
  const start = normalizedBlockStart(payload.length, vertexCount)
  if (vertexCount <= 0 || start < 0) {
    throw new DecodeError(
      'SizeMismatch',
      `normalized vertex block needs ${vertexCount * 4} bytes, payload has ${payload.length}`,
    )
  }

  const positions = new Float32Array(vertexCount * 3)
  for (let v = 0; v < vertexCount; v++) {
    const off = start + v * 4
    // byte 0 is unused
    positions[v * 3] = normalizeByte(payload[off + 1])
    positions[v * 3 + 1] = normalizeByte(payload[off + 2])
    positions[v * 3 + 2] = normalizeByte(payload[off + 3])
  }

  return { positions, uvs: new Float32Array(vertexCount * 2), anchor: start }
}

/**
 * ZipPos exports occasionally keep a uint16×2 UV block between the index
 * region and the vertex block. It is only trusted when the gap is exactly one
 * 4-byte record per vertex.
 */
export function detectCompanionUvs(
  payload: Buffer,
  indexEnd: number,
  vertexStart: number,
  vertexCount: number,
): Float32Array | null {
  if (vertexCount <= 0 || vertexStart - indexEnd !== vertexCount * 4) return null
  if (indexEnd < 0 || vertexStart > payload.length) return null

  const dv = viewOf(payload)
  const uvs = new Float32Array(vertexCount * 2)
  for (let v = 0; v < vertexCount; v++) {
    const off = indexEnd + v * 4
    uvs[v * 2] = normalizeUint16(dv.getUint16(off, true))
    uvs[v * 2 + 1] = normalizeUint16(dv.getUint16(off + 2, true))
  }
  return uvs
}
