/**
 * Self-describing mesh body.
 *
 * Newer exports start the (decompressed) body with a fixed flags block that
 * records the counts and which vertex streams follow it:
 *
 *   0x00  f32      marker (+inf)
 *   0x04  f32×6    previous bounding box
 *   0x1c  f32×6    bounding box (min xyz, max xyz)
 *   0x34  f32×16   reserved
 *   0x74  u32      vertex count
 *   0x78  u32      corner (index) count
 *   0x7c  u32      non-zero for 32-bit indices
 *   0x80  u32      point count
 *   0x94  u8       non-zero when normals are stored
 *   0x97  u32      non-zero when positions are omitted
 *   0x9b  u32      non-zero when UVs are omitted
 *   0xb3           streams
 *
 * Streams, each present per its flag, one record per vertex:
 *   positions  f32×3 + 4 bytes padding
 *   normals    u8×3 (value / 256) + 1 byte padding
 *   UVs        f16 u, f16 v (stored flipped) + 12 bytes
 *   indices    corner count × u16 (u32 when flagged)
 */

import { DecodeError } from './errors'
import { extractDirectFloat, readFaces } from './extractors'
import { halfToFloat } from './float16'

export const BODY_STREAMS_OFFSET = 0xb3

const POSITION_STRIDE = 16
const NORMAL_STRIDE = 4
const UV_STRIDE = 16

export interface BodyFlags {
  bounds: { min: [number, number, number]; max: [number, number, number] }
  vertexCount: number
  cornerCount: number
  wideIndices: boolean
  pointCount: number
  hasNormals: boolean
  hasPositions: boolean
  hasUvs: boolean
}

export interface BodyStreams {
  positions: Float32Array
  uvs: Float32Array
  normals: Float32Array | null
  indices: Uint32Array
}

export function readBodyFlags(body: Buffer): BodyFlags {
  if (body.length < BODY_STREAMS_OFFSET) {
    throw new DecodeError('SizeMismatch', `body of ${body.length} bytes is shorter than its flags block`)
  }
  const f32 = (off: number) => body.readFloatLE(off)
  return {
    bounds: {
      min: [f32(0x1c), f32(0x20), f32(0x24)],
      max: [f32(0x28), f32(0x2c), f32(0x30)],
    },
    vertexCount: body.readUInt32LE(0x74),
    cornerCount: body.readUInt32LE(0x78),
    wideIndices: body.readUInt32LE(0x7c) !== 0,
    pointCount: body.readUInt32LE(0x80),
    hasNormals: body[0x94] > 0,
    hasPositions: body.readUInt32LE(0x97) === 0,
    hasUvs: body.readUInt32LE(0x9b) === 0,
  }
}

export function extractBodyStreams(body: Buffer, flags: BodyFlags): BodyStreams {
  const n = flags.vertexCount
  if (!flags.hasPositions) {
    throw new DecodeError('MalformedHeader', 'body omits the position stream')
  }

  const { positions, anchor } = extractDirectFloat(body, n, {
    vertexOffset: BODY_STREAMS_OFFSET,
    vertexStride: POSITION_STRIDE,
    uv: null,
  })
  let off = anchor

  let normals: Float32Array | null = null
  if (flags.hasNormals) {
    requireStream(body, off, n * NORMAL_STRIDE, 'normal')
    normals = new Float32Array(n * 3)
    for (let v = 0; v < n; v++) {
      const rec = off + v * NORMAL_STRIDE
      normals[v * 3] = body[rec] / 256
      normals[v * 3 + 1] = body[rec + 1] / 256
      normals[v * 3 + 2] = body[rec + 2] / 256
    }
    off += n * NORMAL_STRIDE
  }

  const uvs = new Float32Array(n * 2)
  if (flags.hasUvs) {
    requireStream(body, off, n * UV_STRIDE, 'UV')
    for (let v = 0; v < n; v++) {
      const rec = off + v * UV_STRIDE
      uvs[v * 2] = halfToFloat(body.readUInt16LE(rec))
      uvs[v * 2 + 1] = 1 - halfToFloat(body.readUInt16LE(rec + 2))
    }
    off += n * UV_STRIDE
  }

  const indices = readFaces(body, off, Math.floor(flags.cornerCount / 3), flags.wideIndices ? 32 : 16)
  return { positions, uvs, normals, indices }
}

function requireStream(body: Buffer, offset: number, bytes: number, what: string): void {
  if (offset + bytes > body.length) {
    throw new DecodeError('SizeMismatch', `${what} stream needs ${offset + bytes} bytes, body has ${body.length}`)
  }
}
