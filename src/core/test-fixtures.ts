/**
 * Synthetic .mesh builders. Payloads are "compressed" with a stored codec,
 * so compressed and uncompressed sizes in the header are equal.
 */

import { DecodeError } from './errors'
import type { BlockCodec } from './lz4'

/** Copies the block through; fails like liblz4 when it does not fit. */
export const storedCodec: BlockCodec = {
  name: 'stored',
  decompress(src, dst) {
    if (src.length > dst.length) return -1
    src.copy(dst)
    return src.length
  },
}

/** The DecodeError `fn` throws; anything else fails the test. */
export function decodeErrorOf(fn: () => unknown): DecodeError {
  try {
    fn()
  } catch (e) {
    if (e instanceof DecodeError) return e
    throw e
  }
  throw new Error('expected a DecodeError')
}

export const PAYLOAD_OFFSET = 0x5a

export interface HeaderOptions {
  magic?: boolean
  boneFlag?: boolean
}

/** Header with sizes at 0x52/0x56 and the payload at 0x5a. */
export function wrapPayload(payload: Buffer, opts: HeaderOptions = {}): Buffer {
  const header = Buffer.alloc(PAYLOAD_OFFSET)
  if (opts.magic) header.writeUInt32LE(0x1f, 0)
  if (opts.boneFlag) header.writeUInt16LE(1, 0x4c)
  header.writeInt32LE(payload.length, 0x52)
  header.writeInt32LE(payload.length, 0x56)
  return Buffer.concat([header, payload])
}

export type Triangle = [number, number, number]

function writeFaces(buf: Buffer, offset: number, faces: Triangle[], width: 16 | 32 = 16): number {
  let off = offset
  for (const face of faces) {
    for (const idx of face) {
      if (width === 16) buf.writeUInt16LE(idx, off)
      else buf.writeUInt32LE(idx, off)
      off += width / 8
    }
  }
  return off
}

// ---- Quantized (range header at 0x60, counts at 0x74) ----

export interface QuantizedOptions {
  vertexCount: number
  faces: Triangle[]
  min: [number, number, number]
  range: [number, number]
  raw: (vertex: number, axis: number) => number
  uv: (vertex: number) => [number, number]
  /** Zero bytes between the UV block and the faces. */
  faceGap?: number
  indexWidth?: 16 | 32
}

export function buildQuantizedPayload(opts: QuantizedOptions): Buffer {
  const n = opts.vertexCount
  const gap = opts.faceGap ?? 0
  const width = opts.indexWidth ?? 16
  const buf = Buffer.alloc(0x7c + n * 6 + n * 4 + gap + opts.faces.length * 3 * (width / 8))

  buf.writeFloatLE(opts.min[0], 0x60)
  buf.writeFloatLE(opts.min[1], 0x64)
  buf.writeFloatLE(opts.min[2], 0x68)
  buf.writeFloatLE(opts.range[0], 0x6c)
  buf.writeFloatLE(opts.range[1], 0x70)
  buf.writeInt32LE(n, 0x74)
  buf.writeInt32LE(opts.faces.length * 3, 0x78)

  let off = 0x7c
  for (let v = 0; v < n; v++) {
    for (let axis = 0; axis < 3; axis++) {
      buf.writeUInt16LE(opts.raw(v, axis), off)
      off += 2
    }
  }
  for (let v = 0; v < n; v++) {
    const [u, w] = opts.uv(v)
    buf.writeUInt16LE(u, off)
    buf.writeUInt16LE(w, off + 2)
    off += 4
  }
  writeFaces(buf, off + gap, opts.faces, width)
  return buf
}

/** Faces (1,2,3), (4,5,6) ... with no zero index. */
export function sequentialFaces(count: number): Triangle[] {
  const faces: Triangle[] = []
  for (let f = 0; f < count; f++) faces.push([f * 3 + 1, f * 3 + 2, f * 3 + 3])
  return faces
}

/** 20 vertices at raw 32768 on every axis, 6 faces, range 10 from origin. */
export function twentyVertexQuantizedFile(): Buffer {
  return wrapPayload(buildQuantizedPayload({
    vertexCount: 20,
    faces: sequentialFaces(6),
    min: [0, 0, 0],
    range: [10, 10],
    raw: () => 32768,
    uv: () => [0, 65535],
  }))
}

// ---- Structured float (vertices at 0xb3, stride 16) ----

export interface StructuredFloatOptions {
  positions: [number, number, number][]
  /** Half-float bit patterns. */
  uvs: [number, number][]
  faces: Triangle[]
  bones?: boolean
}

export function buildStructuredFloatPayload(opts: StructuredFloatOptions): Buffer {
  const n = opts.positions.length
  const boneBytes = opts.bones ? n * 8 : 0
  const buf = Buffer.alloc(0xb3 + n * 16 + n * 4 + n * 16 + boneBytes + opts.faces.length * 6)

  buf.writeInt32LE(n, 0x74)
  buf.writeInt32LE(opts.faces.length * 3, 0x78)

  let off = 0xb3
  for (const [x, y, z] of opts.positions) {
    buf.writeFloatLE(x, off)
    buf.writeFloatLE(y, off + 4)
    buf.writeFloatLE(z, off + 8)
    off += 16
  }
  off += n * 4
  for (const [u, v] of opts.uvs) {
    buf.writeUInt16LE(u, off)
    buf.writeUInt16LE(v, off + 2)
    off += 16
  }
  buf.fill(0xab, off, off + boneBytes)
  writeFaces(buf, off + boneBytes, opts.faces)
  return buf
}

// ---- Normalized byte (ZipPos) ----

export interface ZipPosOptions {
  /** u8 x, y, z per vertex; byte 0 of each record is written as 0. */
  vertices: [number, number, number][]
  faces: Triangle[]
  /** uint16 UV pairs placed between the faces and the vertex block. */
  companionUvs?: [number, number][]
  /** Where the faces start; zero-filled up to there. Default 0x7c. */
  faceOffset?: number
}

/** Counts at 0x74, faces at 0x7c, optional UVs, vertex block at the tail. */
export function buildZipPosPayload(opts: ZipPosOptions): Buffer {
  const n = opts.vertices.length
  const faceOffset = opts.faceOffset ?? 0x7c
  const uvBytes = opts.companionUvs ? opts.companionUvs.length * 4 : 0
  const buf = Buffer.alloc(faceOffset + opts.faces.length * 6 + uvBytes + n * 4)

  buf.writeInt32LE(n, 0x74)
  buf.writeInt32LE(opts.faces.length * 3, 0x78)

  let off = writeFaces(buf, faceOffset, opts.faces)
  for (const [u, v] of opts.companionUvs ?? []) {
    buf.writeUInt16LE(u, off)
    buf.writeUInt16LE(v, off + 2)
    off += 4
  }
  for (const [x, y, z] of opts.vertices) {
    buf[off + 1] = x
    buf[off + 2] = y
    buf[off + 3] = z
    off += 4
  }
  return buf
}

// ---- Heuristic float (counts at 0x74, vertices at 0xb3) ----

export interface HeuristicOptions {
  positions: [number, number, number][]
  /** Half-float bit patterns. */
  uvs: [number, number][]
  faces: Triangle[]
}

/** [vertices 16B][skip 4N - 4][UV records 16B, (u, v) at +4][4 bytes][u16 faces] */
export function buildHeuristicPayload(opts: HeuristicOptions): Buffer {
  const n = opts.positions.length
  const buf = Buffer.alloc(0xb3 + n * 16 + (n * 4 - 4) + n * 16 + 4 + opts.faces.length * 6)

  buf.writeInt32LE(n, 0x74)
  buf.writeInt32LE(opts.faces.length * 3, 0x78)

  let off = 0xb3
  for (const [x, y, z] of opts.positions) {
    buf.writeFloatLE(x, off)
    buf.writeFloatLE(y, off + 4)
    buf.writeFloatLE(z, off + 8)
    off += 16
  }
  off += n * 4 - 4
  for (const [u, v] of opts.uvs) {
    buf.writeUInt16LE(u, off + 4)
    buf.writeUInt16LE(v, off + 6)
    off += 16
  }
  writeFaces(buf, off + 4, opts.faces)
  return buf
}

// ---- Legacy (counts at 0x20, packed float vertices at 0xb3) ----

/** Counts at 0x20, float32×3 vertices at 0xb3 with no padding, faces right after. */
export function buildLegacyPayload(positions: [number, number, number][], faces: Triangle[]): Buffer {
  const n = positions.length
  const buf = Buffer.alloc(0xb3 + n * 12 + faces.length * 6)

  buf.writeInt32LE(n, 0x20)
  buf.writeInt32LE(faces.length * 3, 0x24)

  let off = 0xb3
  for (const [x, y, z] of positions) {
    buf.writeFloatLE(x, off)
    buf.writeFloatLE(y, off + 4)
    buf.writeFloatLE(z, off + 8)
    off += 12
  }
  writeFaces(buf, off, faces)
  return buf
}

// ---- Self-describing body (flags block, sizes at 0x4e/0x52) ----

export const BODY_OFFSET = 0x56

export interface BodyOptions {
  positions: [number, number, number][]
  /** Raw normal bytes per vertex. */
  normals?: [number, number, number][]
  /** Half-float bit patterns, v as stored. */
  uvs?: [number, number][]
  faces: Triangle[]
  wideIndices?: boolean
}

export function buildBody(opts: BodyOptions): Buffer {
  const n = opts.positions.length
  const width = opts.wideIndices ? 32 : 16
  const buf = Buffer.alloc(
    0xb3 + n * 16 + (opts.normals ? n * 4 : 0) + (opts.uvs ? n * 16 : 0) + opts.faces.length * 3 * (width / 8),
  )

  buf.writeFloatLE(Infinity, 0)
  for (let axis = 0; axis < 3; axis++) {
    const values = opts.positions.map(p => p[axis])
    buf.writeFloatLE(Math.min(...values), 0x1c + axis * 4)
    buf.writeFloatLE(Math.max(...values), 0x28 + axis * 4)
  }
  buf.writeUInt32LE(n, 0x74)
  buf.writeUInt32LE(opts.faces.length * 3, 0x78)
  buf.writeUInt32LE(opts.wideIndices ? 1 : 0, 0x7c)
  buf.writeUInt32LE(n, 0x80)
  buf[0x94] = opts.normals ? 1 : 0
  buf.writeUInt32LE(opts.uvs ? 0 : 1, 0x9b)

  let off = 0xb3
  for (const [x, y, z] of opts.positions) {
    buf.writeFloatLE(x, off)
    buf.writeFloatLE(y, off + 4)
    buf.writeFloatLE(z, off + 8)
    off += 16
  }
  for (const [x, y, z] of opts.normals ?? []) {
    buf[off] = x
    buf[off + 1] = y
    buf[off + 2] = z
    off += 4
  }
  for (const [u, v] of opts.uvs ?? []) {
    buf.writeUInt16LE(u, off)
    buf.writeUInt16LE(v, off + 2)
    off += 16
  }
  writeFaces(buf, off, opts.faces, width)
  return buf
}

/**
 * Sizes at 0x4e/0x52 and the payload at 0x56, the placement heuristic-4e and
 * body layouts share. Equal sizes mean a stored body.
 */
export function wrapPayload4e(body: Buffer, compressed: Buffer = body): Buffer {
  const header = Buffer.alloc(BODY_OFFSET)
  header.writeInt32LE(compressed.length, 0x4e)
  header.writeInt32LE(body.length, 0x52)
  return Buffer.concat([header, compressed])
}

/** Stands in for LZ4 by always producing `body`. */
export function cannedCodec(body: Buffer): BlockCodec {
  return {
    name: 'canned',
    decompress(_src, dst) {
      if (body.length > dst.length) return -1
      body.copy(dst)
      return body.length
    },
  }
}
