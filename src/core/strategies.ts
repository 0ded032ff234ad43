/**
 * Parse strategies, one per layout hypothesis family.
 *
 * A strategy owns a slice of the layout candidate table and an encoding
 * family. It walks its candidates in order and returns the first mesh the
 * plausibility check accepts; any DecodeError on a candidate moves on to the
 * next one and the last error is rethrown when nothing is left.
 *
 * Payload offsets used below (decompressed buffer):
 *   0x34  u32 vertex count, 0x38 u32 index count   (newer quantized exports)
 *   0x60  float32×5 quantization header           (older quantized exports)
 *   0x74  u32 vertex count, 0x78 u32 index count
 *   0x7c  first byte after the count block
 *   0x00..0xb3 flags block of self-describing bodies (see mesh-body.ts)
 *   0xb3  float vertex block (structured and heuristic exports)
 */

import { DecodeError } from './errors'
import {
  detectCompanionUvs,
  extractDirectFloat,
  extractNormalizedBytes,
  extractQuantized,
  readFaces,
  type ExtractedFields,
  type IndexWidth,
  type QuantizedLayout,
} from './extractors'
import { locateIndexRegion, type IndexSearchTunables } from './index-locator'
import {
  allLayoutCandidates,
  MAX_UNCOMPRESSED_SIZE,
  hasStructuredMagic,
  layoutCandidates,
  readCompressedBlock,
  readLodCount,
  selectBlocks,
  stripNamePrefix,
  STRUCTURED_BONE_FLAG_OFFSET,
  type CompressedBlock,
} from './layouts'
import { decompressBlock, type BlockCodec } from './lz4'
import { extractBodyStreams, readBodyFlags } from './mesh-body'
import { makeMesh, type DecodedMesh, type DecodeHints, type StrategyName } from './mesh-types'

// ---- Types ----

export interface StrategyContext {
  codec: BlockCodec
  hints: DecodeHints
  search: IndexSearchTunables
  /** Reason a mesh is implausible, or null when it is acceptable. */
  explain: (mesh: DecodedMesh) => string | null
  trace: (msg: string) => void
}

export interface ParseStrategy {
  name: StrategyName
  /** False when the hints rule this strategy out for the asset. */
  appliesTo?(hints: DecodeHints): boolean
  run(file: Buffer, ctx: StrategyContext): DecodedMesh
}

// ---- Constants ----

const COUNT_BLOCK_END = 0x7c
const FLOAT_VERTEX_START = 0xb3
const MAX_SHARED_VERTICES = 100000
const MAX_INDEX_COUNT = 300000

// ---- Helpers ----

function decompress(ctx: StrategyContext, block: CompressedBlock): Buffer {
  const { candidate, compressed, uncompressedSize } = block
  const payload = decompressBlock(ctx.codec, compressed, compressed.length, uncompressedSize)
  ctx.trace(`  ${candidate.id}: ${compressed.length} -> ${payload.length} bytes`)
  return payload
}

function readI32(buf: Buffer, off: number): number | null {
  return off >= 0 && off + 4 <= buf.length ? buf.readInt32LE(off) : null
}

function countsLookValid(shared: number | null, total: number | null, minimum = 0): boolean {
  if (shared === null || total === null) return false
  return shared >= minimum && shared < MAX_SHARED_VERTICES
    && total >= minimum && total < MAX_INDEX_COUNT && total % 3 === 0
}

/**
 * Run `build` for each item until one yields a plausible mesh. DecodeErrors
 * are recorded and the next item is tried; anything else propagates.
 */
function firstPlausible<T>(
  items: Iterable<T>,
  ctx: StrategyContext,
  label: (item: T) => string,
  build: (item: T) => DecodedMesh,
): DecodedMesh {
  let last: DecodeError | null = null

  for (const item of items) {
    try {
      const mesh = build(item)
      const reason = ctx.explain(mesh)
      if (reason === null) return mesh
      last = new DecodeError('ImplausibleResult', `${label(item)}: ${reason}`)
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e
      last = e
    }
    ctx.trace(`  ${label(item)}: [${last.kind}] ${last.message}`)
  }

  throw last ?? new DecodeError('MalformedHeader', 'no layout candidate applied')
}

function requireBlocks(blocks: CompressedBlock[], family: string): CompressedBlock[] {
  if (blocks.length === 0) {
    throw new DecodeError('MalformedHeader', `no ${family} layout passes the size gate`)
  }
  return blocks
}

function searchWidths(block: CompressedBlock): IndexWidth[] {
  return block.candidate.indexWidth === 'fixed16' ? [16] : [16, 32]
}

// ---------------------------------------------------------------------------
// 1. Structured header
// ---------------------------------------------------------------------------

const STORED_BODY_MAX_COMPRESSED = 10

/**
 * Body at 0x56 behind sizes at 0x4e/0x52. A compressed size above 10 that is
 * smaller than the body means LZ4; anything else was written stored.
 */
function readBody(file: Buffer, ctx: StrategyContext): Buffer {
  const [candidate] = layoutCandidates('body')
  const cs = readI32(file, candidate.compressedSizeOffset)
  const us = readI32(file, candidate.uncompressedSizeOffset)
  if (cs === null || us === null) {
    throw new DecodeError('MalformedHeader', `file of ${file.length} bytes ends inside the body header`)
  }
  if (!(us > 0 && us < MAX_UNCOMPRESSED_SIZE)) {
    throw new DecodeError('SizeMismatch', `body size ${us} out of range`)
  }

  if (cs > STORED_BODY_MAX_COMPRESSED && cs < us) {
    const block = readCompressedBlock(file, candidate)
    if (!block) {
      throw new DecodeError('SizeMismatch', `compressed body of ${cs} bytes runs past the end of the file`)
    }
    return decompress(ctx, block)
  }

  const end = candidate.payloadOffset + us
  if (end > file.length) {
    throw new DecodeError('SizeMismatch', `stored body of ${us} bytes runs past the end of the file`)
  }
  ctx.trace(`  ${candidate.id}: stored body of ${us} bytes`)
  return file.subarray(candidate.payloadOffset, end)
}

/** Exports whose body opens with a flags block naming its streams. */
function bodyFlagsMesh(file: Buffer, ctx: StrategyContext): DecodedMesh {
  const body = readBody(stripNamePrefix(file) ?? file, ctx)
  const flags = readBodyFlags(body)
  ctx.trace(`  body: vertices=${flags.vertexCount} corners=${flags.cornerCount} idx32=${flags.wideIndices} normals=${flags.hasNormals}`)
  if (!countsLookValid(flags.vertexCount, flags.cornerCount, 1)) {
    throw new DecodeError('SizeMismatch', `body counts out of range (${flags.vertexCount}, ${flags.cornerCount})`)
  }

  const { positions, uvs, normals, indices } = extractBodyStreams(body, flags)
  return makeMesh(positions, uvs, indices, normals ?? undefined)
}

/**
 * Exports starting with the 0x1F magic carry a fixed header: sizes at
 * 0x52/0x56, payload at 0x5a, bone flag at 0x4c. Inside the payload the
 * vertex and index counts sit at 0x74/0x78 and the vertex block at 0xb3.
 *
 *   float export:  [vertices 16B each][skip 4B/vertex][UV records 16B][bones 8B/vertex][u16 faces]
 *   ZipPos export: [bones 8B/vertex][u16 faces] ... [u8×4 vertices at the tail]
 */
function fixedHeaderMesh(file: Buffer, ctx: StrategyContext): DecodedMesh {
  if (!hasStructuredMagic(file)) {
    throw new DecodeError('MalformedHeader', 'missing 0x1F structured header magic')
  }
  const [candidate] = layoutCandidates('structured')
  const block = readCompressedBlock(file, candidate)
  if (!block) {
    throw new DecodeError('MalformedHeader', 'structured header sizes fail the size gate')
  }

  const payload = decompress(ctx, block)
  const hasBones = file.readUInt16LE(STRUCTURED_BONE_FLAG_OFFSET) === 1
  const vertexCount = readI32(payload, 0x74)
  const indexCount = readI32(payload, 0x78)
  if (vertexCount === null || indexCount === null || vertexCount <= 0 || indexCount <= 0) {
    throw new DecodeError('SizeMismatch', `payload of ${payload.length} bytes has no count block`)
  }
  const faceCount = Math.floor(indexCount / 3)
  const boneSkip = hasBones ? vertexCount * 8 : 0
  ctx.trace(`  vertices=${vertexCount} indices=${indexCount} bones=${hasBones}`)

  if (ctx.hints.zipPositions) {
    const indices = readFaces(payload, FLOAT_VERTEX_START + boneSkip, faceCount, 16)
    const { positions, uvs } = extractNormalizedBytes(payload, vertexCount)
    return makeMesh(positions, uvs, indices)
  }

  const fields = extractDirectFloat(payload, vertexCount, {
    vertexOffset: FLOAT_VERTEX_START,
    vertexStride: 16,
    uv: { skip: vertexCount * 4, stride: 16, fieldOffset: 0, encoding: 'half', overflow: 'error' },
  })
  const indices = readFaces(payload, fields.anchor + boneSkip, faceCount, 16)
  return makeMesh(fields.positions, fields.uvs, indices)
}

const STRUCTURED_VARIANTS: readonly { label: string; build: (file: Buffer, ctx: StrategyContext) => DecodedMesh }[] = [
  { label: 'body-flags', build: bodyFlagsMesh },
  { label: 'structured-v31', build: fixedHeaderMesh },
]

/** Self-describing body first, then the fixed 0x1F header layout. */
export const structuredHeaderStrategy: ParseStrategy = {
  name: 'structured-header',

  run(file, ctx) {
    return firstPlausible(STRUCTURED_VARIANTS, ctx, v => v.label, v => v.build(file, ctx))
  },
}

/** The self-describing body layout on its own. */
export const bodyFlagsStrategy: ParseStrategy = {
  name: 'structured-header',

  run: bodyFlagsMesh,
}

// ---------------------------------------------------------------------------
// 2. Heuristic offset table
// ---------------------------------------------------------------------------

function heuristicFromPayload(payload: Buffer, countOffset: number): DecodedMesh {
  const shared = readI32(payload, countOffset)
  const total = readI32(payload, countOffset + 4)
  if (shared === null || total === null || !countsLookValid(shared, total)) {
    throw new DecodeError('SizeMismatch', `counts at 0x${countOffset.toString(16)} out of range (${shared}, ${total})`)
  }

  // UV count shares the vertex count field; a (count*4 - 4) byte header precedes the records
  const fields = extractDirectFloat(payload, shared, {
    vertexOffset: FLOAT_VERTEX_START,
    vertexStride: 16,
    uv: { skip: Math.max(0, shared * 4 - 4), stride: 16, fieldOffset: 4, encoding: 'half', overflow: 'error' },
  })
  const indices = readFaces(payload, fields.anchor + 4, total / 3, 16)
  return makeMesh(fields.positions, fields.uvs, indices)
}

export const heuristicOffsetStrategy: ParseStrategy = {
  name: 'heuristic-offset',

  appliesTo(hints) {
    return !hints.compressed
  },

  run(file, ctx) {
    const sources: { label: string; data: Buffer }[] = [{ label: 'file', data: file }]
    const stripped = stripNamePrefix(file)
    if (stripped) sources.push({ label: 'stripped', data: stripped })

    const attempts = sources.flatMap(src =>
      selectBlocks(src.data, layoutCandidates('heuristic')).map(block => ({ src, block })))

    requireBlocks(attempts.map(a => a.block), 'heuristic')

    return firstPlausible(
      attempts,
      ctx,
      a => `${a.src.label}/${a.block.candidate.id}`,
      ({ src, block }) => {
        const lods = readLodCount(src.data, block.candidate)
        if (lods !== null) ctx.trace(`  ${block.candidate.id}: lods=${lods}`)
        const payload = decompress(ctx, block)
        return firstPlausible(
          block.candidate.vertexCountOffsets,
          ctx,
          off => `${block.candidate.id}@0x${off.toString(16)}`,
          off => heuristicFromPayload(payload, off),
        )
      },
    )
  },
}

// ---------------------------------------------------------------------------
// 3. Quantized / compressed positions
// ---------------------------------------------------------------------------

interface QuantizedVariant {
  label: string
  vertexCount: number
  indexCount: number
  layout: QuantizedLayout
}

/**
 * Newer exports move the counts to 0x34/0x38 and store positions on the raw
 * uint16 grid at 0x60; older ones keep counts at 0x74/0x78 behind a range
 * header at 0x60.
 */
function quantizedVariants(payload: Buffer): QuantizedVariant[] {
  const variants: QuantizedVariant[] = []

  const newShared = readI32(payload, 0x34)
  const newTotal = readI32(payload, 0x38)
  if (newShared !== null && newTotal !== null && countsLookValid(newShared, newTotal) && newShared > 0 && newTotal > 0) {
    variants.push({
      label: 'counts@0x34',
      vertexCount: newShared,
      indexCount: newTotal,
      layout: { rangeHeaderOffset: null, vertexOffset: 0x60 },
    })
  }

  const shared = readI32(payload, 0x74)
  const total = readI32(payload, 0x78)
  if (shared !== null && total !== null && countsLookValid(shared, total) && shared > 0 && total > 0) {
    variants.push({
      label: 'range@0x60',
      vertexCount: shared,
      indexCount: total,
      layout: { rangeHeaderOffset: 0x60, vertexOffset: COUNT_BLOCK_END },
    })
  }

  return variants
}

function quantizedFromPayload(payload: Buffer, block: CompressedBlock, ctx: StrategyContext): DecodedMesh {
  const variants = quantizedVariants(payload)
  if (variants.length === 0) {
    throw new DecodeError('SizeMismatch', 'no plausible vertex/index counts in quantized payload')
  }

  return firstPlausible(variants, ctx, v => `${block.candidate.id}/${v.label}`, v => {
    const fields = extractQuantized(payload, v.vertexCount, v.layout)
    const region = locateIndexRegion(payload, {
      vertexCount: v.vertexCount,
      faceCount: Math.floor(v.indexCount / 3),
      anchors: [fields.anchor, COUNT_BLOCK_END, 0],
      widths: searchWidths(block),
    }, ctx.search)
    ctx.trace(`  index region at 0x${region.offset.toString(16)} (${region.width}-bit, ${region.iterations} offsets)`)
    return makeMesh(fields.positions, fields.uvs, region.indices)
  })
}

function normalizedFromPayload(payload: Buffer, block: CompressedBlock, ctx: StrategyContext): DecodedMesh {
  const shared = readI32(payload, 0x74)
  const total = readI32(payload, 0x78)
  if (shared === null || total === null || shared <= 0 || total <= 0) {
    throw new DecodeError('SizeMismatch', `ZipPos counts unusable (${shared}, ${total})`)
  }

  const fields: ExtractedFields = extractNormalizedBytes(payload, shared)
  // Nothing fixes the alignment of the face run after the count block; walk it byte by byte
  const region = locateIndexRegion(payload, {
    vertexCount: shared,
    faceCount: Math.floor(total / 3),
    anchors: [COUNT_BLOCK_END, 0],
    widths: searchWidths(block),
  }, { ...ctx.search, step: 1 })
  ctx.trace(`  index region at 0x${region.offset.toString(16)} (${region.width}-bit, ${region.iterations} offsets)`)

  const indexEnd = region.offset + region.indices.length * (region.width / 8)
  const companion = detectCompanionUvs(payload, indexEnd, fields.anchor, shared)
  if (companion) ctx.trace('  companion UV block found before the vertex block')
  return makeMesh(fields.positions, companion ?? fields.uvs, region.indices)
}

export const quantizedStrategy: ParseStrategy = {
  name: 'quantized',

  run(file, ctx) {
    const blocks = requireBlocks(selectBlocks(file, layoutCandidates('compressed')), 'compressed')

    return firstPlausible(blocks, ctx, b => b.candidate.id, block => {
      const payload = decompress(ctx, block)
      if (payload.length < COUNT_BLOCK_END) {
        throw new DecodeError('SizeMismatch', `payload of ${payload.length} bytes ends before the count block`)
      }

      const shared = payload.readInt32LE(0x74)
      const total = payload.readInt32LE(0x78)
      const zip = ctx.hints.zipPositions
        || shared > MAX_SHARED_VERTICES || shared === 0 || total % 3 !== 0 || total > 1000000
      ctx.trace(`  shared=${shared} total=${total} family=${zip ? 'normalized-byte' : 'quantized'}`)

      return zip ? normalizedFromPayload(payload, block, ctx) : quantizedFromPayload(payload, block, ctx)
    })
  },
}

// ---------------------------------------------------------------------------
// 4. Index unknown (legacy last resort)
// ---------------------------------------------------------------------------

const LEGACY_VERTEX_STARTS = [0xb3, 0x60, 0x70, 0x80, 0x90]
const LEGACY_STRIDES = [12, 16, 20, 24, 8]
const LEGACY_MAX_COORD = 10000

interface LegacyGuess {
  countOffset: number
  vertexCount: number
  indexCount: number
  vertexStart: number
  stride: number
}

function* legacyGuesses(payload: Buffer): Generator<LegacyGuess> {
  for (let off = 0x20; off < 0x100; off += 4) {
    if (off + 8 > payload.length) break
    const shared = payload.readUInt32LE(off)
    const total = payload.readUInt32LE(off + 4)
    if (!(shared >= 5 && shared < 200000 && total >= 5 && total < 600000 && total % 3 === 0)) continue

    for (const vertexStart of LEGACY_VERTEX_STARTS) {
      for (const stride of LEGACY_STRIDES) {
        yield { countOffset: off, vertexCount: shared, indexCount: total, vertexStart, stride }
      }
    }
  }
}

function coordinatesBounded(positions: Float32Array): boolean {
  for (let i = 0; i < positions.length; i++) {
    if (!(Math.abs(positions[i]) <= LEGACY_MAX_COORD)) return false
  }
  return true
}

function legacyFromPayload(payload: Buffer, ctx: StrategyContext): DecodedMesh {
  const guesses = [...legacyGuesses(payload)]
  if (guesses.length === 0) {
    throw new DecodeError('SizeMismatch', 'no vertex/index count pair found')
  }

  return firstPlausible(
    guesses,
    ctx,
    g => `counts@0x${g.countOffset.toString(16)} start=0x${g.vertexStart.toString(16)} stride=${g.stride}`,
    g => {
      const fields = extractDirectFloat(payload, g.vertexCount, {
        vertexOffset: g.vertexStart,
        vertexStride: g.stride,
        uv: { skip: 0, stride: 16, fieldOffset: 0, encoding: 'half', overflow: 'default' },
      })
      if (!coordinatesBounded(fields.positions)) {
        throw new DecodeError('ImplausibleResult', `coordinates exceed ±${LEGACY_MAX_COORD}`)
      }
      const region = locateIndexRegion(payload, {
        vertexCount: g.vertexCount,
        faceCount: g.indexCount / 3,
        anchors: [fields.anchor, 0],
      }, ctx.search)
      return makeMesh(fields.positions, fields.uvs, region.indices)
    },
  )
}

export const indexUnknownStrategy: ParseStrategy = {
  name: 'index-unknown',

  run(file, ctx) {
    // Every gated block once (several tables share offsets), then the raw file
    const seen = new Set<string>()
    const blocks = selectBlocks(file, allLayoutCandidates()).filter(b => {
      const key = `${b.candidate.payloadOffset}:${b.compressed.length}:${b.uncompressedSize}`
      if (seen.has(key)) return false
      seen.add(key)
      return true
    })

    const sources: (CompressedBlock | 'raw')[] = [...blocks, 'raw']
    return firstPlausible(
      sources,
      ctx,
      s => (s === 'raw' ? 'raw file' : s.candidate.id),
      s => legacyFromPayload(s === 'raw' ? file : decompress(ctx, s), ctx),
    )
  },
}

/** Fixed priority order. */
export const DEFAULT_STRATEGIES: readonly ParseStrategy[] = [
  structuredHeaderStrategy,
  heuristicOffsetStrategy,
  quantizedStrategy,
  indexUnknownStrategy,
]

/**
 * `hybrid` runs everything; `body` only the self-describing body layout;
 * `legacy` everything except the structured header strategy.
 */
export type StrategyMode = 'hybrid' | 'body' | 'legacy'

export const STRATEGY_MODES: readonly StrategyMode[] = ['hybrid', 'body', 'legacy']

export function strategiesForMode(mode: StrategyMode): readonly ParseStrategy[] {
  switch (mode) {
    case 'hybrid': return DEFAULT_STRATEGIES
    case 'body': return [bodyFlagsStrategy]
    case 'legacy': return [heuristicOffsetStrategy, quantizedStrategy, indexUnknownStrategy]
  }
}
