/**
 * Layout candidate table.
 *
 * The .mesh header has no documented field positions. Exporter versions move
 * the compressed-size / uncompressed-size / payload-start triple around the
 * first ~0x60 bytes, so every hypothesis observed so far is listed here as
 * plain data, grouped by the strategy family that consumes it. Order within a
 * family is most-specific first.
 *
 * Header (all little-endian):
 *   0x00  u32  0x1F magic for structured exports
 *   0x40..0x48 LOD count (position varies with the size fields)
 *   0x4c  u16  bone flag (structured exports)
 *   0x4a..0x56 compressed / uncompressed size (u16 or u32)
 *   0x52..0x5a payload start
 */

export type LayoutFamily = 'structured' | 'body' | 'heuristic' | 'compressed'

export type IndexWidthPolicy = 'fixed16' | 'search'

export interface LayoutCandidate {
  id: string
  family: LayoutFamily
  compressedSizeOffset: number
  uncompressedSizeOffset: number
  payloadOffset: number
  sizeFieldWidth: 2 | 4
  /** Offsets inside the payload where (vertexCount, totalIndexCount) may sit. */
  vertexCountOffsets: readonly number[]
  lodCountOffset?: number
  indexWidth: IndexWidthPolicy
}

export interface CompressedBlock {
  candidate: LayoutCandidate
  compressed: Buffer
  uncompressedSize: number
}

// ---- Limits ----
export const MAX_COMPRESSED_SIZE = 10 * 1024 * 1024
export const MAX_UNCOMPRESSED_SIZE = 50 * 1024 * 1024

export const STRUCTURED_MAGIC = 0x1f
export const STRUCTURED_BONE_FLAG_OFFSET = 0x4c

// ---- Tables ----

const STRUCTURED: readonly LayoutCandidate[] = [
  {
    id: 'structured-v31',
    family: 'structured',
    compressedSizeOffset: 0x52,
    uncompressedSizeOffset: 0x56,
    payloadOffset: 0x5a,
    sizeFieldWidth: 4,
    vertexCountOffsets: [0x74],
    indexWidth: 'fixed16',
  },
]

/** Self-describing bodies: sizes at 0x4e/0x52, body (flags block first) at 0x56. */
const BODY: readonly LayoutCandidate[] = [
  {
    id: 'body-4e',
    family: 'body',
    compressedSizeOffset: 0x4e,
    uncompressedSizeOffset: 0x52,
    payloadOffset: 0x56,
    sizeFieldWidth: 4,
    vertexCountOffsets: [0x74],
    lodCountOffset: 0x44,
    indexWidth: 'search',
  },
]

const HEURISTIC_COUNT_OFFSETS = [0x74, 0x70, 0x78, 0x80] as const

const HEURISTIC: readonly LayoutCandidate[] = [
  {
    id: 'heuristic-4e',
    family: 'heuristic',
    compressedSizeOffset: 0x4e,
    uncompressedSizeOffset: 0x52,
    payloadOffset: 0x56,
    sizeFieldWidth: 4,
    vertexCountOffsets: HEURISTIC_COUNT_OFFSETS,
    lodCountOffset: 0x44,
    indexWidth: 'fixed16',
  },
  {
    id: 'heuristic-4a',
    family: 'heuristic',
    compressedSizeOffset: 0x4a,
    uncompressedSizeOffset: 0x4e,
    payloadOffset: 0x52,
    sizeFieldWidth: 4,
    vertexCountOffsets: HEURISTIC_COUNT_OFFSETS,
    lodCountOffset: 0x40,
    indexWidth: 'fixed16',
  },
  {
    id: 'heuristic-52',
    family: 'heuristic',
    compressedSizeOffset: 0x52,
    uncompressedSizeOffset: 0x56,
    payloadOffset: 0x5a,
    sizeFieldWidth: 4,
    vertexCountOffsets: HEURISTIC_COUNT_OFFSETS,
    lodCountOffset: 0x48,
    indexWidth: 'fixed16',
  },
]

const COMPRESSED: readonly LayoutCandidate[] = [
  compressedCandidate('compressed-52', 0x52, 0x56, 0x5a, 4),
  compressedCandidate('compressed-4e-51', 0x4e, 0x51, 0x56, 2),
  compressedCandidate('compressed-4e-52', 0x4e, 0x52, 0x56, 2),
  compressedCandidate('compressed-4e-50', 0x4e, 0x50, 0x56, 2),
  compressedCandidate('compressed-4c-50', 0x4c, 0x50, 0x56, 2),
]

function compressedCandidate(
  id: string, cs: number, us: number, payload: number, width: 2 | 4,
): LayoutCandidate {
  return {
    id,
    family: 'compressed',
    compressedSizeOffset: cs,
    uncompressedSizeOffset: us,
    payloadOffset: payload,
    sizeFieldWidth: width,
    vertexCountOffsets: [0x74],
    indexWidth: 'search',
  }
}

const TABLES: Record<LayoutFamily, readonly LayoutCandidate[]> = {
  structured: STRUCTURED,
  body: BODY,
  heuristic: HEURISTIC,
  compressed: COMPRESSED,
}

export function layoutCandidates(family: LayoutFamily): readonly LayoutCandidate[] {
  return TABLES[family]
}

/** Every candidate in the order the strategies try them. */
export function allLayoutCandidates(): LayoutCandidate[] {
  return [...STRUCTURED, ...BODY, ...HEURISTIC, ...COMPRESSED]
}

// ---- Gate ----

function readSizeField(file: Buffer, offset: number, width: 2 | 4): number | null {
  if (offset < 0 || offset + width > file.length) return null
  // Sizes are stored signed in 4-byte layouts; negative values fail the gate
  return width === 4 ? file.readInt32LE(offset) : file.readUInt16LE(offset)
}

/**
 * Apply the structural validity gate to one candidate.
 * Returns null when the candidate does not describe a plausible block.
 */
export function readCompressedBlock(file: Buffer, candidate: LayoutCandidate): CompressedBlock | null {
  const cs = readSizeField(file, candidate.compressedSizeOffset, candidate.sizeFieldWidth)
  const us = readSizeField(file, candidate.uncompressedSizeOffset, candidate.sizeFieldWidth)
  if (cs === null || us === null) return null

  if (!(cs > 0 && cs < MAX_COMPRESSED_SIZE)) return null
  if (!(us > 0 && us < MAX_UNCOMPRESSED_SIZE)) return null
  if (candidate.payloadOffset + cs > file.length) return null

  return {
    candidate,
    compressed: file.subarray(candidate.payloadOffset, candidate.payloadOffset + cs),
    uncompressedSize: us,
  }
}

/** Gated blocks for `candidates`, in order. */
export function selectBlocks(file: Buffer, candidates: readonly LayoutCandidate[]): CompressedBlock[] {
  const blocks: CompressedBlock[] = []
  for (const c of candidates) {
    const block = readCompressedBlock(file, c)
    if (block) blocks.push(block)
  }
  return blocks
}

export function hasStructuredMagic(file: Buffer): boolean {
  return file.length >= 4 && file.readUInt32LE(0) === STRUCTURED_MAGIC
}

/** LOD count recorded beside the size fields, when the candidate has one. */
export function readLodCount(file: Buffer, candidate: LayoutCandidate): number | null {
  const off = candidate.lodCountOffset
  if (off === undefined || off + 4 > file.length) return null
  return file.readInt32LE(off)
}

/**
 * Strip a length-less name block some exports prepend: the structured magic
 * followed by a printable name and a NUL within the first 0x100 bytes.
 * Returns null when the file does not look like that.
 */
export function stripNamePrefix(file: Buffer): Buffer | null {
  if (!hasStructuredMagic(file) || file.length < 5) return null
  if (file[4] < 0x20 || file[4] >= 0x7f) return null
  const nul = file.indexOf(0, 4)
  if (nul === -1 || nul >= 0x100) return null
  return file.subarray(nul + 1)
}
