import { describe, it, expect, vi } from 'vitest'
import { DecodeError } from './errors'
import { decodeMesh } from './mesh-decoder'
import { maxIndex } from './mesh-types'
import { formatObj } from './obj-writer'
import { strategiesForMode, type ParseStrategy } from './strategies'
import {
  buildBody,
  buildHeuristicPayload,
  buildLegacyPayload,
  buildQuantizedPayload,
  buildStructuredFloatPayload,
  buildZipPosPayload,
  cannedCodec,
  sequentialFaces,
  storedCodec,
  twentyVertexQuantizedFile,
  wrapPayload,
  wrapPayload4e,
  type QuantizedOptions,
  type Triangle,
} from './test-fixtures'

describe('decodeMesh: strategy fallback', () => {
  it('falls through to the quantized strategy and records each attempt', () => {
    const trace = vi.fn()
    const outcome = decodeMesh(twentyVertexQuantizedFile(), { codec: storedCodec, trace })

    expect(outcome.ok).toBe(true)
    if (!outcome.ok) return
    expect(outcome.strategy).toBe('quantized')
    expect(outcome.attempts.map(a => [a.strategy, a.ok, a.errorKind])).toEqual([
      ['structured-header', false, 'MalformedHeader'],
      ['heuristic-offset', false, 'SizeMismatch'],
      ['quantized', true, undefined],
    ])
    expect(trace).toHaveBeenCalledWith('accepted: quantized')
  })

  it('decodes the 20-vertex quantized asset', () => {
    const outcome = decodeMesh(twentyVertexQuantizedFile(), { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)

    const { mesh } = outcome
    expect(mesh.vertexCount).toBe(20)
    expect(mesh.faceCount).toBe(6)
    expect(Array.from(mesh.indices)).toEqual(sequentialFaces(6).flat())
    expect(maxIndex(mesh.indices)).toBeLessThan(mesh.vertexCount)
    expect(mesh.positions[0]).toBeCloseTo(5.000076, 6)
    expect(mesh.positions[59]).toBeCloseTo(5.000076, 6)
    expect(Array.from(mesh.uvs.subarray(0, 2))).toEqual([0, 1])

    const lines = formatObj(mesh, { exportUvs: true }).text.trimEnd().split('\n')
    expect(lines.filter(l => l.startsWith('v '))).toHaveLength(20)
    expect(lines.filter(l => l.startsWith('vt '))).toHaveLength(20)
    expect(lines.filter(l => l.startsWith('f '))).toHaveLength(6)
    expect(lines[0]).toBe('v 5.000076 5.000076 5.000076')
    expect(lines[20]).toBe('vt 0.000000 1.000000')
    expect(lines[40]).toBe('f 2/2 3/3 4/4')
  })

  it('skips the heuristic strategy for compressed assets', () => {
    const outcome = decodeMesh(twentyVertexQuantizedFile(), {
      codec: storedCodec,
      hints: { zipPositions: false, compressed: true },
    })
    expect(outcome.ok).toBe(true)
    expect(outcome.attempts[1]).toEqual({ strategy: 'heuristic-offset', ok: false, message: 'skipped for this asset' })
  })

  it('reports AllStrategiesFailed with the last reason', () => {
    const outcome = decodeMesh(Buffer.alloc(64), { codec: storedCodec })
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error).toBe('AllStrategiesFailed')
    expect(outcome.message).toBe('index-unknown: no vertex/index count pair found')
    expect(outcome.attempts).toHaveLength(4)
    expect(outcome.attempts.every(a => !a.ok)).toBe(true)
  })

  it('rejects a mesh below the minimum vertex count', () => {
    const outcome = decodeMesh(twentyVertexQuantizedFile(), { codec: storedCodec, minVertexCount: 21 })
    expect(outcome.ok).toBe(false)
    expect(outcome.attempts.find(a => a.strategy === 'quantized')?.errorKind).toBe('ImplausibleResult')
  })

  it('turns a codec failure into DecompressionFailure', () => {
    const broken = { name: 'broken', decompress: () => 0 }
    const outcome = decodeMesh(twentyVertexQuantizedFile(), { codec: broken })
    expect(outcome.attempts.find(a => a.strategy === 'quantized')?.errorKind).toBe('DecompressionFailure')
  })

  it('lets errors other than DecodeError escape', () => {
    const exploding: ParseStrategy = {
      name: 'structured-header',
      run() {
        throw new TypeError('bug')
      },
    }
    expect(() => decodeMesh(Buffer.alloc(8), { codec: storedCodec, strategies: [exploding] })).toThrow(TypeError)
  })

  it('tries the next strategy after a DecodeError from a custom one', () => {
    const failing: ParseStrategy = {
      name: 'structured-header',
      run() {
        throw new DecodeError('SizeMismatch', 'short')
      },
    }
    const outcome = decodeMesh(Buffer.alloc(8), { codec: storedCodec, strategies: [failing] })
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.message).toBe('structured-header: short')
  })
})

describe('decodeMesh: structured header', () => {
  const positions: [number, number, number][] = Array.from({ length: 12 }, (_, i) => [i, i * 2, -i])
  const uvs: [number, number][] = Array.from({ length: 12 }, () => [0x3800, 0x3c00])
  const faces: Triangle[] = [[0, 1, 2], [2, 3, 4], [4, 5, 6], [9, 10, 11]]

  it('reads float vertices, half-float UVs and 16-bit faces', () => {
    const file = wrapPayload(buildStructuredFloatPayload({ positions, uvs, faces }), { magic: true })
    const outcome = decodeMesh(file, { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('structured-header')
    expect(outcome.attempts).toHaveLength(1)
    expect(Array.from(outcome.mesh.positions.subarray(15, 18))).toEqual([5, 10, -5])
    expect(Array.from(outcome.mesh.uvs.subarray(0, 2))).toEqual([0.5, 1])
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())
  })

  it('skips the bone block when the bone flag is set', () => {
    const file = wrapPayload(
      buildStructuredFloatPayload({ positions, uvs, faces, bones: true }),
      { magic: true, boneFlag: true },
    )
    const outcome = decodeMesh(file, { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())
  })

  it('reads tail-anchored byte vertices for ZipPos assets', () => {
    const vertices: [number, number, number][] = Array.from({ length: 10 }, () => [128, 255, 0])
    const zipFaces: Triangle[] = [[0, 1, 2], [3, 4, 5], [6, 7, 9]]
    const payload = Buffer.alloc(0xb3 + zipFaces.length * 6 + vertices.length * 4)
    payload.writeInt32LE(10, 0x74)
    payload.writeInt32LE(9, 0x78)
    zipFaces.flat().forEach((idx, i) => payload.writeUInt16LE(idx, 0xb3 + i * 2))
    vertices.forEach(([x, y, z], v) => {
      const off = 0xb3 + 18 + v * 4
      payload[off + 1] = x
      payload[off + 2] = y
      payload[off + 3] = z
    })

    const outcome = decodeMesh(wrapPayload(payload, { magic: true }), {
      codec: storedCodec,
      hints: { zipPositions: true, compressed: true },
    })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('structured-header')
    expect(Array.from(outcome.mesh.positions.subarray(0, 3))).toEqual([0, Math.fround(127 / 127.5), Math.fround(-128 / 127.5)])
    expect(Array.from(outcome.mesh.indices)).toEqual(zipFaces.flat())
  })
})

describe('decodeMesh: compressed ZipPos', () => {
  it('locates the faces and picks up the companion UV block', () => {
    const payload = buildZipPosPayload({
      vertices: Array.from({ length: 10 }, (_, i) => [128 + i, 128, 128 - i]),
      faces: sequentialFaces(3),
      companionUvs: Array.from({ length: 10 }, () => [65535, 0]),
    })
    const outcome = decodeMesh(wrapPayload(payload), {
      codec: storedCodec,
      hints: { zipPositions: true, compressed: true },
    })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('quantized')
    expect(Array.from(outcome.mesh.indices)).toEqual(sequentialFaces(3).flat())
    expect(Array.from(outcome.mesh.uvs.subarray(0, 2))).toEqual([1, 0])
    expect(outcome.mesh.positions[3]).toBe(Math.fround(1 / 127.5))
  })

  it('finds faces that start at an odd offset past the count block', () => {
    const payload = buildZipPosPayload({
      vertices: Array.from({ length: 10 }, (_, i) => [128 + i, 128, 128 - i]),
      faces: sequentialFaces(3),
      faceOffset: 0xb3,
    })
    const outcome = decodeMesh(wrapPayload(payload), {
      codec: storedCodec,
      hints: { zipPositions: true, compressed: true },
    })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('quantized')
    expect(Array.from(outcome.mesh.indices)).toEqual(sequentialFaces(3).flat())
    expect(outcome.mesh.positions[0]).toBe(0)
    expect(outcome.mesh.positions[3]).toBe(Math.fround(1 / 127.5))
  })
})

describe('decodeMesh: quantized', () => {
  const quantizedBase: QuantizedOptions = {
    vertexCount: 20,
    faces: sequentialFaces(6),
    min: [0, 0, 0],
    range: [10, 10],
    raw: () => 32768,
    uv: () => [0, 65535],
  }

  it('finds a face run one byte past the UV block', () => {
    const trace = vi.fn()
    const file = wrapPayload(buildQuantizedPayload({ ...quantizedBase, faceGap: 1 }))
    const outcome = decodeMesh(file, { codec: storedCodec, trace })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('quantized')
    expect(Array.from(outcome.mesh.indices)).toEqual(sequentialFaces(6).flat())
    expect(trace).toHaveBeenCalledWith(expect.stringMatching(/^ {2}index region at 0x145 \(16-bit, /))
  })

  it('falls back to 32-bit indices when no 16-bit run exists', () => {
    const trace = vi.fn()
    const file = wrapPayload(buildQuantizedPayload({ ...quantizedBase, indexWidth: 32 }))
    const outcome = decodeMesh(file, { codec: storedCodec, trace })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('quantized')
    expect(Array.from(outcome.mesh.indices)).toEqual(sequentialFaces(6).flat())
    expect(trace).toHaveBeenCalledWith('  index region at 0x144 (32-bit, 362 offsets)')
  })

  it('reads the raw uint16 grid when the counts sit at 0x34', () => {
    // x = 3v + 2, y = 1, z = 0 keeps the 0x74/0x78 words off the ZipPos path
    const n = 10
    const payload = Buffer.alloc(0x60 + n * 6 + n * 4 + 18)
    payload.writeInt32LE(n, 0x34)
    payload.writeInt32LE(9, 0x38)
    for (let v = 0; v < n; v++) {
      payload.writeUInt16LE(3 * v + 2, 0x60 + v * 6)
      payload.writeUInt16LE(1, 0x60 + v * 6 + 2)
      payload.writeUInt16LE(65535, 0x60 + n * 6 + v * 4)
    }
    sequentialFaces(3).flat().forEach((idx, i) => payload.writeUInt16LE(idx, 0x60 + n * 10 + i * 2))

    const trace = vi.fn()
    const outcome = decodeMesh(wrapPayload(payload), { codec: storedCodec, trace })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('quantized')
    expect(outcome.mesh.vertexCount).toBe(10)
    expect(outcome.mesh.positions[0]).toBeCloseTo(2, 4)
    expect(outcome.mesh.positions[1]).toBeCloseTo(1, 4)
    expect(outcome.mesh.positions[27]).toBeCloseTo(29, 4)
    expect(Array.from(outcome.mesh.uvs.subarray(0, 2))).toEqual([1, 0])
    expect(Array.from(outcome.mesh.indices)).toEqual(sequentialFaces(3).flat())
    expect(trace).toHaveBeenCalledWith('  index region at 0xc4 (16-bit, 1 offsets)')
  })
})

describe('decodeMesh: heuristic offsets', () => {
  const positions: [number, number, number][] = Array.from({ length: 12 }, (_, i) => [i, i * 2, 0.5])
  const uvs: [number, number][] = positions.map(() => [0x3c00, 0x3800])
  const faces: Triangle[] = [[0, 1, 2], [3, 4, 5], [6, 7, 8], [9, 10, 11]]

  it('decodes sizes at 0x4e with the payload at 0x56', () => {
    const file = wrapPayload4e(buildHeuristicPayload({ positions, uvs, faces }))
    const outcome = decodeMesh(file, { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('heuristic-offset')
    expect(outcome.attempts.map(a => [a.strategy, a.ok, a.errorKind])).toEqual([
      ['structured-header', false, 'MalformedHeader'],
      ['heuristic-offset', true, undefined],
    ])
    expect(Array.from(outcome.mesh.positions.subarray(3, 6))).toEqual([1, 2, 0.5])
    expect(Array.from(outcome.mesh.uvs.subarray(0, 2))).toEqual([1, 0.5])
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())
  })

  it('strips a name block in front of the header', () => {
    const inner = wrapPayload4e(buildHeuristicPayload({ positions, uvs, faces }))
    const prefix = Buffer.from([0x1f, 0, 0, 0, ...Buffer.from('Rock', 'latin1'), 0])
    const outcome = decodeMesh(Buffer.concat([prefix, inner]), { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('heuristic-offset')
    expect(Array.from(outcome.mesh.positions.subarray(33, 36))).toEqual([11, 22, 0.5])
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())
  })
})

describe('decodeMesh: index unknown', () => {
  it('guesses the counts, vertex start and stride', () => {
    const positions: [number, number, number][] = Array.from({ length: 12 }, (_, i) => [i + 1, i + 1, i + 1])
    const faces: Triangle[] = [[1, 2, 3], [4, 5, 6], [7, 8, 9], [10, 11, 1]]
    const outcome = decodeMesh(wrapPayload(buildLegacyPayload(positions, faces)), { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('index-unknown')
    expect(outcome.attempts.map(a => [a.strategy, a.errorKind])).toEqual([
      ['structured-header', 'MalformedHeader'],
      ['heuristic-offset', 'ImplausibleResult'],
      ['quantized', 'SizeMismatch'],
      ['index-unknown', undefined],
    ])
    expect(Array.from(outcome.mesh.positions.subarray(0, 3))).toEqual([1, 1, 1])
    expect(Array.from(outcome.mesh.positions.subarray(33, 36))).toEqual([12, 12, 12])
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())
  })
})

describe('decodeMesh: self-describing body', () => {
  const positions: [number, number, number][] = Array.from({ length: 10 }, (_, i) => [i, i + 0.5, -i])
  const faces: Triangle[] = [[0, 1, 2], [2, 3, 4], [5, 6, 7], [7, 8, 9]]
  const body = buildBody({
    positions,
    normals: positions.map(() => [64, 128, 192]),
    uvs: positions.map(() => [0x3800, 0x3400]),
    faces,
  })

  it('reads a stored body through the structured header strategy', () => {
    const outcome = decodeMesh(wrapPayload4e(body), { codec: storedCodec })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('structured-header')
    expect(outcome.attempts).toHaveLength(1)
    expect(Array.from(outcome.mesh.positions.subarray(9, 12))).toEqual([3, 3.5, -3])
    expect(Array.from(outcome.mesh.normals?.subarray(0, 3) ?? [])).toEqual([0.25, 0.5, 0.75])
    expect(Array.from(outcome.mesh.uvs.subarray(0, 2))).toEqual([0.5, 0.75])
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())

    const lines = formatObj(outcome.mesh, { exportUvs: true }).text.trimEnd().split('\n')
    expect(lines[20]).toBe('vn 0.250000 0.500000 0.750000')
    expect(lines[30]).toBe('f 1/1/1 2/2/2 3/3/3')
  })

  it('decompresses a body whose compressed size is smaller', () => {
    const file = wrapPayload4e(body, Buffer.alloc(20, 0x55))
    const outcome = decodeMesh(file, { codec: cannedCodec(body) })
    if (!outcome.ok) throw new Error(outcome.message)

    expect(outcome.strategy).toBe('structured-header')
    expect(outcome.mesh.vertexCount).toBe(10)
    expect(Array.from(outcome.mesh.indices)).toEqual(faces.flat())
  })
})

describe('decodeMesh: strategy modes', () => {
  it('legacy leaves out the structured header strategy', () => {
    const outcome = decodeMesh(twentyVertexQuantizedFile(), {
      codec: storedCodec,
      strategies: strategiesForMode('legacy'),
    })
    expect(outcome.ok).toBe(true)
    expect(outcome.attempts.map(a => a.strategy)).toEqual(['heuristic-offset', 'quantized'])
  })

  it('body runs only the self-describing layout', () => {
    const outcome = decodeMesh(twentyVertexQuantizedFile(), {
      codec: storedCodec,
      strategies: strategiesForMode('body'),
    })
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.attempts).toHaveLength(1)
    expect(outcome.attempts[0]).toMatchObject({ strategy: 'structured-header', errorKind: 'SizeMismatch' })
  })
})
