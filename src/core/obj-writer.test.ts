import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { makeMesh } from './mesh-types'
import { formatObj, isDegenerate, writeObj } from './obj-writer'

const positions = Float32Array.from([0, 0, 0, 1, 0, 0, 0, 1.5, -2])
const uvs = Float32Array.from([0, 0, 1, 0, 0.25, 0.5])
const indices = Uint32Array.from([0, 1, 2, 0, 0, 1])

describe('formatObj', () => {
  it('writes positions, UVs and 1-based faces, dropping degenerate ones', () => {
    const { text, stats } = formatObj(makeMesh(positions, uvs, indices), { exportUvs: true })
    expect(text).toBe([
      'v 0.000000 0.000000 0.000000',
      'v 1.000000 0.000000 0.000000',
      'v 0.000000 1.500000 -2.000000',
      'vt 0.000000 0.000000',
      'vt 1.000000 0.000000',
      'vt 0.250000 0.500000',
      'f 1/1 2/2 3/3',
    ].join('\n') + '\n')
    expect(stats).toEqual({ written: 1, skipped: 1 })
  })

  it('uses plain face references without UVs', () => {
    const { text } = formatObj(makeMesh(positions, uvs, indices), { exportUvs: false })
    const lines = text.trimEnd().split('\n')
    expect(lines.some(l => l.startsWith('vt '))).toBe(false)
    expect(lines[lines.length - 1]).toBe('f 1 2 3')
  })

  it('writes vn records and references them when the mesh has normals', () => {
    const normals = Float32Array.from([0, 0, 1, 0, 0.5, 0.5, 1, 0, 0])
    const mesh = makeMesh(positions, uvs, indices, normals)

    const lines = formatObj(mesh, { exportUvs: true }).text.trimEnd().split('\n')
    expect(lines.slice(6)).toEqual([
      'vn 0.000000 0.000000 1.000000',
      'vn 0.000000 0.500000 0.500000',
      'vn 1.000000 0.000000 0.000000',
      'f 1/1/1 2/2/2 3/3/3',
    ])

    const plain = formatObj(mesh, { exportUvs: false }).text.trimEnd().split('\n')
    expect(plain.at(-1)).toBe('f 1//1 2//2 3//3')
  })

  it('omits vt records when the mesh has no UVs', () => {
    const { text } = formatObj(makeMesh(positions, new Float32Array(0), indices), { exportUvs: true })
    expect(text.trimEnd().split('\n')).toHaveLength(4)
  })
})

describe('isDegenerate', () => {
  it('flags any repeated corner', () => {
    expect(isDegenerate(1, 2, 3)).toBe(false)
    expect(isDegenerate(1, 1, 3)).toBe(true)
    expect(isDegenerate(1, 2, 2)).toBe(true)
    expect(isDegenerate(3, 2, 3)).toBe(true)
  })
})

describe('writeObj', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mesh-recover-obj-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('creates the output directory and writes the text', () => {
    const target = join(dir, 'nested', 'tri.obj')
    const stats = writeObj(target, makeMesh(positions, uvs, indices), { exportUvs: false })
    expect(stats.written).toBe(1)
    expect(readFileSync(target, 'utf-8')).toBe(formatObj(makeMesh(positions, uvs, indices), { exportUvs: false }).text)
  })
})
