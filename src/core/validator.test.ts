import { describe, it, expect } from 'vitest'
import { makeMesh, maxIndex } from './mesh-types'
import { explainImplausible, validateMesh } from './validator'

function mesh(vertexCount: number, indices: number[], uvCount = vertexCount) {
  return makeMesh(new Float32Array(vertexCount * 3), new Float32Array(uvCount * 2), Uint32Array.from(indices))
}

describe('explainImplausible', () => {
  it('accepts a well-formed mesh', () => {
    expect(explainImplausible(mesh(10, [0, 1, 2, 7, 8, 9]))).toBeNull()
    expect(validateMesh(mesh(10, [0, 1, 2]))).toBe(true)
  })

  it('rejects too few vertices', () => {
    expect(explainImplausible(mesh(9, [0, 1, 2]))).toBe('9 vertices (minimum 10)')
    expect(explainImplausible(mesh(9, [0, 1, 2]), 3)).toBeNull()
  })

  it('rejects a mesh without faces', () => {
    expect(explainImplausible(mesh(10, [0, 1]))).toBe('no faces')
  })

  it('rejects an index equal to the vertex count', () => {
    expect(explainImplausible(mesh(10, [0, 1, 10]))).toBe('index 10 out of range for 10 vertices')
    expect(validateMesh(mesh(10, [0, 1, 10]))).toBe(false)
  })

  it('rejects a UV count that does not match', () => {
    expect(explainImplausible(mesh(10, [0, 1, 2], 9))).toBe('9 UVs for 10 vertices')
    expect(explainImplausible(mesh(10, [0, 1, 2], 0))).toBeNull()
  })
})

describe('makeMesh', () => {
  it('derives counts from the buffers', () => {
    const m = mesh(12, [0, 1, 2, 3, 4, 5, 6])
    expect(m.vertexCount).toBe(12)
    expect(m.faceCount).toBe(2)
    expect(maxIndex(m.indices)).toBe(6)
    expect(maxIndex(new Uint32Array(0))).toBe(-1)
  })
})
