/**
 * Wavefront OBJ export.
 *
 * Faces reference positions (and UVs and normals, which are per-vertex
 * here) with 1-based indices. Triangles with repeated corners are dropped on the way
 * out; the decoder keeps them so index counts stay faithful to the file.
 */

import { mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import type { DecodedMesh } from './mesh-types'

export interface ObjExportOptions {
  /** Write `vt` records and `f a/a` references. Some viewers choke on them. */
  exportUvs: boolean
}

export interface ObjExportStats {
  written: number
  skipped: number
}

export function isDegenerate(a: number, b: number, c: number): boolean {
  return a === b || b === c || a === c
}

function faceRef(i: number, withUvs: boolean, withNormals: boolean): string {
  if (withNormals) return withUvs ? `${i}/${i}/${i}` : `${i}//${i}`
  return withUvs ? `${i}/${i}` : `${i}`
}

export function formatObj(mesh: DecodedMesh, options: ObjExportOptions): { text: string; stats: ObjExportStats } {
  const { positions, uvs, normals, indices, vertexCount, faceCount } = mesh
  const lines: string[] = []
  const withUvs = options.exportUvs && uvs.length === vertexCount * 2 && vertexCount > 0
  const withNormals = normals !== undefined && normals.length === vertexCount * 3 && vertexCount > 0

  for (let v = 0; v < vertexCount; v++) {
    lines.push(`v ${positions[v * 3].toFixed(6)} ${positions[v * 3 + 1].toFixed(6)} ${positions[v * 3 + 2].toFixed(6)}`)
  }
  if (withUvs) {
    for (let v = 0; v < vertexCount; v++) {
      lines.push(`vt ${uvs[v * 2].toFixed(6)} ${uvs[v * 2 + 1].toFixed(6)}`)
    }
  }
  if (normals && withNormals) {
    for (let v = 0; v < vertexCount; v++) {
      lines.push(`vn ${normals[v * 3].toFixed(6)} ${normals[v * 3 + 1].toFixed(6)} ${normals[v * 3 + 2].toFixed(6)}`)
    }
  }

  let written = 0
  for (let f = 0; f < faceCount; f++) {
    const a = indices[f * 3] + 1
    const b = indices[f * 3 + 1] + 1
    const c = indices[f * 3 + 2] + 1
    if (isDegenerate(a, b, c)) continue
    lines.push(`f ${faceRef(a, withUvs, withNormals)} ${faceRef(b, withUvs, withNormals)} ${faceRef(c, withUvs, withNormals)}`)
    written++
  }

  return {
    text: lines.join('\n') + '\n',
    stats: { written, skipped: faceCount - written },
  }
}

export function writeObj(objPath: string, mesh: DecodedMesh, options: ObjExportOptions): ObjExportStats {
  const { text, stats } = formatObj(mesh, options)
  mkdirSync(dirname(objPath), { recursive: true })
  writeFileSync(objPath, text, 'utf-8')
  return stats
}
