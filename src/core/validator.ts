import { maxIndex, type DecodedMesh } from './mesh-types'

export const MIN_VERTEX_COUNT = 10

/**
 * Why a decoded mesh cannot be a real asset, or null if it passes.
 * Topology is not inspected; degenerate faces are the exporter's concern.
 */
export function explainImplausible(mesh: DecodedMesh, minVertexCount = MIN_VERTEX_COUNT): string | null {
  if (mesh.vertexCount < minVertexCount) {
    return `${mesh.vertexCount} vertices (minimum ${minVertexCount})`
  }
  if (mesh.faceCount === 0) return 'no faces'

  const max = maxIndex(mesh.indices)
  if (max >= mesh.vertexCount) {
    return `index ${max} out of range for ${mesh.vertexCount} vertices`
  }
  if (mesh.uvs.length !== 0 && mesh.uvs.length !== mesh.vertexCount * 2) {
    return `${mesh.uvs.length / 2} UVs for ${mesh.vertexCount} vertices`
  }
  return null
}

export function validateMesh(mesh: DecodedMesh, minVertexCount = MIN_VERTEX_COUNT): boolean {
  return explainImplausible(mesh, minVertexCount) === null
}
