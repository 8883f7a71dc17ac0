/**
 * DMD mesh model — one object's geometry and texture coordinates.
 *
 * Faces index `vertices`, UV faces index `uvVertices`; the two index
 * spaces are independent. All indices are zero-based in memory.
 */

import type { Vec2, Vec3, Triangle, BoundingBox } from './vec3.js';
import { min3, max3 } from './vec3.js';

export const DEFAULT_MESH_NAME = 'TriMesh';
export const COMBINED_MESH_NAME = 'Combined_Scene';

export interface DmdMesh {
  name: string;
  vertices: Vec3[];
  /** Triangles into vertices[]. Not range-checked. */
  faces: Triangle[];
  uvVertices: Vec2[];
  /** Triangles into uvVertices[]. Not range-checked. */
  uvFaces: Triangle[];
}

export function createMesh(init: Partial<DmdMesh> = {}): DmdMesh {
  return {
    name: init.name ?? DEFAULT_MESH_NAME,
    vertices: init.vertices ?? [],
    faces: init.faces ?? [],
    uvVertices: init.uvVertices ?? [],
    uvFaces: init.uvFaces ?? [],
  };
}

/**
 * How UV faces relate to geometry. The format carries no flag for this;
 * it is inferred from the list lengths, per-face taking precedence.
 */
export type UvMapping = 'none' | 'per-face' | 'per-vertex' | 'unmatched';

export function uvMapping(mesh: DmdMesh): UvMapping {
  if (mesh.uvVertices.length === 0 || mesh.uvFaces.length === 0) return 'none';
  if (mesh.uvFaces.length === mesh.faces.length) return 'per-face';
  if (mesh.uvVertices.length === mesh.vertices.length) return 'per-vertex';
  return 'unmatched';
}

export interface MeshStats {
  name: string;
  vertex_count: number;
  face_count: number;
  uv_vertex_count: number;
  uv_face_count: number;
  uv_mapping: UvMapping;
  /** Faces referencing a vertex outside vertices[]. */
  invalid_face_count: number;
  invalid_uv_face_count: number;
  bounds: BoundingBox | null;
}

function countOutOfRange(tris: Triangle[], size: number): number {
  let n = 0;
  for (const t of tris) {
    if (t.some((i) => i < 0 || i >= size)) n++;
  }
  return n;
}

export function meshBounds(vertices: Vec3[]): BoundingBox | null {
  if (vertices.length === 0) return null;
  let min = vertices[0];
  let max = vertices[0];
  for (const v of vertices) {
    min = min3(min, v);
    max = max3(max, v);
  }
  return { min, max };
}

/** Readback summary used by every tool response. */
export function meshStats(mesh: DmdMesh): MeshStats {
  return {
    name: mesh.name,
    vertex_count: mesh.vertices.length,
    face_count: mesh.faces.length,
    uv_vertex_count: mesh.uvVertices.length,
    uv_face_count: mesh.uvFaces.length,
    uv_mapping: uvMapping(mesh),
    invalid_face_count: countOutOfRange(mesh.faces, mesh.vertices.length),
    invalid_uv_face_count: countOutOfRange(mesh.uvFaces, mesh.uvVertices.length),
    bounds: meshBounds(mesh.vertices),
  };
}
