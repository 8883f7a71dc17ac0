/**
 * Mesh aggregation — many objects into one, indices remapped.
 *
 * Face indices shift by the running vertex count, UV face indices by
 * the running UV-vertex count. The two offsets advance independently:
 * a mesh without UVs still moves the vertex offset but not the UV one.
 */

import type { DmdMesh } from './mesh.js';
import { createMesh, COMBINED_MESH_NAME } from './mesh.js';
import { offsetTriangle } from './vec3.js';
import { describeCause } from './errors.js';

/** A mesh whose extraction may fail, e.g. a host object that is not a mesh. */
export interface MeshSource {
  name: string;
  extract(): DmdMesh;
}

export interface ItemFailure {
  name: string;
  error: string;
}

export interface CombineResult {
  mesh: DmdMesh;
  /** Names of sources that made it into `mesh`, in order. */
  included: string[];
  failures: ItemFailure[];
}

/** Merge meshes in order. Inputs are not modified. */
export function mergeMeshes(meshes: Iterable<DmdMesh>): DmdMesh {
  const combined = createMesh({ name: COMBINED_MESH_NAME });
  let vertexOffset = 0;
  let uvOffset = 0;

  for (const mesh of meshes) {
    for (const v of mesh.vertices) combined.vertices.push([v[0], v[1], v[2]]);
    for (const f of mesh.faces) combined.faces.push(offsetTriangle(f, vertexOffset));

    if (mesh.uvVertices.length > 0) {
      for (const uv of mesh.uvVertices) combined.uvVertices.push([uv[0], uv[1]]);
      for (const f of mesh.uvFaces) combined.uvFaces.push(offsetTriangle(f, uvOffset));
      uvOffset += mesh.uvVertices.length;
    }

    vertexOffset += mesh.vertices.length;
  }
  return combined;
}

/**
 * Extract every source, then merge the ones that succeeded. A source
 * that throws is recorded in `failures` and contributes nothing,
 * offsets included.
 */
export function combineSources(sources: Iterable<MeshSource>): CombineResult {
  const extracted: DmdMesh[] = [];
  const included: string[] = [];
  const failures: ItemFailure[] = [];

  for (const source of sources) {
    try {
      extracted.push(source.extract());
      included.push(source.name);
    } catch (err) {
      failures.push({ name: source.name, error: describeCause(err) });
    }
  }

  return { mesh: mergeMeshes(extracted), included, failures };
}
