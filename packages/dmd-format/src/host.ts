/**
 * Host conversion — between DMD meshes and a host application's mesh.
 *
 * Hosts store UVs per polygon corner with V pointing up; DMD stores
 * indexed UVs with V pointing down. Axis flips and winding reversal
 * happen here, never in the text decoder or encoder.
 */

import type { Vec2, Vec3, Triangle } from './vec3.js';
import { reverseTriangle } from './vec3.js';
import type { DmdMesh } from './mesh.js';
import { createMesh, uvMapping } from './mesh.js';
import { dedupeCornerUvs } from './uv.js';
import { UnsupportedSourceError } from './errors.js';

export interface HostMesh {
  name: string;
  positions: Vec3[];
  /** Vertex loops into positions[]. Only triangles are exported. */
  polygons: number[][];
  /** One UV per corner of each polygon, V up. Null when the mesh has no UV layer. */
  uvs: Vec2[][] | null;
}

export interface AxisOptions {
  flipY?: boolean;
  flipZ?: boolean;
  /** Reverse winding (and so the face normals). */
  flipFaces?: boolean;
}

export interface ExportOptions extends AxisOptions {
  /** Default true. */
  exportUv?: boolean;
}

function flipPosition(p: Vec3, opts: AxisOptions): Vec3 {
  return [p[0], opts.flipY ? -p[1] : p[1], opts.flipZ ? -p[2] : p[2]];
}

function flipV(uv: Vec2): Vec2 {
  return [uv[0], 1.0 - uv[1]];
}

function isTriangle(loop: number[]): loop is Triangle {
  return loop.length === 3;
}

/** Host mesh → DMD mesh, ready for encoding. */
export function fromHostMesh(host: HostMesh, options: ExportOptions = {}): DmdMesh {
  const exportUv = options.exportUv ?? true;
  const mesh = createMesh({
    name: host.name,
    vertices: host.positions.map((p) => flipPosition(p, options)),
  });

  const cornerUvs: Array<[Vec2, Vec2, Vec2]> = [];
  host.polygons.forEach((loop, polyIndex) => {
    if (!isTriangle(loop)) return;
    mesh.faces.push(options.flipFaces ? reverseTriangle(loop) : [loop[0], loop[1], loop[2]]);

    const uvs = host.uvs?.[polyIndex];
    if (!exportUv || !uvs) return;
    const [a, b, c] = [flipV(uvs[0] ?? [0, 0]), flipV(uvs[1] ?? [0, 0]), flipV(uvs[2] ?? [0, 0])];
    cornerUvs.push(options.flipFaces ? [c, b, a] : [a, b, c]);
  });

  if (mesh.faces.length === 0) {
    throw new UnsupportedSourceError(
      host.name,
      host.polygons.length === 0
        ? 'mesh has no faces'
        : `none of its ${host.polygons.length} polygons is a triangle. Triangulate it first.`,
    );
  }

  if (cornerUvs.length > 0) {
    const { uvVertices, uvFaces } = dedupeCornerUvs(cornerUvs);
    mesh.uvVertices = uvVertices;
    mesh.uvFaces = uvFaces;
  }
  return mesh;
}

function cornerUvsFor(mesh: DmdMesh, opts: AxisOptions): Vec2[][] | null {
  const mapping = uvMapping(mesh);
  if (mapping === 'none' || mapping === 'unmatched') return null;

  const at = (i: number): Vec2 => {
    const uv = mesh.uvVertices[i];
    return uv ? flipV(uv) : [0, 0];
  };

  if (mapping === 'per-face') {
    return mesh.uvFaces.map((tf) => {
      const t = opts.flipFaces ? reverseTriangle(tf) : tf;
      return [at(t[0]), at(t[1]), at(t[2])];
    });
  }
  // per-vertex: UV index == vertex index of each (already reordered) corner
  return mesh.faces.map((f) => {
    const t = opts.flipFaces ? reverseTriangle(f) : f;
    return [at(t[0]), at(t[1]), at(t[2])];
  });
}

/** Decoded DMD mesh → host mesh, with the import-side flips applied. */
export function toHostMesh(mesh: DmdMesh, options: AxisOptions = {}): HostMesh {
  return {
    name: mesh.name,
    positions: mesh.vertices.map((p) => flipPosition(p, options)),
    polygons: mesh.faces.map((f) => (options.flipFaces ? reverseTriangle(f) : [f[0], f[1], f[2]])),
    uvs: cornerUvsFor(mesh, options),
  };
}
