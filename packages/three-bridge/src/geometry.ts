/**
 * Host meshes ↔ Three.js BufferGeometry.
 *
 * Without UVs the geometry stays indexed. With UVs every triangle
 * corner gets its own vertex so per-corner UV seams survive; export
 * re-welds the UVs through the DMD deduplication.
 */

import * as THREE from 'three';
import type { HostMesh, Vec2, Vec3 } from '@dmd-tools/format';
import { UnsupportedSourceError } from '@dmd-tools/format';

function isValidTriangle(loop: number[], vertexCount: number): boolean {
  return loop.length === 3 && loop.every((i) => i >= 0 && i < vertexCount);
}

/**
 * Build a BufferGeometry from a host mesh. Non-triangles and
 * triangles with out-of-range indices are left out.
 */
export function toBufferGeometry(host: HostMesh): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();
  const n = host.positions.length;
  const kept = host.polygons
    .map((loop, p) => ({ loop, p }))
    .filter(({ loop }) => isValidTriangle(loop, n));

  if (host.uvs === null) {
    const positions = new Float32Array(n * 3);
    host.positions.forEach((v, i) => positions.set(v, i * 3));
    geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
    geometry.setIndex(kept.flatMap(({ loop }) => loop));
  } else {
    const positions = new Float32Array(kept.length * 9);
    const uvs = new Float32Array(kept.length * 6);
    kept.forEach(({ loop, p }, t) => {
      const corners = host.uvs?.[p] ?? [];
      for (let c = 0; c < 3; c++) {
        positions.set(host.positions[loop[c]], (t * 3 + c) * 3);
        uvs.set(corners[c] ?? [0, 0], (t * 3 + c) * 2);
      }
    });
    geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
    geometry.setAttribute('uv', new THREE.BufferAttribute(uvs, 2));
  }

  geometry.computeVertexNormals();
  return geometry;
}

export function triangleCount(geometry: THREE.BufferGeometry): number {
  const index = geometry.getIndex();
  if (index) return index.count / 3;
  return geometry.hasAttribute('position') ? geometry.getAttribute('position').count / 3 : 0;
}

/** Read a BufferGeometry back into a host mesh (triangles only). */
export function fromBufferGeometry(geometry: THREE.BufferGeometry, name: string): HostMesh {
  if (!geometry.hasAttribute('position')) {
    throw new UnsupportedSourceError(name, 'geometry has no position attribute');
  }
  const position = geometry.getAttribute('position');
  const positions: Vec3[] = [];
  for (let i = 0; i < position.count; i++) {
    positions.push([position.getX(i), position.getY(i), position.getZ(i)]);
  }

  const index = geometry.getIndex();
  const corner = (i: number): number => (index ? index.getX(i) : i);
  const cornerCount = index ? index.count : position.count;
  const polygons: number[][] = [];
  for (let i = 0; i + 2 < cornerCount; i += 3) {
    polygons.push([corner(i), corner(i + 1), corner(i + 2)]);
  }

  let uvs: Vec2[][] | null = null;
  if (geometry.hasAttribute('uv')) {
    const uv = geometry.getAttribute('uv');
    uvs = polygons.map((loop) => loop.map((v): Vec2 => [uv.getX(v), uv.getY(v)]));
  }

  return { name, positions, polygons, uvs };
}
