/**
 * DMD loading and export for Three.js scenes.
 */

import * as THREE from 'three';
import {
  decodeDmdBytes, toHostMesh, fromHostMesh, UnsupportedSourceError,
  type AxisOptions, type ExportOptions, type MeshSource,
} from '@dmd-tools/format';
import { toBufferGeometry, fromBufferGeometry, triangleCount } from './geometry.js';

/** Default surface and edge colors. */
export const COLORS = {
  geometry: 0xc9a84c,
  wireframe: 0x8a8a8a,
};

export interface LoadedModel {
  mesh: THREE.Mesh;
  edges: THREE.LineSegments; // hard edges (30° threshold)
  triangleCount: number;
  bounds: THREE.Box3;
}

export interface LoadOptions extends AxisOptions {
  /** Text encodings to try, in order. */
  encodings?: readonly string[];
}

/** Decode DMD bytes and return mesh + edges. */
export function loadDMDBuffer(buffer: ArrayBuffer | Uint8Array, options: LoadOptions = {}): LoadedModel {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
  const dmd = decodeDmdBytes(bytes, options.encodings);
  const geometry = toBufferGeometry(toHostMesh(dmd, options));
  geometry.computeBoundingBox();
  geometry.computeBoundingSphere();

  const material = new THREE.MeshStandardMaterial({
    color: COLORS.geometry,
    metalness: 0.3,
    roughness: 0.5,
    side: THREE.DoubleSide,
  });
  const mesh = new THREE.Mesh(geometry, material);
  mesh.name = dmd.name;

  const edgeGeo = new THREE.EdgesGeometry(geometry, 30);
  const edgeMat = new THREE.LineBasicMaterial({
    color: COLORS.wireframe,
    opacity: 0.5,
    transparent: true,
  });
  const edges = new THREE.LineSegments(edgeGeo, edgeMat);

  return {
    mesh,
    edges,
    triangleCount: triangleCount(geometry),
    bounds: geometry.boundingBox?.clone() ?? new THREE.Box3(),
  };
}

/**
 * Export source for a scene object. Extraction bakes the world
 * transform into a copy of the geometry; non-mesh objects fail
 * extraction so batch exports can skip them.
 */
export function meshSource(object: THREE.Object3D, options: ExportOptions = {}): MeshSource {
  const name = object.name || object.uuid;
  return {
    name,
    extract: () => {
      if (!(object instanceof THREE.Mesh)) {
        throw new UnsupportedSourceError(name, 'is not a polygon mesh');
      }
      object.updateWorldMatrix(true, false);
      const world: THREE.BufferGeometry = object.geometry.clone();
      world.applyMatrix4(object.matrixWorld);
      try {
        return fromHostMesh(fromBufferGeometry(world, name), options);
      } finally {
        world.dispose();
      }
    },
  };
}
