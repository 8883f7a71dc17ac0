import { describe, it, expect } from 'vitest';
import { createMesh, meshStats, uvMapping } from '../src/mesh.js';
import type { Vec3, Triangle } from '../src/vec3.js';

describe('meshStats', () => {

  it('counts, bounds and flags out-of-range faces', () => {
    const stats = meshStats(createMesh({
      name: 'Tri',
      vertices: [[0, -1, 2], [3, 4, -5]],
      faces: [[0, 1, 1], [0, 1, 2]],
    }));
    expect(stats).toEqual({
      name: 'Tri',
      vertex_count: 2,
      face_count: 2,
      uv_vertex_count: 0,
      uv_face_count: 0,
      uv_mapping: 'none',
      invalid_face_count: 1,
      invalid_uv_face_count: 0,
      bounds: { min: [0, -1, -5], max: [3, 4, 2] },
    });
  });

  it('has no bounds for an empty mesh', () => {
    expect(meshStats(createMesh()).bounds).toBeNull();
  });
});

describe('uvMapping', () => {

  it('prefers per-face when both lengths match', () => {
    const mesh = createMesh({
      vertices: [[0, 0, 0], [1, 0, 0], [0, 1, 0]],
      faces: [[0, 1, 2]],
      uvVertices: [[0, 0], [1, 0], [0, 1]],
      uvFaces: [[0, 1, 2]],
    });
    expect(uvMapping(mesh)).toBe('per-face');
  });

  it('detects per-vertex and unmatched layouts', () => {
    const vertices: Vec3[] = [[0, 0, 0], [1, 0, 0]];
    const faces: Triangle[] = [[0, 1, 1], [1, 0, 0]];
    const base = { vertices, faces };
    expect(uvMapping(createMesh({ ...base, uvVertices: [[0, 0], [1, 1]], uvFaces: [[0, 1, 1]] }))).toBe('per-vertex');
    expect(uvMapping(createMesh({ ...base, uvVertices: [[0, 0]], uvFaces: [[0, 0, 0]] }))).toBe('unmatched');
  });
});
