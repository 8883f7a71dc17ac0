import { describe, it, expect } from 'vitest';
import { dedupeCornerUvs, uvKey } from '../src/uv.js';

describe('dedupeCornerUvs', () => {

  it('shares UV vertices between faces, assigning indices in first-seen order', () => {
    const { uvVertices, uvFaces } = dedupeCornerUvs([
      [[0, 0], [1, 0], [0, 1]],
      [[1, 0], [1, 1], [0, 1]],
    ]);
    expect(uvVertices).toEqual([[0, 0], [1, 0], [0, 1], [1, 1]]);
    expect(uvFaces).toEqual([[0, 1, 2], [1, 3, 2]]);
  });

  it('treats coordinates equal to 6 decimals as one vertex', () => {
    const { uvVertices, uvFaces } = dedupeCornerUvs([
      [[0.1234564, 0.5], [0.1234561, 0.5], [0.1234566, 0.5]],
    ]);
    expect(uvVertices).toEqual([[0.1234564, 0.5], [0.1234566, 0.5]]);
    expect(uvFaces).toEqual([[0, 0, 1]]);
  });

  it('emits one UV face per triangle even when all corners coincide', () => {
    const same: [number, number] = [0.25, 0.75];
    const { uvVertices, uvFaces } = dedupeCornerUvs([[same, same, same], [same, same, same]]);
    expect(uvVertices).toEqual([[0.25, 0.75]]);
    expect(uvFaces).toEqual([[0, 0, 0], [0, 0, 0]]);
  });
});

describe('uvKey', () => {

  it('folds negative zero into zero', () => {
    expect(uvKey([-0, -1e-9])).toBe(uvKey([0, 0]));
  });
});
