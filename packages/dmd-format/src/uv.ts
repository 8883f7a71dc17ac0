/**
 * Per-corner UVs → indexed UV vertices + UV faces.
 *
 * Corners whose coordinates agree to 6 decimals share a UV vertex.
 * A geometric vertex used by two faces with different UVs still gets
 * two UV vertices, so seams survive.
 */

import type { Vec2, Triangle } from './vec3.js';

export const UV_PRECISION = 6;

export interface IndexedUvs {
  uvVertices: Vec2[];
  uvFaces: Triangle[];
}

function round(n: number, digits: number): number {
  const f = 10 ** digits;
  const r = Math.round(n * f) / f;
  return r === 0 ? 0 : r; // fold -0 into 0
}

export function uvKey(uv: Vec2, digits = UV_PRECISION): string {
  return `${round(uv[0], digits)},${round(uv[1], digits)}`;
}

/**
 * One entry per triangle in, one UV face out. The first corner seen
 * for a key supplies the stored (unrounded) coordinates.
 */
export function dedupeCornerUvs(corners: ReadonlyArray<readonly [Vec2, Vec2, Vec2]>): IndexedUvs {
  const index = new Map<string, number>();
  const uvVertices: Vec2[] = [];
  const uvFaces: Triangle[] = [];

  const lookup = (uv: Vec2): number => {
    const key = uvKey(uv);
    let i = index.get(key);
    if (i === undefined) {
      i = uvVertices.length;
      index.set(key, i);
      uvVertices.push([uv[0], uv[1]]);
    }
    return i;
  };

  for (const [a, b, c] of corners) {
    uvFaces.push([lookup(a), lookup(b), lookup(c)]);
  }
  return { uvVertices, uvFaces };
}
