/** Minimal 2D/3D vectors — plain tuples, same as the wire format. */
export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

/** Three vertex (or UV vertex) indices. Zero-based in memory. */
export type Triangle = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export function max3(a: Vec3, b: Vec3): Vec3 {
  return [Math.max(a[0], b[0]), Math.max(a[1], b[1]), Math.max(a[2], b[2])];
}

export function min3(a: Vec3, b: Vec3): Vec3 {
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1]), Math.min(a[2], b[2])];
}

/** Shift every index of a triangle by `offset`. */
export function offsetTriangle(t: Triangle, offset: number): Triangle {
  return [t[0] + offset, t[1] + offset, t[2] + offset];
}

/** Reverse winding: [a, b, c] → [c, b, a]. */
export function reverseTriangle(t: Triangle): Triangle {
  return [t[2], t[1], t[0]];
}
