/**
 * Mesh Registry — in-memory named mesh store (the server's "scene").
 *
 * Imports and direct constructions land here as host meshes; exports
 * read from here. Every mutating tool returns a readback of the entry.
 */

import type { HostMesh, BoundingBox } from '@dmd-tools/format';
import { meshBounds } from '@dmd-tools/format';

export type MeshOrigin = 'import' | 'create';

export interface MeshEntry {
  id: string;
  mesh: HostMesh;
  origin: MeshOrigin;
  /** File the mesh was imported from. */
  sourcePath?: string;
}

export interface MeshReadback {
  name: string;
  vertex_count: number;
  polygon_count: number;
  triangle_count: number;
  has_uvs: boolean;
  bounds: BoundingBox | null;
}

export interface MeshResult {
  mesh_id: string;
  origin: MeshOrigin;
  source_path?: string;
  readback: MeshReadback;
}

const VALID_NAME = /^[a-zA-Z0-9_-]+$/;

let nextId = 1;

const meshes = new Map<string, MeshEntry>();

export function readback(mesh: HostMesh): MeshReadback {
  return {
    name: mesh.name,
    vertex_count: mesh.positions.length,
    polygon_count: mesh.polygons.length,
    triangle_count: mesh.polygons.filter((p) => p.length === 3).length,
    has_uvs: mesh.uvs !== null,
    bounds: meshBounds(mesh.positions),
  };
}

function toResult(entry: MeshEntry): MeshResult {
  return {
    mesh_id: entry.id,
    origin: entry.origin,
    source_path: entry.sourcePath,
    readback: readback(entry.mesh),
  };
}

/** Store a mesh and return its ID + readback. A given name overwrites. */
export function create(mesh: HostMesh, origin: MeshOrigin, name?: string, sourcePath?: string): MeshResult {
  if (name !== undefined && !VALID_NAME.test(name)) {
    throw new Error(
      `Invalid mesh name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  let id = name ?? `mesh_${nextId++}`;
  while (name === undefined && meshes.has(id)) {
    // Auto-generated collision with an explicit name — bump
    id = `mesh_${nextId++}`;
  }
  const entry: MeshEntry = { id, mesh, origin, sourcePath };
  meshes.set(id, entry);
  return toResult(entry);
}

/** Retrieve a mesh or throw a clear error. */
export function get(id: string): MeshEntry {
  const entry = meshes.get(id);
  if (!entry) {
    const available = [...meshes.keys()];
    throw new Error(
      `Mesh "${id}" not found. Available meshes: [${available.join(', ')}]`
    );
  }
  return entry;
}

export function info(id: string): MeshResult {
  return toResult(get(id));
}

export function remove(id: string): void {
  if (!meshes.delete(id)) {
    throw new Error(`Mesh "${id}" not found — cannot delete.`);
  }
}

export function has(id: string): boolean {
  return meshes.has(id);
}

/** All entries in insertion order. */
export function entries(): MeshEntry[] {
  return [...meshes.values()];
}

export function list(): MeshResult[] {
  return entries().map(toResult);
}

/** Clear all meshes (for testing). */
export function clear(): void {
  meshes.clear();
  nextId = 1;
}
