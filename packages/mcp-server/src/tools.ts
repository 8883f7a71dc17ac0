/**
 * MCP Tool Registrations — DMD import, construction, export, session.
 *
 * Every tool returns JSON so the LLM always knows the registry state
 * after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  readDmdFile, readDmdObjects,
  toHostMesh, fromHostMesh,
  exportMeshes, EXPORT_MODES,
  type HostMesh, type MeshSource, type ExportMode, type ExportOptions,
} from '@dmd-tools/format';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as registry from './registry.js';
import type { ServerConfig } from './config.js';
import type { Logger } from './logger.js';

export interface ToolContext {
  config: ServerConfig;
  logger: Logger;
}

const finite = z.number().finite();

const flipShape = {
  flip_y: z.boolean().default(false).describe('Negate Y coordinates'),
  flip_z: z.boolean().default(false).describe('Negate Z coordinates'),
  flip_faces: z.boolean().default(false).describe('Reverse face winding (flips normals)'),
};

const DEFAULT_FILENAMES: Record<ExportMode, string> = {
  single: 'mesh.dmd',
  separate: 'scene.dmd',
  combined: 'combined.dmd',
};

function json(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}

/** Corner UVs must line up with polygons one-to-one. */
function checkUvLayout(polygons: number[][], uvs: HostMesh['uvs'], vertexCount: number): void {
  polygons.forEach((loop, p) => {
    const bad = loop.find((i) => i >= vertexCount);
    if (bad !== undefined) {
      throw new Error(`Polygon ${p} references vertex ${bad}, but only ${vertexCount} positions were given.`);
    }
  });
  if (uvs === null) return;
  if (uvs.length !== polygons.length) {
    throw new Error(`uvs has ${uvs.length} entries but there are ${polygons.length} polygons. Give one UV list per polygon.`);
  }
  uvs.forEach((corners, p) => {
    if (corners.length !== polygons[p].length) {
      throw new Error(`uvs[${p}] has ${corners.length} corners but polygon ${p} has ${polygons[p].length}.`);
    }
  });
}

export function registerTools(server: McpServer, { config, logger }: ToolContext): void {

  // ─── Import / construct (2) ─────────────────────────────────

  server.tool(
    'import_dmd',
    'Read a .dmd file into the registry. Falls back from UTF-8 to windows-1251 and latin1 for legacy files.',
    {
      file_path: z.string().min(1).describe('Path of the .dmd file to read'),
      ...flipShape,
      split_objects: z.boolean().default(false)
        .describe('Register each "New object" block as its own mesh instead of one merged mesh'),
      name: z.string().optional().describe('Optional registry name (letters, digits, hyphens, underscores only)'),
    },
    async ({ file_path, flip_y, flip_z, flip_faces, split_objects, name }) => {
      const axis = { flipY: flip_y, flipZ: flip_z, flipFaces: flip_faces };
      const decoded = split_objects ? readDmdObjects(file_path) : [readDmdFile(file_path)];
      const results = decoded.map((mesh, i) =>
        registry.create(toHostMesh(mesh, axis), 'import', i === 0 ? name : undefined, file_path),
      );
      for (const r of results) {
        logger.info(`imported ${r.mesh_id} from ${file_path}: ${r.readback.vertex_count} vertices, ${r.readback.polygon_count} faces`);
      }
      return json(split_objects ? { count: results.length, meshes: results } : results[0]);
    }
  );

  server.tool(
    'create_mesh',
    'Create a mesh from positions and polygons (zero-based). Only triangles are exported; triangulate n-gons first.',
    {
      positions: z.array(z.tuple([finite, finite, finite])).min(1).max(1_000_000)
        .describe('Array of [x, y, z] vertex positions'),
      polygons: z.array(z.array(z.number().int().min(0)).min(3)).min(1)
        .describe('Vertex loops as zero-based indices into positions'),
      uvs: z.array(z.array(z.tuple([finite, finite]))).optional()
        .describe('Optional per-corner [u, v] (V up), one list per polygon'),
      name: z.string().optional().describe('Optional registry name (letters, digits, hyphens, underscores only)'),
      object_name: z.string().min(1).optional().describe('Object name written into the file (default: registry name)'),
    },
    async ({ positions, polygons, uvs, name, object_name }) => {
      const corners = uvs ?? null;
      checkUvLayout(polygons, corners, positions.length);
      const mesh: HostMesh = {
        name: object_name ?? name ?? 'TriMesh',
        positions,
        polygons,
        uvs: corners,
      };
      const result = registry.create(mesh, 'create', name);
      logger.debug(`created ${result.mesh_id}`);
      return json(result);
    }
  );

  // ─── Export (1) ─────────────────────────────────────────────

  server.tool(
    'export_dmd',
    'Export meshes as DMD. Modes: single (first mesh, one file), separate (one file per mesh, <filename>_<mesh>.dmd), combined (all meshes merged into one file).',
    {
      mode: z.enum(EXPORT_MODES).default('single').describe('Export mode'),
      meshes: z.array(z.string()).min(1).optional().describe('Mesh IDs in output order (default: all, in creation order)'),
      filename: z.string().optional().describe('Output filename inside the export directory'),
      ...flipShape,
      export_uv: z.boolean().default(true).describe('Write texture coordinates when the mesh has them'),
    },
    async ({ mode, meshes, filename, flip_y, flip_z, flip_faces, export_uv }) => {
      const entries = meshes ? meshes.map((id) => registry.get(id)) : registry.entries();
      const options: ExportOptions = { flipY: flip_y, flipZ: flip_z, flipFaces: flip_faces, exportUv: export_uv };
      const sources: MeshSource[] = entries.map((entry) => ({
        name: entry.id,
        extract: () => fromHostMesh(entry.mesh, options),
      }));

      fs.mkdirSync(config.exportDir, { recursive: true });
      const safeName = (filename ?? DEFAULT_FILENAMES[mode]).replace(/[^a-zA-Z0-9_.-]/g, '_');
      const report = exportMeshes(mode, sources, path.join(config.exportDir, safeName));

      for (const failure of report.failures) {
        logger.warn(`export of ${failure.name} failed: ${failure.error}`);
      }
      logger.info(`export ${mode}: ${report.status}, ${report.completed} of ${sources.length} meshes written`);
      return json(report);
    }
  );

  // ─── Session (3) ────────────────────────────────────────────

  server.tool(
    'mesh_info',
    'Show counts, UV presence and bounds for one mesh.',
    {
      mesh: z.string().describe('ID of the mesh'),
    },
    async ({ mesh }) => json(registry.info(mesh))
  );

  server.tool(
    'list_meshes',
    'List all meshes in the registry.',
    {},
    async () => {
      const meshes = registry.list();
      return json({ count: meshes.length, meshes });
    }
  );

  server.tool(
    'delete_mesh',
    'Remove a mesh from the registry.',
    {
      mesh: z.string().describe('ID of the mesh to delete'),
    },
    async ({ mesh }) => {
      registry.remove(mesh);
      return json({ deleted: mesh, remaining: registry.list().length });
    }
  );
}
