/**
 * Batch export over a closed set of modes.
 *
 *   single    first source → target path; any failure raises
 *   separate  each source → <target base>_<name>.dmd; failures collected
 *   combined  all sources merged → target path; failed sources skipped
 */

import * as path from 'node:path';
import type { MeshStats } from './mesh.js';
import { meshStats } from './mesh.js';
import type { MeshSource, ItemFailure } from './aggregate.js';
import { combineSources } from './aggregate.js';
import { writeDmdFile } from './file-io.js';
import { UnsupportedSourceError, describeCause } from './errors.js';

export const EXPORT_MODES = ['single', 'separate', 'combined'] as const;
export type ExportMode = (typeof EXPORT_MODES)[number];

export type BatchStatus = 'complete' | 'partial' | 'failed';

export interface ExportedFile {
  file_path: string;
  file_size_bytes: number;
  /** Source names written to this file. */
  sources: string[];
  stats: MeshStats;
}

export interface BatchReport {
  mode: ExportMode;
  status: BatchStatus;
  completed: number;
  failures: ItemFailure[];
  files: ExportedFile[];
}

const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\s]/g;

/** `/out/scene.dmd` + `Cube` → `/out/scene_Cube.dmd` */
export function separateFilePath(targetPath: string, name: string): string {
  const ext = path.extname(targetPath);
  const base = ext ? targetPath.slice(0, -ext.length) : targetPath;
  return `${base}_${name.replace(UNSAFE_FILENAME_CHARS, '_')}.dmd`;
}

function statusOf(completed: number, failed: number): BatchStatus {
  if (failed === 0) return 'complete';
  return completed === 0 ? 'failed' : 'partial';
}

function report(mode: ExportMode, files: ExportedFile[], completed: number, failures: ItemFailure[]): BatchReport {
  return { mode, status: statusOf(completed, failures.length), completed, failures, files };
}

export function exportMeshes(
  mode: ExportMode,
  sources: ReadonlyArray<MeshSource>,
  targetPath: string,
): BatchReport {
  if (sources.length === 0) {
    throw new UnsupportedSourceError(path.basename(targetPath), 'no mesh objects to export');
  }

  switch (mode) {
    case 'single': {
      const source = sources[0];
      const mesh = source.extract();
      const bytes = writeDmdFile(targetPath, mesh);
      return report(mode, [{
        file_path: targetPath, file_size_bytes: bytes, sources: [source.name], stats: meshStats(mesh),
      }], 1, []);
    }

    case 'separate': {
      const files: ExportedFile[] = [];
      const failures: ItemFailure[] = [];
      for (const source of sources) {
        try {
          const mesh = source.extract();
          const filePath = separateFilePath(targetPath, source.name);
          const bytes = writeDmdFile(filePath, mesh);
          files.push({ file_path: filePath, file_size_bytes: bytes, sources: [source.name], stats: meshStats(mesh) });
        } catch (err) {
          failures.push({ name: source.name, error: describeCause(err) });
        }
      }
      return report(mode, files, files.length, failures);
    }

    case 'combined': {
      const { mesh, included, failures } = combineSources(sources);
      if (included.length === 0) return report(mode, [], 0, failures);
      const bytes = writeDmdFile(targetPath, mesh);
      return report(mode, [{
        file_path: targetPath, file_size_bytes: bytes, sources: included, stats: meshStats(mesh),
      }], included.length, failures);
    }
  }
}
