import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { exportMeshes, separateFilePath } from '../src/export.js';
import type { MeshSource } from '../src/aggregate.js';
import { createMesh } from '../src/mesh.js';
import type { DmdMesh } from '../src/mesh.js';
import { readDmdFile } from '../src/file-io.js';
import { UnsupportedSourceError } from '../src/errors.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dmd-export-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function meshNamed(name: string, x: number): DmdMesh {
  return createMesh({ name, vertices: [[x, 0, 0], [x + 1, 0, 0], [x, 1, 0]], faces: [[0, 1, 2]] });
}

function ok(name: string, x: number): MeshSource {
  const mesh = meshNamed(name, x);
  return { name, extract: () => mesh };
}

function failing(name: string): MeshSource {
  return { name, extract: () => { throw new Error('boom'); } };
}

describe('separateFilePath', () => {

  it('appends the object name to the target base', () => {
    expect(separateFilePath('/out/scene.dmd', 'Cube')).toBe('/out/scene_Cube.dmd');
    expect(separateFilePath('/out/scene', 'A')).toBe('/out/scene_A.dmd');
  });

  it('replaces characters that are unsafe in file names', () => {
    expect(separateFilePath('/out/scene.dmd', 'My Cube/1')).toBe('/out/scene_My_Cube_1.dmd');
  });
});

describe('exportMeshes', () => {

  it('single: writes the first source to the target path', () => {
    const target = path.join(dir, 'one.dmd');
    const report = exportMeshes('single', [ok('A', 0), ok('B', 5)], target);

    expect(report.status).toBe('complete');
    expect(report.completed).toBe(1);
    expect(report.files.map((f) => f.file_path)).toEqual([target]);
    expect(readDmdFile(target).name).toBe('A');
  });

  it('single: raises when the source cannot be extracted', () => {
    expect(() => exportMeshes('single', [failing('Cam')], path.join(dir, 'x.dmd'))).toThrow('boom');
  });

  it('separate: writes one file per source and reports failures', () => {
    const target = path.join(dir, 'scene.dmd');
    const report = exportMeshes('separate', [ok('A', 0), failing('B'), ok('C', 5)], target);

    expect(report.status).toBe('partial');
    expect(report.completed).toBe(2);
    expect(report.failures).toEqual([{ name: 'B', error: 'boom' }]);
    expect(report.files.map((f) => path.basename(f.file_path))).toEqual(['scene_A.dmd', 'scene_C.dmd']);
    expect(fs.existsSync(path.join(dir, 'scene_B.dmd'))).toBe(false);
    expect(readDmdFile(path.join(dir, 'scene_C.dmd')).vertices[0]).toEqual([5, 0, 0]);
  });

  it('combined: merges successful sources into one file with offsets', () => {
    const target = path.join(dir, 'all.dmd');
    const report = exportMeshes('combined', [ok('A', 0), failing('B'), ok('C', 5)], target);

    expect(report.status).toBe('partial');
    expect(report.completed).toBe(2);
    expect(report.files).toHaveLength(1);
    expect(report.files[0].sources).toEqual(['A', 'C']);
    expect(report.files[0].stats.vertex_count).toBe(6);

    const back = readDmdFile(target);
    expect(back.name).toBe('Combined_Scene');
    expect(back.faces).toEqual([[0, 1, 2], [3, 4, 5]]);
  });

  it('combined: writes nothing when every source fails', () => {
    const target = path.join(dir, 'none.dmd');
    const report = exportMeshes('combined', [failing('A'), failing('B')], target);
    expect(report.status).toBe('failed');
    expect(report.completed).toBe(0);
    expect(fs.existsSync(target)).toBe(false);
  });

  it('raises when there is nothing to export', () => {
    expect(() => exportMeshes('combined', [], path.join(dir, 'empty.dmd'))).toThrow(UnsupportedSourceError);
  });
});
