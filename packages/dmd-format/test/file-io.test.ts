import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { readDmdFile, readDmdObjects, writeDmdFile } from '../src/file-io.js';
import { createMesh } from '../src/mesh.js';
import { UnreadableFileError, WriteFailureError } from '../src/errors.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dmd-io-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('writeDmdFile / readDmdFile', () => {

  it('round-trips a mesh through disk', () => {
    const file = path.join(dir, 'tri.dmd');
    const mesh = createMesh({ name: 'Tri', vertices: [[0, 0, 0], [1, 0, 0], [0, 1, 0]], faces: [[0, 1, 2]] });
    const bytes = writeDmdFile(file, mesh);

    expect(bytes).toBe(fs.statSync(file).size);
    const back = readDmdFile(file);
    expect(back.name).toBe('Tri');
    expect(back.vertices).toEqual(mesh.vertices);
    expect(back.faces).toEqual(mesh.faces);
  });

  it('reads legacy windows-1251 names', () => {
    const file = path.join(dir, 'legacy.dmd');
    fs.writeFileSync(file, Buffer.concat([
      Buffer.from('New object\n', 'ascii'),
      Buffer.from([0xca, 0xf3, 0xe1]),
      Buffer.from('()\nend of file\n', 'ascii'),
    ]));
    expect(readDmdFile(file).name).toBe('Куб');
  });

  it('reads each object block separately', () => {
    const file = path.join(dir, 'two.dmd');
    fs.writeFileSync(file, 'New object\nA()\nNew object\nB()\n');
    expect(readDmdObjects(file).map((m) => m.name)).toEqual(['A', 'B']);
  });

  it('raises UnreadableFileError for a missing file', () => {
    const file = path.join(dir, 'missing.dmd');
    try {
      readDmdFile(file);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnreadableFileError);
      if (err instanceof UnreadableFileError) {
        expect(err.path).toBe(file);
        expect(err.attempted).toEqual([]);
      }
    }
  });

  it('raises UnreadableFileError when no encoding decodes the bytes', () => {
    const file = path.join(dir, 'binary.dmd');
    fs.writeFileSync(file, Buffer.from([0xff, 0xfe]));
    expect(() => readDmdFile(file, ['utf-8'])).toThrow(`Cannot read DMD file "${file}" (tried encodings: utf-8)`);
  });

  it('raises WriteFailureError when the target directory does not exist', () => {
    const file = path.join(dir, 'nope', 'tri.dmd');
    expect(() => writeDmdFile(file, createMesh())).toThrow(WriteFailureError);
  });
});
