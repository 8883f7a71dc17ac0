/**
 * DMD text decoder.
 *
 * A section state machine over the non-empty, trimmed lines of a file:
 *
 *   New object            → next line is the object name, section = none
 *   Mesh vertices: etc.   → exact header match selects the section
 *   any line with end/new → section = none (also "end of file", "New Texture:")
 *   anything else         → data line for the current section
 *
 * Data lines that carry too few numbers are dropped. Content never
 * raises; only byte decoding can fail (see decodeText).
 */

import type { DmdMesh } from './mesh.js';
import { createMesh } from './mesh.js';
import { scanFloats, scanIntegers } from './scanner.js';
import { UnreadableFileError, describeCause } from './errors.js';

export type Section = 'none' | 'vertices' | 'faces' | 'textureVertices' | 'textureFaces';

const OBJECT_MARKER = 'New object';

const SECTION_HEADERS = new Map<string, Section>([
  ['Mesh vertices:', 'vertices'],
  ['Mesh faces:', 'faces'],
  ['Texture vertices:', 'textureVertices'],
  ['Texture faces:', 'textureFaces'],
]);

const SECTION_CLOSERS = ['end', 'new'];

/** Tried in order when reading bytes; latin1 accepts any byte sequence. */
export const DEFAULT_ENCODINGS: readonly string[] = ['utf-8', 'windows-1251', 'latin1'];

function meaningfulLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/).map((l) => l.trim()).filter((l) => l.length > 0);
}

export function parseObjectName(line: string): string {
  return line.replaceAll('()', '').trim();
}

/** Section a line switches to, or null when it is a data line. */
export function sectionTransition(line: string): Section | null {
  const header = SECTION_HEADERS.get(line);
  if (header) return header;
  const lower = line.toLowerCase();
  if (SECTION_CLOSERS.some((k) => lower.includes(k))) return 'none';
  return null;
}

/** Record one data line into `mesh`. Returns false when the line was dropped. */
export function applyDataLine(mesh: DmdMesh, section: Section, line: string): boolean {
  switch (section) {
    case 'vertices': {
      const c = scanFloats(line);
      if (c.length < 3) return false;
      mesh.vertices.push([c[0], c[1], c[2]]);
      return true;
    }
    case 'faces': {
      const i = scanIntegers(line);
      if (i.length < 3) return false;
      mesh.faces.push([i[0] - 1, i[1] - 1, i[2] - 1]);
      return true;
    }
    case 'textureVertices': {
      const c = scanFloats(line);
      if (c.length < 2) return false;
      mesh.uvVertices.push([c[0], c[1]]);
      return true;
    }
    case 'textureFaces': {
      const i = scanIntegers(line);
      if (i.length < 3) return false;
      mesh.uvFaces.push([i[0] - 1, i[1] - 1, i[2] - 1]);
      return true;
    }
    case 'none':
      return false;
  }
}

function hasData(mesh: DmdMesh): boolean {
  return mesh.vertices.length > 0 || mesh.faces.length > 0
    || mesh.uvVertices.length > 0 || mesh.uvFaces.length > 0;
}

function decodeLines(text: string, splitObjects: boolean): DmdMesh[] {
  const meshes = [createMesh()];
  let current = meshes[0];
  let section: Section = 'none';
  let awaitingName = false;

  for (const line of meaningfulLines(text)) {
    if (awaitingName) {
      current.name = parseObjectName(line);
      awaitingName = false;
      continue;
    }
    if (line.startsWith(OBJECT_MARKER)) {
      if (splitObjects) {
        current = createMesh();
        meshes.push(current);
      }
      awaitingName = true;
      section = 'none';
      continue;
    }
    const next = sectionTransition(line);
    if (next !== null) {
      section = next;
      continue;
    }
    applyDataLine(current, section, line);
  }

  // Drop an empty prelude before the first object marker.
  if (meshes.length > 1 && !hasData(meshes[0])) meshes.shift();
  return meshes;
}

/**
 * Decode a whole file into one mesh. Several `New object` blocks
 * accumulate into the same mesh and the last name wins.
 */
export function decodeDmd(text: string): DmdMesh {
  return decodeLines(text, false)[0];
}

/** Decode each `New object` block into its own mesh, indices local to the block. */
export function decodeDmdObjects(text: string): DmdMesh[] {
  return decodeLines(text, true);
}

/**
 * Decode raw bytes to text, trying each encoding in strict mode.
 * `source` only labels the error.
 */
export function decodeText(
  bytes: Uint8Array,
  encodings: readonly string[] = DEFAULT_ENCODINGS,
  source = '<buffer>',
): string {
  let lastError: unknown;
  for (const label of encodings) {
    try {
      return new TextDecoder(label, { fatal: true }).decode(bytes);
    } catch (err) {
      // RangeError: label unsupported by this runtime; TypeError: invalid bytes
      lastError = new Error(`${label}: ${describeCause(err)}`, { cause: err });
    }
  }
  throw new UnreadableFileError(source, [...encodings], { cause: lastError });
}

export function decodeDmdBytes(
  bytes: Uint8Array,
  encodings: readonly string[] = DEFAULT_ENCODINGS,
): DmdMesh {
  return decodeDmd(decodeText(bytes, encodings));
}
