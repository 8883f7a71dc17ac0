/**
 * File boundary: the only place the decoder and encoder touch disk.
 * Each call opens, reads or writes, and closes in one step.
 */

import * as fs from 'node:fs';
import type { DmdMesh } from './mesh.js';
import { decodeDmd, decodeDmdObjects, decodeText, DEFAULT_ENCODINGS } from './decoder.js';
import { encodeDmd } from './encoder.js';
import { UnreadableFileError, WriteFailureError } from './errors.js';

function readBytes(filePath: string): Uint8Array {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    throw new UnreadableFileError(filePath, [], { cause: err });
  }
}

export function readDmdText(filePath: string, encodings: readonly string[] = DEFAULT_ENCODINGS): string {
  return decodeText(readBytes(filePath), encodings, filePath);
}

export function readDmdFile(filePath: string, encodings: readonly string[] = DEFAULT_ENCODINGS): DmdMesh {
  return decodeDmd(readDmdText(filePath, encodings));
}

export function readDmdObjects(filePath: string, encodings: readonly string[] = DEFAULT_ENCODINGS): DmdMesh[] {
  return decodeDmdObjects(readDmdText(filePath, encodings));
}

/** Write `mesh` as UTF-8. Returns the number of bytes written. */
export function writeDmdFile(filePath: string, mesh: DmdMesh): number {
  const text = encodeDmd(mesh);
  try {
    fs.writeFileSync(filePath, text, 'utf-8');
  } catch (err) {
    throw new WriteFailureError(filePath, err);
  }
  return Buffer.byteLength(text, 'utf-8');
}
