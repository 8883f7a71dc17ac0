/**
 * DMD text encoder.
 *
 * Fixed layout: object header with counts, vertex block, face block,
 * then an optional texture block and the end-of-file marker.
 * Floats use 6 decimals, indices are written one-based in 6-wide
 * right-aligned fields, counts in 8-wide fields.
 */

import type { DmdMesh } from './mesh.js';
import type { Triangle } from './vec3.js';

const EOL = '\n';

/**
 * Six decimals, exact ties rounded half to even. A double that lands
 * exactly on a 7th-decimal 5 is a multiple of 1/128, so its 7-decimal
 * form is exact.
 */
function fixed(n: number): string {
  if (Number.isInteger(n * 128)) {
    const seven = n.toFixed(7);
    if (seven.endsWith('5')) {
      const truncated = seven.slice(0, -1);
      if (Number(truncated.slice(-1)) % 2 === 0) return truncated;
    }
  }
  return n.toFixed(6);
}

function pad(n: number, width: number): string {
  return String(n).padStart(width);
}

function countsLine(a: number, b: number): string {
  return `   ${pad(a, 8)}   ${pad(b, 8)}`;
}

function indexLine(t: Triangle): string {
  return `\t${pad(t[0] + 1, 6)} ${pad(t[1] + 1, 6)} ${pad(t[2] + 1, 6)}`;
}

export function encodeDmdLines(mesh: DmdMesh): string[] {
  const out: string[] = [
    'New object',
    `${mesh.name}()`,
    'numverts numfaces',
    countsLine(mesh.vertices.length, mesh.faces.length),
    'Mesh vertices:',
  ];
  for (const v of mesh.vertices) {
    out.push(`\t${fixed(v[0])} ${fixed(v[1])} ${fixed(v[2])}`);
  }
  out.push('end vertices', 'Mesh faces:');
  for (const f of mesh.faces) out.push(indexLine(f));
  out.push('end faces', 'end mesh');

  if (mesh.uvVertices.length > 0) {
    out.push(
      'New Texture:',
      'numtverts numtvfaces',
      countsLine(mesh.uvVertices.length, mesh.uvFaces.length),
      'Texture vertices:',
    );
    // Third UV component is always written and always zero.
    for (const uv of mesh.uvVertices) {
      out.push(`\t${fixed(uv[0])} ${fixed(uv[1])} 0.000000`);
    }
    out.push('end texture vertices', 'Texture faces:');
    for (const f of mesh.uvFaces) out.push(indexLine(f));
    out.push('end texture faces', 'end of texture');
  }

  out.push('end of file');
  return out;
}

/** Serialize a mesh. Never fails; indices are not range-checked. */
export function encodeDmd(mesh: DmdMesh): string {
  return encodeDmdLines(mesh).join(EOL) + EOL;
}
