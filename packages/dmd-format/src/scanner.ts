/**
 * Token scanner for DMD data lines.
 *
 * Pulls numbers out of a line and ignores everything else (labels,
 * tabs, punctuation), so hand-edited and exported files both read.
 */

export type TokenKind = 'float' | 'integer';

const PATTERNS: Record<TokenKind, RegExp> = {
  float: /-?\d+\.?\d*(?:[eE][+-]?\d+)?/g,
  // Indices are always written unsigned.
  integer: /\d+/g,
};

/** Matched tokens, left to right. Empty means no data on this line. */
export function scanTokens(line: string, kind: TokenKind): string[] {
  return line.match(PATTERNS[kind]) ?? [];
}

export function scanFloats(line: string): number[] {
  return scanTokens(line, 'float').map(Number);
}

export function scanIntegers(line: string): number[] {
  return scanTokens(line, 'integer').map((t) => parseInt(t, 10));
}
