/**
 * Error taxonomy. Malformed data lines are not errors: the decoder
 * drops them and keeps going.
 */

export class DmdError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DmdError';
  }
}

/** No candidate encoding could decode the file, or it could not be read at all. */
export class UnreadableFileError extends DmdError {
  constructor(
    public readonly path: string,
    public readonly attempted: string[],
    options?: { cause?: unknown },
  ) {
    const tried = attempted.length > 0
      ? `tried encodings: ${attempted.join(', ')}`
      : `read failed: ${describeCause(options?.cause)}`;
    super(`Cannot read DMD file "${path}" (${tried})`, options);
    this.name = 'UnreadableFileError';
  }
}

/** An export source that is not a triangle mesh, or has no triangles. */
export class UnsupportedSourceError extends DmdError {
  constructor(public readonly source: string, reason: string) {
    super(`Cannot export "${source}": ${reason}`);
    this.name = 'UnsupportedSourceError';
  }
}

export class WriteFailureError extends DmdError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Cannot write DMD file "${path}": ${describeCause(cause)}`, { cause });
    this.name = 'WriteFailureError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
