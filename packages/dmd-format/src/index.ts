// Public API
export type { Vec2, Vec3, Triangle, BoundingBox } from './vec3.js';
export { vec3 } from './vec3.js';

// Mesh model
export type { DmdMesh, MeshStats, UvMapping } from './mesh.js';
export { createMesh, meshStats, meshBounds, uvMapping, DEFAULT_MESH_NAME, COMBINED_MESH_NAME } from './mesh.js';

// Errors
export { DmdError, UnreadableFileError, UnsupportedSourceError, WriteFailureError } from './errors.js';

// Text format
export type { TokenKind } from './scanner.js';
export { scanTokens, scanFloats, scanIntegers } from './scanner.js';
export type { Section } from './decoder.js';
export { decodeDmd, decodeDmdObjects, decodeDmdBytes, decodeText, DEFAULT_ENCODINGS } from './decoder.js';
export { encodeDmd, encodeDmdLines } from './encoder.js';

// File I/O
export { readDmdFile, readDmdObjects, readDmdText, writeDmdFile } from './file-io.js';

// Aggregation + UV dedup
export type { MeshSource, ItemFailure, CombineResult } from './aggregate.js';
export { mergeMeshes, combineSources } from './aggregate.js';
export type { IndexedUvs } from './uv.js';
export { dedupeCornerUvs, uvKey, UV_PRECISION } from './uv.js';

// Host conversion
export type { HostMesh, AxisOptions, ExportOptions } from './host.js';
export { fromHostMesh, toHostMesh } from './host.js';

// Batch export
export type { ExportMode, BatchStatus, BatchReport, ExportedFile } from './export.js';
export { exportMeshes, separateFilePath, EXPORT_MODES } from './export.js';
