export { toBufferGeometry, fromBufferGeometry, triangleCount } from './geometry.js';
export { loadDMDBuffer, meshSource, COLORS } from './dmd-loader.js';
export type { LoadedModel, LoadOptions } from './dmd-loader.js';
