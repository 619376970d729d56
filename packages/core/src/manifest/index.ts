export * from './types.js';
export { digestFile, hashFile, hashContent } from './hash.js';
export type { FileDigest } from './hash.js';
export {
  buildManifest,
  computeChangeSet,
  manifestsEqual,
  serializeManifest,
  deserializeManifest,
} from './builder.js';
