/**
 * @retrace/core - repository snapshots and divergence-safe undo
 *
 * - Content manifests and change sets
 * - History entries with pre-run backups
 * - Undo that refuses to clobber files edited after the run
 * - Isolated sandbox copies with an injected runtime guard
 * - Guarded mutation runs (plan / apply)
 */

export * from './utils/index.js';
export * from './manifest/index.js';
export * from './history/index.js';
export * from './undo/index.js';
export * from './sandbox/index.js';
export * from './mutation/index.js';
