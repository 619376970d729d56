/**
 * Content Manifest Types
 */

// ============================================================================
// Manifest
// ============================================================================

export interface ManifestEntry {
  /** POSIX-style path relative to the scanned root */
  relPath: string;
  size: number;
  /** SHA-256 hex digest of the full byte stream */
  hash: string;
}

/** Keyed by `relPath`; never mutated once built */
export type Manifest = ReadonlyMap<string, ManifestEntry>;

export interface ScanFailure {
  relPath: string;
  reason: string;
}

export interface ManifestScan {
  manifest: Manifest;
  /** Files or directories that could not be read and were left out */
  failures: ScanFailure[];
}

export interface BuildManifestOptions {
  /** Top-level path segments to skip (replaces the defaults) */
  exclude?: Iterable<string>;
}

/** On-disk shape of a single manifest record */
export interface SerializedManifestEntry {
  rel_path: string;
  size: number;
  sha256: string;
}

// ============================================================================
// Change Set
// ============================================================================

export interface ChangeSet {
  runId: string;
  added: string[];
  deleted: string[];
  modified: string[];
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MANIFEST_EXCLUDES: readonly string[] = [
  '.git',
  '.venv',
  'venv',
  'build',
  'dist',
  '__pycache__',
  'node_modules',
  '.retrace',
];

/** Read size used while hashing */
export const HASH_CHUNK_BYTES = 1024 * 1024;
