/**
 * History Entry Types
 */

import type { ScanFailure } from '../manifest/types.js';
import type { Logger } from '../utils/logger.js';

// ============================================================================
// Entry
// ============================================================================

/** Locations of every record belonging to one run */
export interface HistoryEntry {
  runId: string;
  /** Absolute path of the repository the entry protects */
  repo: string;
  /** Absolute path of the entry directory */
  root: string;
  beforeManifestPath: string;
  afterManifestPath: string;
  changesPath: string;
  backupRoot: string;
  metaPath: string;
}

export type SkipReason = 'too-large' | 'binary' | 'unreadable';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface HistoryMeta {
  runId: string;
  repo: string;
  /** ISO-8601 UTC */
  createdAt: string;
  command: string;
  backedUpFiles: string[];
  skippedFiles: SkippedFile[];
  scanFailures: ScanFailure[];
  /** Top-level segments left out of both manifests */
  excluded: string[];
}

// ============================================================================
// Options
// ============================================================================

export interface BackupPolicy {
  /** Lower-case extensions including the leading dot */
  extensions: ReadonlySet<string>;
  maxBackupBytes: number;
}

export interface CreateEntryOptions {
  backupExtensions?: Iterable<string>;
  maxBackupBytes?: number;
  /** Top-level segments to leave out of the manifests */
  exclude?: Iterable<string>;
  now?: () => Date;
}

export interface HistoryManagerOptions {
  logger?: Logger;
}

export interface BackupOutcome {
  backedUp: string[];
  skipped: SkippedFile[];
}

export type BackupDecision = 'backup' | 'ineligible' | SkipReason;

/** Read-only preview of what a new entry would protect */
export interface BackupPlan {
  repo: string;
  totalFiles: number;
  wouldBackUp: string[];
  wouldSkip: SkippedFile[];
  scanFailures: ScanFailure[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_BACKUP_EXTENSIONS: readonly string[] = [
  '.py',
  '.pyw',
  '.sh',
  '.md',
  '.txt',
  '.toml',
  '.yaml',
  '.yml',
  '.json',
];

export const DEFAULT_MAX_BACKUP_BYTES = 5 * 1024 * 1024;

/** Leading bytes inspected for a NUL when deciding whether a file is binary */
export const BINARY_SNIFF_BYTES = 4096;

export const STATE_DIR = '.retrace';

export const HISTORY_FILES = {
  meta: 'meta.json',
  beforeManifest: 'before_manifest.json',
  afterManifest: 'after_manifest.json',
  changes: 'changes.json',
  backupDir: 'before',
  undoStaging: '.undo-staging',
} as const;
