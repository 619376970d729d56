/**
 * History Manager
 *
 * Lifecycle of a history entry: create (BEFORE manifest + backups) before a
 * mutation, finalize (AFTER manifest + change set) after it, then list and
 * resolve entries for undo.
 */

import type { ChangeSet, Manifest } from '../manifest/types.js';
import { DEFAULT_MANIFEST_EXCLUDES } from '../manifest/types.js';
import {
  buildManifest,
  computeChangeSet,
  deserializeManifest,
  serializeManifest,
} from '../manifest/builder.js';
import type {
  BackupPlan,
  CreateEntryOptions,
  HistoryEntry,
  HistoryManagerOptions,
  HistoryMeta,
  SkippedFile,
} from './types.js';
import { HistoryStorage } from './storage.js';
import { BackupStore, createBackupPolicy } from './backup-store.js';
import { changeSetFileSchema, manifestFileSchema, metaFileSchema } from './schemas.js';
import type { ChangeSetFile, MetaFile } from './schemas.js';
import { HistoryNotFoundError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

const META_NOTE = 'Undo can only restore files that were backed up.';

// ============================================================================
// History Manager
// ============================================================================

export class HistoryManager {
  private readonly storage: HistoryStorage;
  private readonly logger: Logger;

  constructor(repo: string, options: HistoryManagerOptions = {}) {
    this.storage = new HistoryStorage(repo);
    this.logger = options.logger ?? getLogger('history');
  }

  getStorage(): HistoryStorage {
    return this.storage;
  }

  // ============================================================================
  // Create
  // ============================================================================

  /**
   * Record the BEFORE state and back up eligible files
   */
  async create(command: string, options: CreateEntryOptions = {}): Promise<HistoryEntry> {
    const now = (options.now ?? (() => new Date()))();
    const excluded = [...(options.exclude ?? DEFAULT_MANIFEST_EXCLUDES)];
    const entry = await this.storage.allocateEntry(now);
    this.logger.debug('Allocated history entry', { runId: entry.runId, root: entry.root });

    const scan = await buildManifest(entry.repo, { exclude: excluded });
    await this.storage.writeRecord(entry.beforeManifestPath, serializeManifest(scan.manifest));

    const store = new BackupStore(
      entry.repo,
      entry.backupRoot,
      createBackupPolicy(options),
      this.logger.child('backup')
    );
    const outcome = await store.backup(scan.manifest);

    const meta: MetaFile = {
      repo: entry.repo,
      run_id: entry.runId,
      created_at: now.toISOString(),
      command,
      backed_up_files: outcome.backedUp,
      skipped_files: outcome.skipped,
      scan_failures: scan.failures.map((failure) => ({ rel_path: failure.relPath, reason: failure.reason })),
      excluded,
      note: META_NOTE,
    };
    await this.storage.writeRecord(entry.metaPath, meta);

    this.logger.info('History entry created', {
      runId: entry.runId,
      files: scan.manifest.size,
      backedUp: outcome.backedUp.length,
      skipped: outcome.skipped.length,
    });

    return entry;
  }

  /**
   * Preview backup eligibility without writing anything
   */
  async plan(options: CreateEntryOptions = {}): Promise<BackupPlan> {
    const repo = this.storage.getRepoPath();
    const scan = await buildManifest(repo, { exclude: options.exclude });
    const store = new BackupStore(repo, this.storage.getHistoryPath(), createBackupPolicy(options), this.logger);

    const wouldBackUp: string[] = [];
    const wouldSkip: SkippedFile[] = [];
    for (const entry of scan.manifest.values()) {
      const decision = await store.classify(entry);
      if (decision === 'backup') {
        wouldBackUp.push(entry.relPath);
      } else if (decision !== 'ineligible') {
        wouldSkip.push({ path: entry.relPath, reason: decision });
      }
    }

    return {
      repo,
      totalFiles: scan.manifest.size,
      wouldBackUp: wouldBackUp.sort(),
      wouldSkip: wouldSkip.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
      scanFailures: scan.failures,
    };
  }

  // ============================================================================
  // Finalize
  // ============================================================================

  /**
   * Record the AFTER state and the change set; safe to call repeatedly
   */
  async finalize(entry: HistoryEntry): Promise<ChangeSet> {
    const before = await this.loadManifest(entry, 'before', 'finalize');

    const metaRead = await this.storage.readRecord(entry.metaPath, metaFileSchema);
    const excluded = metaRead.ok && metaRead.value.excluded ? metaRead.value.excluded : DEFAULT_MANIFEST_EXCLUDES;

    const scan = await buildManifest(entry.repo, { exclude: excluded });
    await this.storage.writeRecord(entry.afterManifestPath, serializeManifest(scan.manifest));

    const changes = computeChangeSet(entry.runId, before, scan.manifest);
    const record: ChangeSetFile = {
      run_id: changes.runId,
      added: changes.added,
      deleted: changes.deleted,
      modified: changes.modified,
    };
    await this.storage.writeRecord(entry.changesPath, record);

    this.logger.info('History entry finalized', {
      runId: entry.runId,
      added: changes.added.length,
      deleted: changes.deleted.length,
      modified: changes.modified.length,
    });

    return changes;
  }

  // ============================================================================
  // Read
  // ============================================================================

  /**
   * Entry metadata, newest first; entries with unreadable metadata are skipped
   */
  async list(): Promise<HistoryMeta[]> {
    const items: HistoryMeta[] = [];
    for (const runId of await this.storage.listRunIds()) {
      const read = await this.storage.readRecord(this.storage.entryFor(runId).metaPath, metaFileSchema);
      if (read.ok) {
        items.push(toHistoryMeta(read.value));
      } else {
        this.logger.debug('Skipping history entry', { runId, reason: read.message });
      }
    }
    return items;
  }

  async get(runId: string): Promise<HistoryMeta> {
    const read = await this.storage.readRecord(this.storage.entryFor(runId).metaPath, metaFileSchema);
    if (!read.ok) {
      throw new HistoryNotFoundError(`History entry ${runId} is missing or incomplete`, {
        operation: 'get',
        runId,
        missing: read.message,
      });
    }
    return toHistoryMeta(read.value);
  }

  /**
   * Resolve `latest`, an exact run id, or a unique prefix of one
   */
  async resolveRunId(ref: string): Promise<string> {
    const runIds = await this.storage.listRunIds();

    if (ref === 'latest') {
      const newest = runIds[0];
      if (!newest) {
        throw new HistoryNotFoundError('No history entries found', { operation: 'resolveRunId', runId: ref });
      }
      return newest;
    }

    if (runIds.includes(ref)) {
      return ref;
    }

    const matches = runIds.filter((runId) => runId.startsWith(ref));
    if (matches.length === 1 && matches[0]) {
      return matches[0];
    }

    throw new HistoryNotFoundError(
      matches.length > 1
        ? `Run id prefix "${ref}" is ambiguous (${matches.length} matches)`
        : `No history entry matches "${ref}"`,
      { operation: 'resolveRunId', runId: ref }
    );
  }

  /**
   * Load a stored manifest, raising the incomplete-history error when absent or malformed
   */
  async loadManifest(entry: HistoryEntry, which: 'before' | 'after', operation: string): Promise<Manifest> {
    const filePath = which === 'before' ? entry.beforeManifestPath : entry.afterManifestPath;
    const read = await this.storage.readRecord(filePath, manifestFileSchema);
    if (!read.ok) {
      throw new HistoryNotFoundError(`History entry ${entry.runId} is incomplete: ${read.message}`, {
        operation,
        runId: entry.runId,
        missing: filePath,
      });
    }
    return deserializeManifest(read.value);
  }

  async loadChangeSet(entry: HistoryEntry, operation: string): Promise<ChangeSet> {
    const read = await this.storage.readRecord(entry.changesPath, changeSetFileSchema);
    if (!read.ok) {
      throw new HistoryNotFoundError(`History entry ${entry.runId} is incomplete: ${read.message}`, {
        operation,
        runId: entry.runId,
        missing: entry.changesPath,
      });
    }
    return {
      runId: read.value.run_id,
      added: read.value.added,
      deleted: read.value.deleted,
      modified: read.value.modified,
    };
  }
}

function toHistoryMeta(record: MetaFile): HistoryMeta {
  return {
    runId: record.run_id,
    repo: record.repo,
    createdAt: record.created_at,
    command: record.command,
    backedUpFiles: record.backed_up_files,
    skippedFiles: record.skipped_files,
    scanFailures: record.scan_failures.map((failure) => ({ relPath: failure.rel_path, reason: failure.reason })),
    excluded: record.excluded ?? [...DEFAULT_MANIFEST_EXCLUDES],
  };
}

// ============================================================================
// Convenience API
// ============================================================================

export async function createEntry(
  repo: string,
  command: string,
  options: CreateEntryOptions = {}
): Promise<HistoryEntry> {
  return new HistoryManager(repo).create(command, options);
}

export async function finalizeEntry(entry: HistoryEntry): Promise<ChangeSet> {
  return new HistoryManager(entry.repo).finalize(entry);
}

export async function listEntries(repo: string): Promise<HistoryMeta[]> {
  return new HistoryManager(repo).list();
}

export async function resolveRunId(repo: string, ref: string): Promise<string> {
  return new HistoryManager(repo).resolveRunId(ref);
}

export async function planBackup(repo: string, options: CreateEntryOptions = {}): Promise<BackupPlan> {
  return new HistoryManager(repo).plan(options);
}
