/**
 * Undo Engine
 *
 * Reverts the change set recorded for a run. Refuses to overwrite files that
 * were edited after the run unless forced. Restores are staged inside the
 * entry directory and moved into place with `rename`.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { ChangeSet, Manifest } from '../manifest/types.js';
import { hashFile } from '../manifest/hash.js';
import { HistoryManager } from '../history/history-manager.js';
import { BackupStore, createBackupPolicy } from '../history/backup-store.js';
import type { HistoryEntry } from '../history/types.js';
import { HISTORY_FILES } from '../history/types.js';
import type { UndoEngineOptions, UndoOptions, UndoResult } from './types.js';
import { DivergenceError, errnoCode } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

interface LoadedRecords {
  entry: HistoryEntry;
  after: Manifest;
  changes: ChangeSet;
}

export class UndoEngine {
  private readonly repo: string;
  private readonly history: HistoryManager;
  private readonly logger: Logger;

  constructor(repo: string, options: UndoEngineOptions = {}) {
    this.repo = path.resolve(repo);
    this.logger = options.logger ?? getLogger('undo');
    this.history = new HistoryManager(this.repo, { logger: this.logger.child('history') });
  }

  /**
   * Undo a run; `runRef` may be an id, a unique id prefix, or `latest`
   */
  async undo(runRef: string, options: UndoOptions = {}): Promise<UndoResult> {
    const runId = await this.history.resolveRunId(runRef);
    const { entry, after, changes } = await this.load(runId);

    const diverged = await this.findDivergence(changes, after);
    if (diverged.length > 0 && !options.force) {
      this.logger.warn('Undo refused: files changed since the run', { runId, diverged });
      throw new DivergenceError(runId, diverged);
    }

    const store = new BackupStore(this.repo, entry.backupRoot, createBackupPolicy());
    const toRestore: string[] = [];
    const skippedNoBackup: string[] = [];
    for (const relPath of restoreCandidates(changes)) {
      if (await store.hasBackup(relPath)) {
        toRestore.push(relPath);
      } else {
        skippedNoBackup.push(relPath);
      }
    }

    if (options.dryRun) {
      const removable: string[] = [];
      for (const relPath of changes.added) {
        if (await this.exists(relPath)) {
          removable.push(relPath);
        }
      }
      return buildResult(runId, toRestore, removable, skippedNoBackup, diverged, true);
    }

    const stagingDir = path.join(entry.root, HISTORY_FILES.undoStaging);
    await fs.promises.rm(stagingDir, { recursive: true, force: true });

    try {
      for (const relPath of toRestore) {
        const staged = path.join(stagingDir, ...relPath.split('/'));
        await fs.promises.mkdir(path.dirname(staged), { recursive: true });
        await fs.promises.copyFile(store.backupPathFor(relPath), staged);
      }

      const removed: string[] = [];
      for (const relPath of changes.added) {
        try {
          await fs.promises.unlink(this.resolve(relPath));
          removed.push(relPath);
        } catch (error) {
          if (errnoCode(error) !== 'ENOENT') {
            throw error;
          }
        }
      }

      for (const relPath of toRestore) {
        const target = this.resolve(relPath);
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.rename(path.join(stagingDir, ...relPath.split('/')), target);
      }

      const result = buildResult(runId, toRestore, removed, skippedNoBackup, diverged, false);
      this.logger.info('Undo complete', {
        runId,
        restored: result.restored.length,
        removed: result.removed.length,
        skippedNoBackup: result.skippedNoBackup.length,
      });
      return result;
    } finally {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
    }
  }

  /**
   * Paths in `modified ∪ deleted` whose live state no longer matches the AFTER manifest
   */
  async findDivergence(changes: ChangeSet, after: Manifest): Promise<string[]> {
    const deleted = new Set(changes.deleted);
    const diverged: string[] = [];

    for (const relPath of restoreCandidates(changes)) {
      if (!(await this.exists(relPath))) {
        continue;
      }
      if (deleted.has(relPath)) {
        diverged.push(relPath);
        continue;
      }

      let current: string;
      try {
        current = await hashFile(this.resolve(relPath));
      } catch (error) {
        this.logger.debug('Could not hash file during divergence check', {
          path: relPath,
          error: error instanceof Error ? error.message : String(error),
        });
        diverged.push(relPath);
        continue;
      }
      if (current !== after.get(relPath)?.hash) {
        diverged.push(relPath);
      }
    }

    return diverged;
  }

  private async load(runId: string): Promise<LoadedRecords> {
    const entry = this.history.getStorage().entryFor(runId);
    await this.history.loadManifest(entry, 'before', 'undo');
    const after = await this.history.loadManifest(entry, 'after', 'undo');
    const changes = await this.history.loadChangeSet(entry, 'undo');
    return { entry, after, changes };
  }

  private resolve(relPath: string): string {
    return path.join(this.repo, ...relPath.split('/'));
  }

  private async exists(relPath: string): Promise<boolean> {
    try {
      await fs.promises.lstat(this.resolve(relPath));
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}

function restoreCandidates(changes: ChangeSet): string[] {
  return [...new Set([...changes.modified, ...changes.deleted])].sort();
}

function buildResult(
  runId: string,
  restored: string[],
  removed: string[],
  skippedNoBackup: string[],
  overridden: string[],
  dryRun: boolean
): UndoResult {
  return {
    runId,
    status: skippedNoBackup.length > 0 ? 'restored-with-gaps' : 'restored',
    restored,
    removed,
    skippedNoBackup,
    overridden,
    dryRun,
  };
}

/**
 * Undo a run in `repo`
 */
export async function undo(repo: string, runRef: string, options: UndoOptions = {}): Promise<UndoResult> {
  return new UndoEngine(repo).undo(runRef, options);
}
