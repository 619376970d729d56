/**
 * History Storage
 *
 * Path layout and JSON record I/O for `.retrace/history/<runId>/`.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';

import type { HistoryEntry } from './types.js';
import { HISTORY_FILES, STATE_DIR } from './types.js';
import { generateRunId } from './run-id.js';
import { RetraceError, errnoCode } from '../utils/errors.js';

// ============================================================================
// Constants
// ============================================================================

const MAX_ALLOCATION_ATTEMPTS = 16;

// ============================================================================
// Types
// ============================================================================

export type RecordRead<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'missing' | 'malformed'; message: string };

// ============================================================================
// Storage Class
// ============================================================================

export class HistoryStorage {
  private readonly repo: string;
  private readonly historyDir: string;

  constructor(repo: string) {
    this.repo = path.resolve(repo);
    this.historyDir = path.join(this.repo, STATE_DIR, 'history');
  }

  getRepoPath(): string {
    return this.repo;
  }

  getHistoryPath(): string {
    return this.historyDir;
  }

  getEntryPath(runId: string): string {
    return path.join(this.historyDir, runId);
  }

  /**
   * Paths of every record for a run id (the directory may not exist)
   */
  entryFor(runId: string): HistoryEntry {
    const root = this.getEntryPath(runId);
    return {
      runId,
      repo: this.repo,
      root,
      beforeManifestPath: path.join(root, HISTORY_FILES.beforeManifest),
      afterManifestPath: path.join(root, HISTORY_FILES.afterManifest),
      changesPath: path.join(root, HISTORY_FILES.changes),
      backupRoot: path.join(root, HISTORY_FILES.backupDir),
      metaPath: path.join(root, HISTORY_FILES.meta),
    };
  }

  /**
   * Create a fresh entry directory, drawing a new id whenever one is taken
   */
  async allocateEntry(now: Date, nextId: (now: Date) => string = generateRunId): Promise<HistoryEntry> {
    await fs.promises.mkdir(this.historyDir, { recursive: true });

    for (let attempt = 0; attempt < MAX_ALLOCATION_ATTEMPTS; attempt++) {
      const runId = nextId(now);
      try {
        await fs.promises.mkdir(this.getEntryPath(runId));
        return this.entryFor(runId);
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw error;
        }
      }
    }

    throw new RetraceError('Could not allocate a unique history entry', {
      code: 'INTERNAL_ERROR',
      component: 'History',
      operation: 'allocateEntry',
      details: { attempts: MAX_ALLOCATION_ATTEMPTS },
    });
  }

  /**
   * Entry directory names, newest first
   */
  async listRunIds(): Promise<string[]> {
    let dirents: fs.Dirent[];
    try {
      dirents = await fs.promises.readdir(this.historyDir, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return dirents
      .filter((dirent) => dirent.isDirectory())
      .map((dirent) => dirent.name)
      .sort()
      .reverse();
  }

  // ============================================================================
  // Record I/O
  // ============================================================================

  /**
   * Write pretty-printed JSON with sorted keys via a temp file and rename
   */
  async writeRecord(filePath: string, value: unknown): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await fs.promises.writeFile(tempPath, stableStringify(value), 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  }

  /**
   * Read and validate a JSON record
   */
  async readRecord<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<RecordRead<z.output<S>>> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { ok: false, reason: 'missing', message: `${path.basename(filePath)} does not exist` };
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: 'malformed', message: `${path.basename(filePath)}: ${detail}` };
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map((issue: z.ZodIssue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
      return { ok: false, reason: 'malformed', message: `${path.basename(filePath)}: ${issues}` };
    }

    return { ok: true, value: parsed.data };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function sortKeys(_key: string, value: unknown): unknown {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(
      Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
  }
  return value;
}

export function stableStringify(value: unknown): string {
  return `${JSON.stringify(value, sortKeys, 2)}\n`;
}
