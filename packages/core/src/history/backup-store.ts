/**
 * Backup Store
 *
 * Copies the pre-run bytes of eligible files into an entry's `before/`
 * directory. Eligibility: extension on the allow-list, size within the
 * ceiling, and no NUL byte in the leading sniff window.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { Manifest, ManifestEntry } from '../manifest/types.js';
import type { BackupDecision, BackupOutcome, BackupPolicy, SkipReason } from './types.js';
import { BINARY_SNIFF_BYTES, DEFAULT_BACKUP_EXTENSIONS, DEFAULT_MAX_BACKUP_BYTES } from './types.js';
import { errnoCode } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Normalise user-supplied extensions to lower case with a leading dot
 */
export function createBackupPolicy(
  options: { backupExtensions?: Iterable<string>; maxBackupBytes?: number } = {}
): BackupPolicy {
  const extensions = new Set<string>();
  for (const ext of options.backupExtensions ?? DEFAULT_BACKUP_EXTENSIONS) {
    const trimmed = ext.trim().toLowerCase();
    if (trimmed) {
      extensions.add(trimmed.startsWith('.') ? trimmed : `.${trimmed}`);
    }
  }

  return {
    extensions,
    maxBackupBytes: options.maxBackupBytes ?? DEFAULT_MAX_BACKUP_BYTES,
  };
}

/**
 * True when the first bytes of a file contain a NUL
 */
export async function looksBinary(filePath: string): Promise<boolean> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

export class BackupStore {
  private readonly repo: string;
  private readonly backupRoot: string;
  private readonly policy: BackupPolicy;
  private readonly logger: Logger;

  constructor(repo: string, backupRoot: string, policy: BackupPolicy, logger?: Logger) {
    this.repo = path.resolve(repo);
    this.backupRoot = backupRoot;
    this.policy = policy;
    this.logger = logger ?? getLogger('backup');
  }

  /**
   * Extension check only; files outside the allow-list are never reported
   */
  isEligible(relPath: string): boolean {
    return this.policy.extensions.has(path.posix.extname(relPath).toLowerCase());
  }

  backupPathFor(relPath: string): string {
    return path.join(this.backupRoot, ...relPath.split('/'));
  }

  async hasBackup(relPath: string): Promise<boolean> {
    try {
      return (await fs.promises.stat(this.backupPathFor(relPath))).isFile();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Decide what would happen to a file without copying it
   */
  async classify(entry: ManifestEntry): Promise<BackupDecision> {
    if (!this.isEligible(entry.relPath)) {
      return 'ineligible';
    }
    if (entry.size > this.policy.maxBackupBytes) {
      return 'too-large';
    }

    try {
      if (await looksBinary(path.join(this.repo, ...entry.relPath.split('/')))) {
        return 'binary';
      }
    } catch {
      return 'unreadable';
    }
    return 'backup';
  }

  /**
   * Copy every eligible manifest entry into the backup root
   */
  async backup(manifest: Manifest): Promise<BackupOutcome> {
    const backedUp: string[] = [];
    const skipped: Array<{ path: string; reason: SkipReason }> = [];

    for (const relPath of [...manifest.keys()].sort()) {
      const entry = manifest.get(relPath);
      if (!entry) {
        continue;
      }

      const decision = await this.classify(entry);
      if (decision === 'ineligible') {
        continue;
      }
      if (decision !== 'backup') {
        skipped.push({ path: relPath, reason: decision });
        continue;
      }

      const dest = this.backupPathFor(relPath);
      try {
        await fs.promises.mkdir(path.dirname(dest), { recursive: true });
        await fs.promises.copyFile(path.join(this.repo, ...relPath.split('/')), dest);
        backedUp.push(relPath);
      } catch (error) {
        this.logger.debug('Backup copy failed', {
          path: relPath,
          error: error instanceof Error ? error.message : String(error),
        });
        skipped.push({ path: relPath, reason: 'unreadable' });
      }
    }

    this.logger.debug('Backup complete', { backedUp: backedUp.length, skipped: skipped.length });
    return { backedUp, skipped };
  }
}
