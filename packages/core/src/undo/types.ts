/**
 * Undo Engine Types
 */

import type { Logger } from '../utils/logger.js';

export type UndoStatus = 'restored' | 'restored-with-gaps';

export interface UndoOptions {
  /** Overwrite files edited after the run finished */
  force?: boolean;
  /** Report what would happen without touching the repository */
  dryRun?: boolean;
}

export interface UndoEngineOptions {
  logger?: Logger;
}

export interface UndoResult {
  runId: string;
  status: UndoStatus;
  /** Files written back from their backup */
  restored: string[];
  /** Files created by the run and deleted again */
  removed: string[];
  /** Modified or deleted files with no backup; left as they are */
  skippedNoBackup: string[];
  /** Diverged files that were overwritten because of `force` */
  overridden: string[];
  dryRun: boolean;
}
