/**
 * Mutation Runner Types
 */

import type { ChangeSet } from '../manifest/types.js';
import type { BackupPlan, CreateEntryOptions, HistoryEntry } from '../history/types.js';
import type { Logger } from '../utils/logger.js';

/** `plan` previews only; `apply` edits the repository */
export type MutationMode = 'plan' | 'apply';

export interface MutatorRequest {
  command: string;
  args: string[];
  cwd: string;
  /** Kill the mutator after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

export interface MutatorResult {
  /** `null` when the process was killed before exiting */
  exitCode: number | null;
  timedOut: boolean;
  cancelled: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type MutatorExecutor = (request: MutatorRequest) => Promise<MutatorResult>;

export interface GuardedMutationOptions extends CreateEntryOptions {
  repo: string;
  command: string;
  args?: string[];
  mode: MutationMode;
  /** Required for `apply` */
  confirmed?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
  executor?: MutatorExecutor;
  logger?: Logger;
}

export type GuardedMutationResult =
  | { mode: 'plan'; plan: BackupPlan }
  | { mode: 'apply'; entry: HistoryEntry; changes: ChangeSet; mutator: MutatorResult };
