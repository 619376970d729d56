/**
 * Guarded Mutation
 *
 * plan: preview backup coverage, write nothing.
 * apply: confirmation check, then create entry → run mutator → finalize.
 * Finalize runs whether the mutator succeeded, failed, timed out or threw.
 */

import * as path from 'path';

import { HistoryManager } from '../history/history-manager.js';
import type { BackupPlan, CreateEntryOptions } from '../history/types.js';
import type { GuardedMutationOptions, GuardedMutationResult, MutationMode } from './types.js';
import { runMutator } from './mutator.js';
import { ConfirmationRequiredError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Refuse `apply` unless the caller confirmed it explicitly
 */
export function assertMutationAllowed(options: { mode: MutationMode; confirmed?: boolean }): void {
  if (options.mode === 'apply' && options.confirmed !== true) {
    throw new ConfirmationRequiredError('apply');
  }
}

/**
 * Read-only preview of what a history entry for `repo` would protect
 */
export async function planMutation(repo: string, options: CreateEntryOptions = {}): Promise<BackupPlan> {
  return new HistoryManager(repo).plan(options);
}

export async function runGuardedMutation(options: GuardedMutationOptions): Promise<GuardedMutationResult> {
  const logger = options.logger ?? getLogger('mutation');
  const repo = path.resolve(options.repo);
  const args = options.args ?? [];
  const history = new HistoryManager(repo, { logger: logger.child('history') });

  if (options.mode === 'plan') {
    return { mode: 'plan', plan: await history.plan(options) };
  }

  assertMutationAllowed(options);

  const commandLine = [options.command, ...args].join(' ');
  const entry = await history.create(commandLine, options);
  logger.info('Running mutator', { runId: entry.runId, command: commandLine });

  const executor = options.executor ?? runMutator;
  const run = await executor({
    command: options.command,
    args,
    cwd: repo,
    timeoutMs: options.timeoutMs,
    signal: options.signal,
    env: options.env,
  }).then(
    (result) => ({ ok: true as const, result }),
    (error: unknown) => ({ ok: false as const, error })
  );

  const changes = await history.finalize(entry);

  if (!run.ok) {
    logger.warn('Mutator failed to run; entry finalized', { runId: entry.runId });
    throw run.error;
  }
  if (run.result.timedOut) {
    logger.warn('Mutator timed out; entry finalized', { runId: entry.runId, timeoutMs: options.timeoutMs });
  }

  return { mode: 'apply', entry, changes, mutator: run.result };
}
