/**
 * Mutate command - run an external command under a history entry
 *
 * --plan (default) previews backup coverage; --apply --yes records the run
 * so it can be undone.
 */

import { runGuardedMutation, type GuardedMutationResult } from '@retrace/core';
import { createCommandContext, entryOptions } from '../lib/context.js';
import { CliError, EXIT_CODES, type ExitCode } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { MutateOptions } from '../types.js';

function printPlan(logger: Logger, result: Extract<GuardedMutationResult, { mode: 'plan' }>): void {
  const { plan } = result;
  logger.info(`Would back up ${plan.wouldBackUp.length} of ${plan.totalFiles} file(s)`);
  for (const skipped of plan.wouldSkip) {
    logger.dim(`  ${skipped.path} (${skipped.reason})`);
  }
  for (const failure of plan.scanFailures) {
    logger.warn(`Cannot read ${failure.relPath}: ${failure.reason}`);
  }
  logger.step('Re-run with --apply --yes to execute');
}

function printApply(logger: Logger, result: Extract<GuardedMutationResult, { mode: 'apply' }>): void {
  const { changes, mutator } = result;

  if (mutator.timedOut) {
    logger.warn('Command timed out; changes so far were recorded');
  } else if (mutator.exitCode !== 0) {
    logger.warn(`Command exited with code ${mutator.exitCode ?? 'unknown'}; changes were recorded`);
  } else {
    logger.success(`Recorded run: ${changes.runId}`);
  }

  logger.log(
    `Added: ${changes.added.length} | Deleted: ${changes.deleted.length} | Modified: ${changes.modified.length}`
  );
  changes.added.forEach((p) => logger.dim(`  + ${p}`));
  changes.deleted.forEach((p) => logger.dim(`  - ${p}`));
  changes.modified.forEach((p) => logger.dim(`  ~ ${p}`));
  logger.step(`Undo with: retrace undo ${changes.runId}`);
}

export async function mutateCommand(command: string[], options: MutateOptions): Promise<ExitCode> {
  if (options.plan && options.apply) {
    throw CliError.fromCode('INVALID_INPUT', 'Choose one of --plan or --apply');
  }
  const [executable, ...args] = command;
  if (!executable) {
    throw CliError.fromCode('INVALID_INPUT', 'Missing command to run after --');
  }

  const { repo, config, logger } = await createCommandContext(options);

  const result = await runGuardedMutation({
    ...entryOptions(config),
    repo,
    command: executable,
    args,
    mode: options.apply ? 'apply' : 'plan',
    confirmed: options.yes === true,
    timeoutMs: options.timeout ?? config.mutator.timeoutMs,
  });

  if (logger.jsonMode) {
    logger.json(result);
  } else if (result.mode === 'plan') {
    printPlan(logger, result);
  } else {
    printApply(logger, result);
  }

  if (result.mode === 'apply' && (result.mutator.timedOut || result.mutator.exitCode !== 0)) {
    return EXIT_CODES.error;
  }
  return EXIT_CODES.ok;
}
