/**
 * Undo command - revert a recorded run
 *
 * Refuses (exit 2) when a touched file changed after the run, unless --force.
 */

import { UndoEngine } from '@retrace/core';
import { createCommandContext } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/errors.js';
import type { UndoOptions } from '../types.js';

export async function undoCommand(runRef: string | undefined, options: UndoOptions): Promise<ExitCode> {
  const { repo, logger } = await createCommandContext(options);
  const engine = new UndoEngine(repo);

  const result = await engine.undo(runRef ?? 'latest', {
    force: options.force,
    dryRun: options.dryRun,
  });

  if (logger.jsonMode) {
    logger.json(result);
    return EXIT_CODES.ok;
  }

  if (result.overridden.length > 0) {
    logger.warn(`Overwriting ${result.overridden.length} file(s) changed since the run (--force)`);
    result.overridden.forEach((p) => logger.dim(`  ${p}`));
  }

  const prefix = result.dryRun ? 'Would revert' : 'Reverted';
  logger.success(`${prefix} snapshot: ${result.runId}`);
  logger.log(
    `Restored: ${result.restored.length} | Removed: ${result.removed.length} | ` +
      `Skipped (no backup): ${result.skippedNoBackup.length}`
  );

  if (result.skippedNoBackup.length > 0) {
    logger.warn('These files were changed by the run but had no backup and were left as they are:');
    result.skippedNoBackup.forEach((p) => logger.dim(`  ${p}`));
  }

  return EXIT_CODES.ok;
}
