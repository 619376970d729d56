/**
 * History command - list recorded runs, newest first
 */

import { listEntries } from '@retrace/core';
import { createCommandContext } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/errors.js';
import type { HistoryOptions } from '../types.js';

export async function historyCommand(options: HistoryOptions): Promise<ExitCode> {
  const { repo, logger } = await createCommandContext(options);
  const entries = await listEntries(repo);

  if (logger.jsonMode) {
    logger.json({
      repo,
      entries: entries.map((entry) => ({
        runId: entry.runId,
        createdAt: entry.createdAt,
        command: entry.command,
        backedUp: entry.backedUpFiles.length,
        skipped: entry.skippedFiles.length,
      })),
    });
    return EXIT_CODES.ok;
  }

  if (entries.length === 0) {
    logger.info(`No history in ${repo}`);
    return EXIT_CODES.ok;
  }

  logger.table(
    entries.map((entry) => ({
      RUN: entry.runId,
      CREATED: entry.createdAt,
      'BACKED UP': entry.backedUpFiles.length,
      SKIPPED: entry.skippedFiles.length,
      COMMAND: entry.command,
    }))
  );
  return EXIT_CODES.ok;
}
