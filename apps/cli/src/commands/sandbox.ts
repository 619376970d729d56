/**
 * Sandbox command - prepare an isolated copy with the runtime guard
 */

import { SandboxPreparer, guardEnvironment } from '@retrace/core';
import { createCommandContext } from '../lib/context.js';
import { resolveRunsRoot } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/errors.js';
import type { SandboxOptions } from '../types.js';

export async function sandboxCommand(script: string, options: SandboxOptions): Promise<ExitCode> {
  const { repo, config, logger } = await createCommandContext(options);

  const run = await new SandboxPreparer().prepare({
    repo,
    script,
    runsRoot: resolveRunsRoot(repo, config, options.runsRoot),
  });
  const env = guardEnvironment({
    maxSteps: options.maxSteps ?? config.sandbox.maxSteps,
    disableSaving: options.disableSaving ?? config.sandbox.disableSaving,
  });

  if (logger.jsonMode) {
    logger.json({ ...run, env });
    return EXIT_CODES.ok;
  }

  logger.success(`Sandbox ready: ${run.runDir}`);
  logger.log(`Repository copy: ${run.isolatedRepo}`);
  logger.log(`Script:          ${run.isolatedScript}`);
  logger.log(`Runtime guard:   ${run.guardModulePath}`);
  logger.newline();
  logger.step('Activate the guard with:');
  for (const [key, value] of Object.entries(env)) {
    logger.log(`  export ${key}=${value}`);
  }

  return EXIT_CODES.ok;
}
