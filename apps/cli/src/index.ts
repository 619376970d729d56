#!/usr/bin/env node
/**
 * retrace CLI - repository snapshots, safe undo and isolated runs
 */

import { CommanderError } from 'commander';
import { createProgram } from './program.js';
import { createLogger, EXIT_CODES, wrapError } from './lib/index.js';

const program = createProgram();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // commander already printed help, the version or the usage error
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.error;
      return;
    }

    const opts = program.opts<{ json?: boolean; verbose?: boolean; color?: boolean }>();
    const logger = createLogger({
      json: opts.json,
      level: opts.verbose ? 'debug' : 'error',
      colors: opts.color,
    });

    const wrapped = wrapError(error);
    logger.logError(wrapped);
    process.exitCode = wrapped.exitCode;
  }
}

void main();

export { createProgram } from './program.js';
export { CliError } from './lib/errors.js';
export type { ErrorCode } from './lib/errors.js';
export type { RetraceConfig } from './lib/config.js';
