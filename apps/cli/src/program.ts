/**
 * Command-line program definition
 */

import { Command, InvalidArgumentError } from 'commander';
import { historyCommand, mutateCommand, sandboxCommand, undoCommand } from './commands/index.js';
import { CLI_VERSION } from './lib/version.js';
import type { ExitCode } from './lib/errors.js';
import type { CliOptions, MutateOptions, SandboxOptions, UndoOptions } from './types.js';

/**
 * Parse positive integer with validation
 */
function parsePositiveInteger(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }
  const parsed = parseInt(value, 10);
  if (parsed <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }
  return parsed;
}

/**
 * Validate file path argument
 */
function validatePath(value: string): string {
  if (!value || value.trim() === '') {
    throw new InvalidArgumentError('Path cannot be empty');
  }
  return value.trim();
}

function record(code: ExitCode): void {
  process.exitCode = code;
}

export interface ProgramOutput {
  writeOut: (str: string) => void;
  writeErr: (str: string) => void;
}

/**
 * Build the program; commander errors (usage, --help, --version) are thrown
 * as CommanderError instead of exiting
 */
export function createProgram(
  output: ProgramOutput = {
    writeOut: (str) => process.stdout.write(str),
    writeErr: (str) => process.stderr.write(str),
  }
): Command {
  const program = new Command();

  program
    .name('retrace')
    .description('Snapshot a repository before automated edits and undo them safely')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .option('-r, --repo <path>', 'Repository root (default: current directory)', validatePath)
    .option('--verbose', 'Enable verbose output')
    .option('--quiet', 'Suppress non-essential output')
    .option('--json', 'Output in JSON format')
    .option('-c, --config <path>', 'Path to configuration file', validatePath)
    .option('--no-color', 'Disable colored output')
    .configureOutput(output)
    .exitOverride();

  program
    .command('history')
    .description('List recorded runs, newest first')
    .action(async (_options: Record<string, never>, command: Command) => {
      record(await historyCommand(command.optsWithGlobals<CliOptions>()));
    });

  program
    .command('undo [run-id]')
    .description('Revert a recorded run (default: latest)')
    .option('-f, --force', 'Overwrite files that changed after the run')
    .option('--dry-run', 'Show what would be restored and removed')
    .action(async (runId: string | undefined, _options: UndoOptions, command: Command) => {
      record(await undoCommand(runId, command.optsWithGlobals<UndoOptions>()));
    });

  program
    .command('sandbox <script>')
    .description('Copy the repository into an isolated run directory with the runtime guard')
    .option('--runs-root <dir>', 'Where run directories are created', validatePath)
    .option('--max-steps <n>', 'Guarded steps before the script exits', (v) => parsePositiveInteger(v, 'max-steps'))
    .option('--disable-saving', 'Turn guarded save calls into no-ops')
    .action(async (script: string, _options: SandboxOptions, command: Command) => {
      record(await sandboxCommand(script, command.optsWithGlobals<SandboxOptions>()));
    });

  program
    .command('mutate <command...>')
    .description('Run a command under a history entry (pass it after --)')
    .option('--plan', 'Preview backup coverage without running anything (default)')
    .option('--apply', 'Run the command and record its changes')
    .option('-y, --yes', 'Confirm --apply')
    .option('--timeout <ms>', 'Kill the command after this many milliseconds', (v) =>
      parsePositiveInteger(v, 'timeout')
    )
    .action(async (argv: string[], _options: MutateOptions, command: Command) => {
      record(await mutateCommand(argv, command.optsWithGlobals<MutateOptions>()));
    });

  return program;
}
