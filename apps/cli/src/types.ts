/**
 * CLI option and result types
 */

/** Global options shared by every command */
export interface CliOptions {
  /** Repository root (default: cwd) */
  repo?: string;
  /** Path to configuration file */
  config?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** `false` when --no-color was passed */
  color?: boolean;
}

export type HistoryOptions = CliOptions;

export interface UndoOptions extends CliOptions {
  force?: boolean;
  dryRun?: boolean;
}

export interface SandboxOptions extends CliOptions {
  runsRoot?: string;
  maxSteps?: number;
  disableSaving?: boolean;
}

export interface MutateOptions extends CliOptions {
  plan?: boolean;
  apply?: boolean;
  /** Confirms --apply */
  yes?: boolean;
  timeout?: number;
}
