/**
 * CLI error type with actionable suggestions
 *
 * Core errors (RetraceError) are mapped onto CLI codes so every failure that
 * reaches the top level prints a code, a message and what to try next.
 */

import { isRetraceError, errnoCode, type RetraceError } from '@retrace/core';

/** All possible error codes for categorization */
export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_PARSE_ERROR'
  | 'HISTORY_NOT_FOUND'
  | 'DIVERGENCE_BLOCKED'
  | 'CONFIRMATION_REQUIRED'
  | 'SANDBOX_FAILED'
  | 'SCRIPT_NOT_FOUND'
  | 'MUTATOR_FAILED'
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'FILE_WRITE_ERROR'
  | 'INVALID_INPUT'
  | 'INTERRUPTED'
  | 'UNKNOWN_ERROR';

/** Error severity levels */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/** Context information for debugging */
export interface ErrorContext {
  file?: string;
  operation?: string;
  runId?: string;
  paths?: string[];
}

/** Process exit codes */
export const EXIT_CODES = {
  ok: 0,
  error: 1,
  refused: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Codes where nothing was changed because the tool declined to act
 */
const REFUSAL_CODES: ReadonlySet<ErrorCode> = new Set([
  'HISTORY_NOT_FOUND',
  'DIVERGENCE_BLOCKED',
  'CONFIRMATION_REQUIRED',
]);

/**
 * Custom error class with actionable suggestions and rich context
 */
export class CliError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly cause?: Error;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      suggestions?: string[];
      cause?: Error;
      severity?: ErrorSeverity;
      context?: ErrorContext;
    }
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.suggestions = options?.suggestions ?? [];
    this.cause = options?.cause;
    this.severity = options?.severity ?? (code === 'INTERRUPTED' ? 'fatal' : 'error');
    this.context = options?.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError);
    }
  }

  /**
   * Create error with common suggestions based on error code
   */
  static fromCode(
    code: ErrorCode,
    message?: string,
    options?: { cause?: Error; context?: ErrorContext; suggestions?: string[] }
  ): CliError {
    const defaults = getErrorDefaults(code);
    return new CliError(message ?? defaults.message, code, {
      suggestions: options?.suggestions ?? defaults.suggestions,
      cause: options?.cause,
      context: options?.context,
    });
  }

  /**
   * Create a new error with additional context
   */
  withContext(context: Partial<ErrorContext>): CliError {
    return new CliError(this.message, this.code, {
      suggestions: this.suggestions,
      cause: this.cause,
      severity: this.severity,
      context: { ...this.context, ...context },
    });
  }

  get exitCode(): ExitCode {
    return REFUSAL_CODES.has(this.code) ? EXIT_CODES.refused : EXIT_CODES.error;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      suggestions: this.suggestions,
      context: this.context,
      cause: this.cause?.message,
    };
  }

  /**
   * Format error for display
   */
  format(options?: { verbose?: boolean }): string {
    const lines: string[] = [`[${this.code}] ${this.message}`];

    if (this.context.operation) {
      lines.push(`  Operation: ${this.context.operation}`);
    }

    if (this.context.paths && this.context.paths.length > 0) {
      lines.push('  Paths:');
      this.context.paths.forEach((p) => lines.push(`    ${p}`));
    }

    if (this.suggestions.length > 0) {
      lines.push('  Suggestions:');
      this.suggestions.forEach((s) => lines.push(`    → ${s}`));
    }

    if (options?.verbose && this.cause) {
      lines.push(`  Caused by: ${this.cause.message}`);
    }

    return lines.join('\n');
  }
}

interface ErrorDefaults {
  message: string;
  suggestions: string[];
}

function getErrorDefaults(code: ErrorCode): ErrorDefaults {
  const defaults: Record<ErrorCode, ErrorDefaults> = {
    CONFIG_INVALID: {
      message: 'Configuration file is invalid',
      suggestions: ['Check retrace.config.json against the documented fields', 'Specify a config path with --config <path>'],
    },
    CONFIG_PARSE_ERROR: {
      message: 'Failed to parse configuration file',
      suggestions: ['Check for JSON/YAML syntax errors', 'Ensure the file exports a configuration object'],
    },
    HISTORY_NOT_FOUND: {
      message: 'No history found',
      suggestions: ['Run `retrace history` to list recorded runs', 'Record a run with `retrace mutate --apply --yes -- <command>`'],
    },
    DIVERGENCE_BLOCKED: {
      message: 'Files changed since the run finished',
      suggestions: ['Commit or stash your own edits first', 'Re-run with --force to overwrite them'],
    },
    CONFIRMATION_REQUIRED: {
      message: 'Applying changes requires confirmation',
      suggestions: ['Preview with --plan', 'Re-run with --apply --yes'],
    },
    SANDBOX_FAILED: {
      message: 'Failed to prepare the sandbox',
      suggestions: ['Check that the repository path exists and is readable', 'Pass a script that lives inside the repository'],
    },
    SCRIPT_NOT_FOUND: {
      message: 'Script not found in the isolated copy',
      suggestions: ['Check the script path', 'Scripts inside build/, dist/ or cache directories are not copied'],
    },
    MUTATOR_FAILED: {
      message: 'The mutator command could not be started',
      suggestions: ['Check that the command is installed and on PATH'],
    },
    FILE_NOT_FOUND: {
      message: 'File not found',
      suggestions: ['Check that the path is correct'],
    },
    PERMISSION_DENIED: {
      message: 'Permission denied',
      suggestions: ['Check file and directory permissions'],
    },
    FILE_WRITE_ERROR: {
      message: 'Failed to write file',
      suggestions: ['Check write permissions on the directory', 'Ensure there is sufficient disk space'],
    },
    INVALID_INPUT: {
      message: 'Invalid input provided',
      suggestions: ['Check the command syntax with --help'],
    },
    INTERRUPTED: {
      message: 'Operation was interrupted',
      suggestions: ['Run the command again to retry'],
    },
    UNKNOWN_ERROR: {
      message: 'An unexpected error occurred',
      suggestions: ['Run with --verbose for more details'],
    },
  };

  return defaults[code];
}

/**
 * Type guard to check if an error is a CliError
 */
export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

function fromCoreError(error: RetraceError): CliError {
  const code = coreCodeToCliCode(error);
  const defaults = getErrorDefaults(code);
  const paths = error.details['paths'];
  const runId = error.details['runId'];

  return new CliError(error.message, code, {
    cause: error,
    suggestions: error.recoveryHint ? [error.recoveryHint] : defaults.suggestions,
    context: {
      operation: error.operation,
      runId: typeof runId === 'string' ? runId : undefined,
      paths: Array.isArray(paths) ? paths.filter((p): p is string => typeof p === 'string') : undefined,
    },
  });
}

function coreCodeToCliCode(error: RetraceError): ErrorCode {
  switch (error.code) {
    case 'HISTORY_NOT_FOUND':
    case 'DIVERGENCE_BLOCKED':
    case 'CONFIRMATION_REQUIRED':
    case 'SANDBOX_FAILED':
    case 'SCRIPT_NOT_FOUND':
    case 'MUTATOR_FAILED':
      return error.code;
    case 'VALIDATION_ERROR':
      return 'INVALID_INPUT';
    case 'IO_ERROR':
      return detectErrorCode(error.cause ?? error);
    case 'INTERNAL_ERROR':
      return 'UNKNOWN_ERROR';
  }
}

/**
 * Wrap unknown errors in CliError with automatic code detection
 */
export function wrapError(error: unknown, context?: ErrorContext): CliError {
  if (isCliError(error)) {
    return context ? error.withContext(context) : error;
  }

  if (isRetraceError(error)) {
    const wrapped = fromCoreError(error);
    return context ? wrapped.withContext(context) : wrapped;
  }

  if (error instanceof Error) {
    return new CliError(error.message, detectErrorCode(error), { cause: error, context });
  }

  return new CliError(String(error), 'UNKNOWN_ERROR', { context });
}

/**
 * Detect appropriate error code from native Error
 */
function detectErrorCode(error: Error): ErrorCode {
  switch (errnoCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'FILE_NOT_FOUND';
    case 'EACCES':
    case 'EPERM':
      return 'PERMISSION_DENIED';
    case 'ENOSPC':
    case 'EROFS':
      return 'FILE_WRITE_ERROR';
  }

  if (error.name === 'SyntaxError') {
    return 'CONFIG_PARSE_ERROR';
  }

  return 'UNKNOWN_ERROR';
}
