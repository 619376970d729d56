/**
 * Custom Error Classes
 *
 * Structured errors with codes, component context and recovery hints.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'HISTORY_NOT_FOUND'
  | 'DIVERGENCE_BLOCKED'
  | 'SANDBOX_FAILED'
  | 'SCRIPT_NOT_FOUND'
  | 'CONFIRMATION_REQUIRED'
  | 'MUTATOR_FAILED'
  | 'IO_ERROR'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

/**
 * Base error class for all retrace errors
 */
export class RetraceError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;
  public readonly cause?: Error;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message);
    this.name = 'RetraceError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetraceError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * History entry is missing or one of its records is unreadable
 */
export class HistoryNotFoundError extends RetraceError {
  public readonly runId: string;

  constructor(
    message: string,
    options: {
      operation: string;
      runId: string;
      missing?: string;
      cause?: Error;
    }
  ) {
    super(message, {
      code: 'HISTORY_NOT_FOUND',
      component: 'History',
      operation: options.operation,
      details: { runId: options.runId, missing: options.missing },
      recoveryHint: 'Run `retrace history` to list the entries that can be undone',
      retryable: false,
    }, options.cause);
    this.name = 'HistoryNotFoundError';
    this.runId = options.runId;
  }
}

/**
 * Files touched by a run were edited again after the run finished
 */
export class DivergenceError extends RetraceError {
  public readonly runId: string;
  public readonly paths: string[];

  constructor(runId: string, paths: string[]) {
    super(
      `${paths.length} file(s) changed since run ${runId} finished: ${paths.join(', ')}`,
      {
        code: 'DIVERGENCE_BLOCKED',
        component: 'Undo',
        operation: 'undo',
        details: { runId, paths },
        recoveryHint: 'Review the listed files, then re-run with --force to overwrite them',
        retryable: false,
      }
    );
    this.name = 'DivergenceError';
    this.runId = runId;
    this.paths = paths;
  }
}

/**
 * Isolated run could not be prepared
 */
export class SandboxError extends RetraceError {
  public readonly repo: string;

  constructor(
    message: string,
    options: {
      operation: string;
      repo: string;
      code?: 'SANDBOX_FAILED' | 'SCRIPT_NOT_FOUND';
      details?: Record<string, unknown>;
      recoveryHint?: string;
      cause?: Error;
    }
  ) {
    super(message, {
      code: options.code ?? 'SANDBOX_FAILED',
      component: 'Sandbox',
      operation: options.operation,
      details: { repo: options.repo, ...options.details },
      recoveryHint: options.recoveryHint,
      retryable: false,
    }, options.cause);
    this.name = 'SandboxError';
    this.repo = options.repo;
  }
}

/**
 * Apply mode was requested without an explicit confirmation
 */
export class ConfirmationRequiredError extends RetraceError {
  constructor(operation: string) {
    super('Applying changes requires explicit confirmation', {
      code: 'CONFIRMATION_REQUIRED',
      component: 'Mutation',
      operation,
      recoveryHint: 'Pass --yes to confirm, or use --plan to preview without changing files',
      retryable: false,
    });
    this.name = 'ConfirmationRequiredError';
  }
}

/**
 * External mutator could not be started
 */
export class MutatorError extends RetraceError {
  public readonly command: string;

  constructor(message: string, options: { command: string; cause?: Error }) {
    super(message, {
      code: 'MUTATOR_FAILED',
      component: 'Mutation',
      operation: 'runMutator',
      details: { command: options.command },
      recoveryHint: 'Check that the mutator command is installed and on PATH',
      retryable: false,
    }, options.cause);
    this.name = 'MutatorError';
    this.command = options.command;
  }
}

/**
 * Check if an error is a RetraceError
 */
export function isRetraceError(error: unknown): error is RetraceError {
  return error instanceof RetraceError;
}

/**
 * Node system error code (ENOENT, EEXIST, ...) of an unknown thrown value
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Human readable reason for an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
