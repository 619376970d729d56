/**
 * Runtime Guard
 *
 * Typed access to the guard module written into isolated copies, and the
 * environment variables that activate it.
 */

import * as fs from 'fs';
import { fileURLToPath, pathToFileURL } from 'url';

import { SandboxError } from '../utils/errors.js';

// ============================================================================
// Types
// ============================================================================

export type RuntimeGuardState = 'inactive' | 'active-counting' | 'tripped';

export interface RuntimeGuardOptions {
  env?: Record<string, string | undefined>;
  exit?: (code: number) => void;
  write?: (line: string) => void;
}

export interface RuntimeGuard {
  readonly state: RuntimeGuardState;
  readonly steps: number;
  readonly maxSteps: number;
  readonly savingDisabled: boolean;
  wrapStep<F extends (...args: never[]) => unknown>(fn: F): F;
  wrapSave<F extends (...args: never[]) => unknown>(fn: F, label?: string): F;
}

export interface RuntimeGuardModule {
  createRuntimeGuard(options?: RuntimeGuardOptions): RuntimeGuard;
  isTruthy(value: string | undefined): boolean;
  parseMaxSteps(value: string | undefined): number;
}

export interface GuardSettings {
  maxSteps?: number;
  disableSaving?: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const GUARD_ENV = {
  safeProfile: 'RETRACE_SAFE_PROFILE',
  maxSteps: 'RETRACE_MAX_STEPS',
  disableSaving: 'RETRACE_DISABLE_SAVING',
} as const;

export const GUARD_MODULE_FILENAME = 'retrace-guard.mjs';

export const DEFAULT_MAX_STEPS = 100;

// Source layout first, then the bundled CLI layout
const TEMPLATE_CANDIDATES = ['../../templates/runtime-guard.mjs', './templates/runtime-guard.mjs'];

// ============================================================================
// Environment
// ============================================================================

/**
 * Environment variables that switch the guard on for a child process
 */
export function guardEnvironment(settings: GuardSettings = {}): Record<string, string> {
  const env: Record<string, string> = {
    [GUARD_ENV.safeProfile]: '1',
    [GUARD_ENV.maxSteps]: String(settings.maxSteps ?? DEFAULT_MAX_STEPS),
  };
  if (settings.disableSaving) {
    env[GUARD_ENV.disableSaving] = '1';
  }
  return env;
}

// ============================================================================
// Template
// ============================================================================

/**
 * Absolute path of the guard template shipped with this package
 */
export function guardTemplatePath(): string {
  for (const candidate of TEMPLATE_CANDIDATES) {
    const filePath = fileURLToPath(new URL(candidate, import.meta.url));
    if (fs.existsSync(filePath)) {
      return filePath;
    }
  }

  throw new SandboxError('Runtime guard template is missing from the installation', {
    operation: 'guardTemplatePath',
    repo: '',
    details: { searched: TEMPLATE_CANDIDATES },
  });
}

export async function readGuardTemplate(): Promise<string> {
  return fs.promises.readFile(guardTemplatePath(), 'utf-8');
}

// ============================================================================
// Loader
// ============================================================================

function isRuntimeGuardModule(value: unknown): value is RuntimeGuardModule {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'createRuntimeGuard' in value &&
    typeof value.createRuntimeGuard === 'function' &&
    'isTruthy' in value &&
    typeof value.isTruthy === 'function' &&
    'parseMaxSteps' in value &&
    typeof value.parseMaxSteps === 'function'
  );
}

/**
 * Import a written guard module and check its shape
 */
export async function loadRuntimeGuard(modulePath: string): Promise<RuntimeGuardModule> {
  const loaded: unknown = await import(pathToFileURL(modulePath).href);
  if (!isRuntimeGuardModule(loaded)) {
    throw new SandboxError(`${modulePath} is not a runtime guard module`, {
      operation: 'loadRuntimeGuard',
      repo: '',
      details: { modulePath },
    });
  }
  return loaded;
}
