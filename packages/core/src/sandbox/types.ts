/**
 * Isolation Sandbox Types
 */

import type { Logger } from '../utils/logger.js';

export interface IsolatedRun {
  originalRepo: string;
  /** `<runsRoot>/<timestamp>` */
  runDir: string;
  /** `<runDir>/repo` */
  isolatedRepo: string;
  isolatedScript: string;
  guardModulePath: string;
}

export interface PrepareSandboxOptions {
  repo: string;
  /** Absolute, or relative to `repo`; must lie inside it */
  script: string;
  /** Defaults to `<repo>/.retrace/runs` */
  runsRoot?: string;
  now?: () => Date;
}

export interface SandboxPreparerOptions {
  logger?: Logger;
  /** Directory names skipped at any depth (replaces the defaults) */
  exclude?: Iterable<string>;
}

export const SANDBOX_EXCLUDES: readonly string[] = [
  '.git',
  '.venv',
  'venv',
  '__pycache__',
  'build',
  'dist',
  '.pytest_cache',
  '.ruff_cache',
  'node_modules',
  '.retrace',
];
