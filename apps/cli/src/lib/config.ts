/**
 * Configuration loading with cosmiconfig + zod validation
 *
 * Config is looked up in the repository root only:
 * `package.json#retrace`, `.retracerc{,.json,.yaml,.yml}` or
 * `retrace.config.{js,mjs,cjs}`. A missing file means defaults.
 *
 * @example
 * ```json
 * {
 *   "history": { "backupExtensions": [".py", ".toml"], "maxBackupBytes": 1048576 },
 *   "sandbox": { "maxSteps": 20, "disableSaving": true }
 * }
 * ```
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import path from 'node:path';
import { DEFAULT_MAX_BACKUP_BYTES, DEFAULT_MAX_STEPS, errnoCode } from '@retrace/core';
import { CliError } from './errors.js';

// ============================================================================
// Schema
// ============================================================================

const CONFIG_SEARCH_PLACES = [
  'package.json',
  '.retracerc',
  '.retracerc.json',
  '.retracerc.yaml',
  '.retracerc.yml',
  'retrace.config.js',
  'retrace.config.mjs',
  'retrace.config.cjs',
] as const;

const positiveInt = z.number().int().positive();

/**
 * Configuration schema
 */
export const configSchema = z
  .object({
    history: z
      .object({
        /** File extensions eligible for backup, e.g. ".py" */
        backupExtensions: z.array(z.string().min(1)).min(1).optional(),
        /** Files larger than this are recorded but not backed up */
        maxBackupBytes: positiveInt.default(DEFAULT_MAX_BACKUP_BYTES),
        /** Top-level names left out of manifests */
        exclude: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .default({}),
    sandbox: z
      .object({
        /** Where run directories are created (relative to the repository) */
        runsRoot: z.string().min(1).optional(),
        maxSteps: positiveInt.default(DEFAULT_MAX_STEPS),
        disableSaving: z.boolean().default(false),
      })
      .strict()
      .default({}),
    mutator: z
      .object({
        timeoutMs: positiveInt.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RetraceConfig = z.infer<typeof configSchema>;

export interface LoadedConfig {
  config: RetraceConfig;
  /** `null` when no config file was found */
  filepath: string | null;
}

// ============================================================================
// Loading
// ============================================================================

function createExplorer(): ReturnType<typeof cosmiconfig> {
  return cosmiconfig('retrace', {
    searchPlaces: [...CONFIG_SEARCH_PLACES],
    searchStrategy: 'none',
  });
}

/**
 * Format zod issues as an indented bullet list
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const issuePath = e.path.join('.');
      return `  • ${issuePath || 'root'}: ${e.message}`;
    })
    .join('\n');
}

/**
 * Validate a raw config object
 */
export function parseConfig(raw: unknown, filepath: string | null): RetraceConfig {
  const parsed = configSchema.safeParse(raw ?? {});

  if (!parsed.success) {
    throw CliError.fromCode(
      'CONFIG_INVALID',
      `Invalid configuration in ${filepath ?? 'defaults'}:\n${formatIssues(parsed.error)}`,
      { context: { file: filepath ?? undefined } }
    );
  }

  return parsed.data;
}

/**
 * Load config from an explicit path (relative to cwd), or search the
 * repository root
 */
export async function loadConfig(repo: string, configPath?: string): Promise<LoadedConfig> {
  const root = path.resolve(repo);
  const explorer = createExplorer();

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(path.resolve(configPath)) : await explorer.search(root);
  } catch (error) {
    if (configPath && errnoCode(error) === 'ENOENT') {
      throw CliError.fromCode('FILE_NOT_FOUND', `Config file not found: ${configPath}`);
    }
    throw CliError.fromCode(
      'CONFIG_PARSE_ERROR',
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  if (!result || result.isEmpty) {
    return { config: parseConfig({}, result?.filepath ?? null), filepath: result?.filepath ?? null };
  }

  return { config: parseConfig(result.config, result.filepath), filepath: result.filepath };
}

/**
 * Command-line runs root (relative to cwd) wins over the configured one
 * (relative to the repository)
 */
export function resolveRunsRoot(repo: string, config: RetraceConfig, override?: string): string | undefined {
  if (override) {
    return path.resolve(override);
  }
  return config.sandbox.runsRoot ? path.resolve(repo, config.sandbox.runsRoot) : undefined;
}
