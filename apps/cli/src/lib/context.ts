/**
 * Per-command setup: repository path, logger and configuration
 */

import path from 'node:path';
import type { CreateEntryOptions } from '@retrace/core';
import type { CliOptions } from '../types.js';
import { loadConfig, type RetraceConfig } from './config.js';
import { isQuiet, isVerbose } from './environment.js';
import { bridgeCoreLogging, createLogger, type LogLevel, type Logger } from './logger.js';

export interface CommandContext {
  repo: string;
  config: RetraceConfig;
  configPath: string | null;
  logger: Logger;
}

export function resolveLogLevel(options: CliOptions): LogLevel {
  if (options.verbose || isVerbose()) return 'debug';
  if (options.quiet || isQuiet()) return 'error';
  return 'info';
}

export async function createCommandContext(options: CliOptions): Promise<CommandContext> {
  const logger = createLogger({
    level: resolveLogLevel(options),
    json: options.json,
    colors: options.color,
  });
  bridgeCoreLogging(logger);

  const repo = path.resolve(options.repo ?? process.cwd());
  const { config, filepath } = await loadConfig(repo, options.config);
  logger.debug('Configuration loaded', { repo, file: filepath ?? '(defaults)' });

  return { repo, config, configPath: filepath, logger };
}

/**
 * History settings from config in the shape the core expects
 */
export function entryOptions(config: RetraceConfig): CreateEntryOptions {
  return {
    backupExtensions: config.history.backupExtensions,
    maxBackupBytes: config.history.maxBackupBytes,
    exclude: config.history.exclude,
  };
}
