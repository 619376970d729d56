/**
 * Isolation Sandbox Preparer
 *
 * Copies a repository into a fresh run directory (minus caches and
 * environments), checks the target script made it across, and writes the
 * runtime guard module into the copy.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { IsolatedRun, PrepareSandboxOptions, SandboxPreparerOptions } from './types.js';
import { SANDBOX_EXCLUDES } from './types.js';
import { GUARD_MODULE_FILENAME, readGuardTemplate } from './runtime-guard.js';
import { STATE_DIR } from '../history/types.js';
import { SandboxError, errnoCode } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

const MAX_RUN_DIR_ATTEMPTS = 100;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function runStamp(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `-${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

export class SandboxPreparer {
  private readonly logger: Logger;
  private readonly excludes: ReadonlySet<string>;

  constructor(options: SandboxPreparerOptions = {}) {
    this.logger = options.logger ?? getLogger('sandbox');
    this.excludes = new Set(options.exclude ?? SANDBOX_EXCLUDES);
  }

  async prepare(options: PrepareSandboxOptions): Promise<IsolatedRun> {
    const repo = path.resolve(options.repo);
    const script = path.resolve(repo, options.script);

    if (!isInside(repo, script) || script === repo) {
      throw new SandboxError(`Script ${script} is not inside ${repo}`, {
        operation: 'prepare',
        repo,
        details: { script },
        recoveryHint: 'Pass a script path that lives inside the repository',
      });
    }

    const stat = await fs.promises.stat(repo).catch((error: unknown) => {
      throw new SandboxError(`Repository ${repo} cannot be read`, {
        operation: 'prepare',
        repo,
        cause: error instanceof Error ? error : undefined,
      });
    });
    if (!stat.isDirectory()) {
      throw new SandboxError(`Repository ${repo} is not a directory`, { operation: 'prepare', repo });
    }

    const runsRoot = path.resolve(options.runsRoot ?? path.join(repo, STATE_DIR, 'runs'));
    const runDir = await this.allocateRunDir(runsRoot, (options.now ?? (() => new Date()))());
    const isolatedRepo = path.join(runDir, 'repo');

    await this.copyTree(repo, isolatedRepo, runDir);

    const relScript = path.relative(repo, script);
    const isolatedScript = path.join(isolatedRepo, relScript);
    if (!fs.existsSync(isolatedScript)) {
      throw new SandboxError(`Script not found in isolated copy: ${isolatedScript}`, {
        operation: 'prepare',
        repo,
        code: 'SCRIPT_NOT_FOUND',
        details: { script: relScript, runDir },
        recoveryHint: 'Check the script path, and that it is not inside an excluded directory',
      });
    }

    const guardModulePath = path.join(isolatedRepo, GUARD_MODULE_FILENAME);
    await fs.promises.writeFile(guardModulePath, await readGuardTemplate(), 'utf-8');

    this.logger.info('Sandbox prepared', { repo, runDir, script: relScript });

    return {
      originalRepo: repo,
      runDir,
      isolatedRepo,
      isolatedScript,
      guardModulePath,
    };
  }

  /**
   * Recursive copy that skips excluded names at any depth and the run
   * directory being filled. Symbolic links are recreated, not followed.
   */
  private async copyTree(source: string, target: string, runDir: string): Promise<void> {
    await fs.promises.mkdir(target, { recursive: true });
    const entries = await fs.promises.readdir(source, { withFileTypes: true });

    for (const entry of entries) {
      if (this.excludes.has(entry.name)) {
        continue;
      }
      const from = path.join(source, entry.name);
      const to = path.join(target, entry.name);

      if (entry.isDirectory()) {
        if (from === runDir) {
          continue;
        }
        await this.copyTree(from, to, runDir);
      } else if (entry.isSymbolicLink()) {
        await fs.promises.symlink(await fs.promises.readlink(from), to);
      } else if (entry.isFile()) {
        await fs.promises.copyFile(from, to, fs.constants.COPYFILE_EXCL);
      }
    }
  }

  /**
   * Timestamped run directory, suffixed `-1`, `-2`, ... on a clash
   */
  private async allocateRunDir(runsRoot: string, now: Date): Promise<string> {
    await fs.promises.mkdir(runsRoot, { recursive: true });
    const stamp = runStamp(now);

    for (let attempt = 0; attempt < MAX_RUN_DIR_ATTEMPTS; attempt++) {
      const runDir = path.join(runsRoot, attempt === 0 ? stamp : `${stamp}-${attempt}`);
      try {
        await fs.promises.mkdir(runDir);
        return runDir;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw error;
        }
      }
    }

    throw new SandboxError('Could not allocate a run directory', {
      operation: 'allocateRunDir',
      repo: runsRoot,
    });
  }
}

/**
 * Prepare an isolated copy of `repo` for running `script`
 */
export async function prepareSandbox(
  repo: string,
  script: string,
  runsRoot?: string
): Promise<IsolatedRun> {
  return new SandboxPreparer().prepare({ repo, script, runsRoot });
}
