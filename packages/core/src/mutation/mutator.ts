/**
 * External mutator process
 */

import { execa } from 'execa';

import type { MutatorRequest, MutatorResult } from './types.js';
import { MutatorError } from '../utils/errors.js';

/**
 * Run the mutator in `cwd`; a non-zero exit is reported, not thrown
 */
export async function runMutator(request: MutatorRequest): Promise<MutatorResult> {
  const started = Date.now();
  const result = await execa(request.command, request.args, {
    cwd: request.cwd,
    timeout: request.timeoutMs,
    signal: request.signal,
    env: request.env,
    reject: false,
    stdin: 'ignore',
  });

  const exitCode: unknown = result.exitCode;
  if (result.failed && !result.timedOut && !result.isCanceled && typeof exitCode !== 'number') {
    throw new MutatorError(`Could not start mutator "${request.command}"`, {
      command: request.command,
      cause: new Error(result.stderr || `spawn failed: ${result.command}`),
    });
  }

  return {
    exitCode: typeof exitCode === 'number' ? exitCode : null,
    timedOut: result.timedOut,
    cancelled: result.isCanceled,
    stdout: result.stdout,
    stderr: result.stderr,
    durationMs: Date.now() - started,
  };
}
