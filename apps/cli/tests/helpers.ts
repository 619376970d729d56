/**
 * Shared helpers for CLI tests
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';

const created: string[] = [];

export async function makeRepo(files: Record<string, string> = {}): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retrace-cli-'));
  created.push(dir);
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(dir, relPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
  return dir;
}

export async function cleanupRepos(): Promise<void> {
  while (created.length > 0) {
    const dir = created.pop();
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

/**
 * Silence console and collect what was printed, one entry per call
 */
export function captureConsole() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  return {
    log,
    error,
    lines: () => log.mock.calls.map((call) => call.map(String).join(' ')),
    errorLines: () => error.mock.calls.map((call) => call.map(String).join(' ')),
  };
}

export type ConsoleCapture = ReturnType<typeof captureConsole>;
