/**
 * Temporary repository fixtures shared by the core tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

const created: string[] = [];

export type FileTree = Record<string, string | Buffer>;

/**
 * Create a temp directory populated with `files` (POSIX relative paths)
 */
export async function makeRepo(files: FileTree = {}, prefix = 'retrace-repo-'): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
  created.push(dir);
  await writeFiles(dir, files);
  return dir;
}

export async function makeTempDir(prefix = 'retrace-tmp-'): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
  created.push(dir);
  return dir;
}

export async function writeFiles(root: string, files: FileTree): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(root, ...relPath.split('/'));
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, content);
  }
}

export async function readText(root: string, relPath: string): Promise<string> {
  return fs.promises.readFile(path.join(root, ...relPath.split('/')), 'utf-8');
}

export function exists(root: string, relPath: string): boolean {
  return fs.existsSync(path.join(root, ...relPath.split('/')));
}

export async function removeFile(root: string, relPath: string): Promise<void> {
  await fs.promises.unlink(path.join(root, ...relPath.split('/')));
}

export async function cleanupTempDirs(): Promise<void> {
  while (created.length > 0) {
    const dir = created.pop();
    if (dir) {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  }
}
