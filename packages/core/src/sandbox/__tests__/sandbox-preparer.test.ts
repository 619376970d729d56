/**
 * Tests for the isolation sandbox preparer
 */

import * as fs from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';

import { SandboxPreparer, prepareSandbox } from '../sandbox-preparer.js';
import { readGuardTemplate } from '../runtime-guard.js';
import { SandboxError } from '../../utils/errors.js';
import { cleanupTempDirs, exists, makeRepo, makeTempDir, readText } from '../../__tests__/fixtures.js';

const fixedNow = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

describe('SandboxPreparer', () => {
  afterEach(async () => {
    await cleanupTempDirs();
  });

  it('copies the repository without caches and environments at any depth', async () => {
    const repo = await makeRepo({
      'train.py': 'print("train")\n',
      'pkg/model.py': 'class M: pass\n',
      'pkg/__pycache__/model.cpython-311.pyc': 'bytecode',
      '.git/HEAD': 'ref\n',
      '.venv/bin/python': '',
      'sub/node_modules/dep/index.js': 'x',
      'sub/.pytest_cache/v': 'x',
      'build/out.txt': 'x',
    });

    const run = await new SandboxPreparer().prepare({ repo, script: 'train.py', now: fixedNow });

    expect(run.originalRepo).toBe(path.resolve(repo));
    expect(run.runDir).toBe(path.join(repo, '.retrace', 'runs', '20240102-030405'));
    expect(run.isolatedRepo).toBe(path.join(run.runDir, 'repo'));
    expect(run.isolatedScript).toBe(path.join(run.isolatedRepo, 'train.py'));
    expect(await readText(run.isolatedRepo, 'pkg/model.py')).toBe('class M: pass\n');
    expect(exists(run.isolatedRepo, 'pkg/__pycache__')).toBe(false);
    expect(exists(run.isolatedRepo, '.git')).toBe(false);
    expect(exists(run.isolatedRepo, '.venv')).toBe(false);
    expect(exists(run.isolatedRepo, 'sub/node_modules')).toBe(false);
    expect(exists(run.isolatedRepo, 'sub/.pytest_cache')).toBe(false);
    expect(exists(run.isolatedRepo, 'build')).toBe(false);
    expect(exists(run.isolatedRepo, '.retrace')).toBe(false);
  });

  it('writes the runtime guard module at the root of the copy', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n' });

    const run = await prepareSandbox(repo, 'train.py');

    expect(run.guardModulePath).toBe(path.join(run.isolatedRepo, 'retrace-guard.mjs'));
    expect(await fs.promises.readFile(run.guardModulePath, 'utf-8')).toBe(await readGuardTemplate());
  });

  it('suffixes the run directory when the timestamp is taken', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n' });
    const preparer = new SandboxPreparer();

    const first = await preparer.prepare({ repo, script: 'train.py', now: fixedNow });
    const second = await preparer.prepare({ repo, script: 'train.py', now: fixedNow });

    expect(path.basename(first.runDir)).toBe('20240102-030405');
    expect(path.basename(second.runDir)).toBe('20240102-030405-1');
  });

  it('leaves the original repository untouched apart from the runs root', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n' });
    const runsRoot = await makeTempDir();

    const run = await prepareSandbox(repo, path.join(repo, 'train.py'), runsRoot);
    await fs.promises.writeFile(run.isolatedScript, 'edited in the copy\n', 'utf-8');

    expect(path.dirname(run.runDir)).toBe(runsRoot);
    expect(await readText(repo, 'train.py')).toBe('x\n');
    expect(await fs.promises.readdir(repo)).toEqual(['train.py']);
  });

  it('does not copy a sandbox into itself when the runs root is the repository', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n' });

    const run = await new SandboxPreparer().prepare({ repo, script: 'train.py', runsRoot: repo, now: fixedNow });

    expect(run.runDir).toBe(path.join(repo, '20240102-030405'));
    expect((await fs.promises.readdir(run.isolatedRepo)).sort()).toEqual(['retrace-guard.mjs', 'train.py']);
    expect((await fs.promises.readdir(repo)).sort()).toEqual(['20240102-030405', 'train.py']);
  });

  it('skips only the run being filled inside a nested runs root', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n', 'experiments/notes.md': 'lr sweep\n' });
    const runsRoot = path.join(repo, 'experiments');
    const preparer = new SandboxPreparer();

    await preparer.prepare({ repo, script: 'train.py', runsRoot, now: fixedNow });
    const second = await preparer.prepare({ repo, script: 'train.py', runsRoot, now: fixedNow });

    expect(second.runDir).toBe(path.join(runsRoot, '20240102-030405-1'));
    expect(await readText(second.isolatedRepo, 'experiments/notes.md')).toBe('lr sweep\n');
    expect(exists(second.isolatedRepo, 'experiments/20240102-030405/repo/train.py')).toBe(true);
    expect(exists(second.isolatedRepo, 'experiments/20240102-030405-1')).toBe(false);
  });

  it('rejects scripts outside the repository', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n' });
    const other = await makeRepo({ 'evil.py': 'x\n' });

    const attempt = prepareSandbox(repo, path.join(other, 'evil.py'));

    await expect(attempt).rejects.toBeInstanceOf(SandboxError);
    await expect(attempt).rejects.toMatchObject({ code: 'SANDBOX_FAILED' });
    expect(exists(repo, '.retrace')).toBe(false);
  });

  it('reports a missing script', async () => {
    const repo = await makeRepo({ 'train.py': 'x\n' });

    await expect(prepareSandbox(repo, 'missing.py')).rejects.toMatchObject({ code: 'SCRIPT_NOT_FOUND' });
  });

  it('reports a script that lives in an excluded directory', async () => {
    const repo = await makeRepo({ 'build/train.py': 'x\n' });

    await expect(prepareSandbox(repo, 'build/train.py')).rejects.toMatchObject({
      code: 'SCRIPT_NOT_FOUND',
    });
  });

  it('rejects a repository that does not exist', async () => {
    const parent = await makeTempDir();
    const repo = path.join(parent, 'nope');

    await expect(prepareSandbox(repo, 'train.py')).rejects.toMatchObject({ code: 'SANDBOX_FAILED' });
  });
});
