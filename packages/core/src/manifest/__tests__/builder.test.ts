/**
 * Tests for the content manifest builder and change sets
 */

import * as fs from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';

import {
  buildManifest,
  computeChangeSet,
  deserializeManifest,
  manifestsEqual,
  serializeManifest,
} from '../builder.js';
import { hashContent } from '../hash.js';
import type { Manifest, ManifestEntry } from '../types.js';
import { RetraceError } from '../../utils/errors.js';
import { cleanupTempDirs, makeRepo, makeTempDir, writeFiles } from '../../__tests__/fixtures.js';

function manifestOf(entries: Array<[string, string]>): Manifest {
  const map = new Map<string, ManifestEntry>();
  for (const [relPath, hash] of entries) {
    map.set(relPath, { relPath, size: 1, hash });
  }
  return map;
}

describe('buildManifest', () => {
  afterEach(async () => {
    await cleanupTempDirs();
  });

  it('records size and sha256 for nested files with POSIX paths', async () => {
    const repo = await makeRepo({
      'train.py': 'x = 1\n',
      'pkg/utils/io.py': 'def load():\n    pass\n',
    });

    const { manifest, failures } = await buildManifest(repo);

    expect(failures).toEqual([]);
    expect([...manifest.keys()].sort()).toEqual(['pkg/utils/io.py', 'train.py']);
    expect(manifest.get('train.py')).toEqual({
      relPath: 'train.py',
      size: 6,
      hash: hashContent('x = 1\n'),
    });
    expect(manifest.get('pkg/utils/io.py')?.size).toBe(21);
  });

  it('skips excluded top-level segments only', async () => {
    const repo = await makeRepo({
      'main.py': 'print(1)\n',
      '.git/HEAD': 'ref: refs/heads/main\n',
      '.venv/lib/site.py': '',
      'dist/bundle.js': 'x',
      'node_modules/pkg/index.js': 'x',
      '.retrace/history/run/meta.json': '{}',
      'src/dist/keep.txt': 'nested dist is kept',
    });

    const { manifest } = await buildManifest(repo);

    expect([...manifest.keys()].sort()).toEqual(['main.py', 'src/dist/keep.txt']);
  });

  it('uses a caller-supplied exclusion set instead of the defaults', async () => {
    const repo = await makeRepo({
      'a.txt': 'a',
      'dist/b.txt': 'b',
      'data/c.txt': 'c',
    });

    const { manifest } = await buildManifest(repo, { exclude: ['data'] });

    expect([...manifest.keys()].sort()).toEqual(['a.txt', 'dist/b.txt']);
  });

  it('produces equal manifests for identical trees written in different orders', async () => {
    const first = await makeRepo({ 'b.py': 'b', 'a/x.py': 'x', 'a/y.md': 'y' });
    const second = await makeRepo({ 'a/y.md': 'y', 'b.py': 'b', 'a/x.py': 'x' });

    const one = await buildManifest(first);
    const two = await buildManifest(second);

    expect(manifestsEqual(one.manifest, two.manifest)).toBe(true);
    expect(serializeManifest(one.manifest)).toEqual(serializeManifest(two.manifest));
  });

  it('is repeatable on an unchanged tree', async () => {
    const repo = await makeRepo({ 'a.py': 'a', 'b/c.txt': 'c' });

    const one = await buildManifest(repo);
    const two = await buildManifest(repo);

    expect(manifestsEqual(one.manifest, two.manifest)).toBe(true);
  });

  it('does not follow symbolic links', async () => {
    const repo = await makeRepo({ 'real.py': 'r' });
    const outside = await makeTempDir();
    await writeFiles(outside, { 'secret.txt': 'outside' });
    await fs.promises.symlink(path.join(repo, 'real.py'), path.join(repo, 'alias.py'));
    await fs.promises.symlink(outside, path.join(repo, 'linked-dir'));

    const { manifest } = await buildManifest(repo);

    expect([...manifest.keys()]).toEqual(['real.py']);
  });

  it('hashes empty files', async () => {
    const repo = await makeRepo({ 'empty.txt': '' });

    const { manifest } = await buildManifest(repo);

    expect(manifest.get('empty.txt')).toEqual({
      relPath: 'empty.txt',
      size: 0,
      hash: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    });
  });

  it('throws when the root cannot be read', async () => {
    const repo = await makeRepo();

    await expect(buildManifest(path.join(repo, 'missing'))).rejects.toBeInstanceOf(RetraceError);
  });
});

describe('computeChangeSet', () => {
  it('classifies added, deleted and modified paths in sorted order', () => {
    const before = manifestOf([
      ['z.py', 'h1'],
      ['keep.py', 'h2'],
      ['gone.md', 'h3'],
      ['a.py', 'h4'],
    ]);
    const after = manifestOf([
      ['z.py', 'h1-changed'],
      ['keep.py', 'h2'],
      ['new/b.py', 'h5'],
      ['a.py', 'h4-changed'],
      ['added.txt', 'h6'],
    ]);

    expect(computeChangeSet('run-1', before, after)).toEqual({
      runId: 'run-1',
      added: ['added.txt', 'new/b.py'],
      deleted: ['gone.md'],
      modified: ['a.py', 'z.py'],
    });
  });

  it('returns empty lists for identical manifests', () => {
    const manifest = manifestOf([['a.py', 'h']]);

    expect(computeChangeSet('run-2', manifest, manifest)).toEqual({
      runId: 'run-2',
      added: [],
      deleted: [],
      modified: [],
    });
  });
});

describe('manifest serialization', () => {
  it('uses rel_path, size and sha256 keys and reads them back', () => {
    const manifest = manifestOf([['b.py', 'hb'], ['a.py', 'ha']]);

    const serialized = serializeManifest(manifest);

    expect(Object.keys(serialized)).toEqual(['a.py', 'b.py']);
    expect(serialized['a.py']).toEqual({ rel_path: 'a.py', size: 1, sha256: 'ha' });
    expect(manifestsEqual(deserializeManifest(serialized), manifest)).toBe(true);
  });
});
