import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';

import { BackupStore, createBackupPolicy, looksBinary } from '../backup-store.js';
import { buildManifest } from '../../manifest/builder.js';
import { cleanupTempDirs, exists, makeRepo, makeTempDir, readText } from '../../__tests__/fixtures.js';

describe('createBackupPolicy', () => {
  it('normalises extensions to lower case with a leading dot', () => {
    const policy = createBackupPolicy({ backupExtensions: ['PY', '.Md', '  ', 'yaml'] });

    expect([...policy.extensions].sort()).toEqual(['.md', '.py', '.yaml']);
    expect(policy.maxBackupBytes).toBe(5 * 1024 * 1024);
  });

  it('falls back to the default allow-list', () => {
    const policy = createBackupPolicy();

    expect(policy.extensions.has('.py')).toBe(true);
    expect(policy.extensions.has('.json')).toBe(true);
    expect(policy.extensions.has('.png')).toBe(false);
  });
});

describe('BackupStore', () => {
  afterEach(async () => {
    await cleanupTempDirs();
  });

  it('detects a NUL byte only within the sniff window', async () => {
    const repo = await makeRepo({
      'early.txt': Buffer.concat([Buffer.from('abc'), Buffer.from([0])]),
      'late.txt': Buffer.concat([Buffer.alloc(5000, 0x61), Buffer.from([0])]),
    });

    expect(await looksBinary(path.join(repo, 'early.txt'))).toBe(true);
    expect(await looksBinary(path.join(repo, 'late.txt'))).toBe(false);
  });

  it('backs up eligible files and reports the rest by reason', async () => {
    const repo = await makeRepo({
      'src/model.py': 'class Model: ...\n',
      'config.yaml': 'lr: 0.1\n',
      'huge.md': 'm'.repeat(100),
      'archive.bin': 'ignored by extension',
    });
    const backupRoot = await makeTempDir();
    const store = new BackupStore(repo, backupRoot, createBackupPolicy({ maxBackupBytes: 50 }));

    const { manifest } = await buildManifest(repo);
    const outcome = await store.backup(manifest);

    expect(outcome).toEqual({
      backedUp: ['config.yaml', 'src/model.py'],
      skipped: [{ path: 'huge.md', reason: 'too-large' }],
    });
    expect(await readText(backupRoot, 'src/model.py')).toBe('class Model: ...\n');
    expect(exists(backupRoot, 'archive.bin')).toBe(false);
    expect(await store.hasBackup('config.yaml')).toBe(true);
    expect(await store.hasBackup('huge.md')).toBe(false);
  });

  it('reports a file that vanished before it could be read as unreadable', async () => {
    const repo = await makeRepo({ 'a.py': 'a' });
    const store = new BackupStore(repo, await makeTempDir(), createBackupPolicy());

    const decision = await store.classify({ relPath: 'gone.py', size: 1, hash: 'x' });

    expect(decision).toBe('unreadable');
  });
});
