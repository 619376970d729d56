/**
 * Content Manifest Builder
 *
 * Walks a directory tree and records size and SHA-256 for every regular
 * file. Symbolic links and special files are not followed. Unreadable files
 * are reported in `failures` rather than aborting the scan.
 */

import * as fs from 'fs';
import * as path from 'path';

import type {
  BuildManifestOptions,
  ChangeSet,
  Manifest,
  ManifestEntry,
  ManifestScan,
  ScanFailure,
  SerializedManifestEntry,
} from './types.js';
import { DEFAULT_MANIFEST_EXCLUDES } from './types.js';
import { digestFile } from './hash.js';
import { RetraceError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Build
// ============================================================================

/**
 * Build a manifest of every regular file under `root`
 */
export async function buildManifest(
  root: string,
  options: BuildManifestOptions = {}
): Promise<ManifestScan> {
  const logger = getLogger('manifest');
  const absRoot = path.resolve(root);
  const exclude = new Set(options.exclude ?? DEFAULT_MANIFEST_EXCLUDES);
  const entries = new Map<string, ManifestEntry>();
  const failures: ScanFailure[] = [];

  let rootDirents: fs.Dirent[];
  try {
    rootDirents = await fs.promises.readdir(absRoot, { withFileTypes: true });
  } catch (error) {
    throw new RetraceError(`Cannot read directory ${absRoot}`, {
      code: 'IO_ERROR',
      component: 'Manifest',
      operation: 'buildManifest',
      details: { root: absRoot },
    }, error instanceof Error ? error : undefined);
  }

  const walk = async (dirents: fs.Dirent[], relDir: string): Promise<void> => {
    const sorted = [...dirents].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const dirent of sorted) {
      if (relDir === '' && exclude.has(dirent.name)) {
        continue;
      }

      const relPath = relDir === '' ? dirent.name : `${relDir}/${dirent.name}`;
      const absPath = path.join(absRoot, ...relPath.split('/'));

      if (dirent.isDirectory()) {
        let children: fs.Dirent[];
        try {
          children = await fs.promises.readdir(absPath, { withFileTypes: true });
        } catch (error) {
          failures.push({ relPath, reason: describeError(error) });
          continue;
        }
        await walk(children, relPath);
        continue;
      }

      if (!dirent.isFile()) {
        continue;
      }

      try {
        const digest = await digestFile(absPath);
        entries.set(relPath, { relPath, size: digest.size, hash: digest.hash });
      } catch (error) {
        failures.push({ relPath, reason: describeError(error) });
      }
    }
  };

  await walk(rootDirents, '');

  if (failures.length > 0) {
    logger.warn('Some files could not be read and were left out of the manifest', {
      root: absRoot,
      count: failures.length,
    });
  }
  logger.debug('Manifest built', { root: absRoot, files: entries.size });

  return { manifest: entries, failures };
}

// ============================================================================
// Diff
// ============================================================================

/**
 * Compare two manifests; every list is sorted
 */
export function computeChangeSet(runId: string, before: Manifest, after: Manifest): ChangeSet {
  const added: string[] = [];
  const deleted: string[] = [];
  const modified: string[] = [];

  for (const [relPath, entry] of after) {
    const previous = before.get(relPath);
    if (!previous) {
      added.push(relPath);
    } else if (previous.hash !== entry.hash) {
      modified.push(relPath);
    }
  }

  for (const relPath of before.keys()) {
    if (!after.has(relPath)) {
      deleted.push(relPath);
    }
  }

  return {
    runId,
    added: added.sort(),
    deleted: deleted.sort(),
    modified: modified.sort(),
  };
}

/**
 * True when both manifests hold the same (path, hash) pairs
 */
export function manifestsEqual(a: Manifest, b: Manifest): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [relPath, entry] of a) {
    if (b.get(relPath)?.hash !== entry.hash) {
      return false;
    }
  }
  return true;
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeManifest(manifest: Manifest): Record<string, SerializedManifestEntry> {
  const out: Record<string, SerializedManifestEntry> = {};
  for (const relPath of [...manifest.keys()].sort()) {
    const entry = manifest.get(relPath);
    if (entry) {
      out[relPath] = { rel_path: entry.relPath, size: entry.size, sha256: entry.hash };
    }
  }
  return out;
}

export function deserializeManifest(records: Record<string, SerializedManifestEntry>): Manifest {
  const manifest = new Map<string, ManifestEntry>();
  for (const [relPath, record] of Object.entries(records)) {
    manifest.set(relPath, { relPath, size: record.size, hash: record.sha256 });
  }
  return manifest;
}
