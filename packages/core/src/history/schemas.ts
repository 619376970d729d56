/**
 * On-disk record schemas for history entries
 */

import { z } from 'zod';

export const manifestRecordSchema = z.object({
  rel_path: z.string().min(1),
  size: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/, 'Expected a SHA-256 hex digest'),
});

export const manifestFileSchema = z.record(z.string(), manifestRecordSchema);

export const changeSetFileSchema = z.object({
  run_id: z.string().min(1),
  added: z.array(z.string()),
  deleted: z.array(z.string()),
  modified: z.array(z.string()),
});

export const skipReasonSchema = z.enum(['too-large', 'binary', 'unreadable']);

export const metaFileSchema = z.object({
  repo: z.string(),
  run_id: z.string().min(1),
  created_at: z.string(),
  command: z.string(),
  backed_up_files: z.array(z.string()),
  skipped_files: z.array(
    z.object({
      path: z.string(),
      reason: skipReasonSchema,
    })
  ),
  scan_failures: z
    .array(
      z.object({
        rel_path: z.string(),
        reason: z.string(),
      })
    )
    .default([]),
  excluded: z.array(z.string()).optional(),
  note: z.string().optional(),
});

export type ManifestFile = z.infer<typeof manifestFileSchema>;
export type ChangeSetFile = z.infer<typeof changeSetFileSchema>;
export type MetaFile = z.infer<typeof metaFileSchema>;
