export * from './types.js';
export * from './schemas.js';
export { generateRunId, isRunId, RUN_ID_PATTERN } from './run-id.js';
export { HistoryStorage, stableStringify } from './storage.js';
export type { RecordRead } from './storage.js';
export { BackupStore, createBackupPolicy, looksBinary } from './backup-store.js';
export {
  HistoryManager,
  createEntry,
  finalizeEntry,
  listEntries,
  resolveRunId,
  planBackup,
} from './history-manager.js';
