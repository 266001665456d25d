import fsp from 'fs/promises';
import { DEFAULT_RETENTION_KEEP, MAX_RETENTION_KEEP, SETTING_RETENTION_KEEP } from './config.js';
import type { BackupKey, BackupRecord, ControllerStore } from './types.js';
import { bestEffort } from './utils.js';

export interface RetentionResult {
  kept: number;
  deleted: number;
  dir_errors: number;
  deleted_ids: number[];
}

export function normalizeKeep(value: unknown): number {
  const n = Number(value);
  if (!Number.isFinite(n)) return DEFAULT_RETENTION_KEEP;
  return Math.max(1, Math.min(MAX_RETENTION_KEEP, Math.floor(n)));
}

export function getRetentionKeep(store: ControllerStore): number {
  const stored = store.getSetting(SETTING_RETENTION_KEEP);
  return stored === undefined ? DEFAULT_RETENTION_KEEP : normalizeKeep(stored);
}

/** Missing paths are fine; anything else is reported to the caller. */
async function removeTree(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true });
}

/**
 * Removes one backup: directory first (best-effort), then the row.
 * The row goes even when the directory could not be removed.
 */
export async function removeBackup(store: ControllerStore, record: BackupRecord): Promise<{ dir_removed: boolean; row_removed: boolean }> {
  const dir = await bestEffort('retention', () => removeTree(record.backup_dir));
  const rowRemoved = store.deleteBackup(record.id);
  return { dir_removed: dir.ok, row_removed: rowRemoved };
}

export async function cleanupSite(store: ControllerStore, key: BackupKey, keep: number): Promise<RetentionResult> {
  const depth = normalizeKeep(keep);
  const records = store.listBackupsForKey(key);
  const result: RetentionResult = { kept: Math.min(depth, records.length), deleted: 0, dir_errors: 0, deleted_ids: [] };
  for (const record of records.slice(depth)) {
    const removed = await removeBackup(store, record);
    if (!removed.dir_removed) result.dir_errors += 1;
    if (removed.row_removed) {
      result.deleted += 1;
      result.deleted_ids.push(record.id);
    }
  }
  if (result.deleted > 0) {
    console.log(`[retention] key=${key.agent_id}/${key.stack}/${key.site} keep=${depth} deleted=${result.deleted} dir_errors=${result.dir_errors}`);
  }
  return result;
}

export async function cleanupAll(store: ControllerStore, keep: number): Promise<{ keys: number; deleted: number; dir_errors: number }> {
  const totals = { keys: 0, deleted: 0, dir_errors: 0 };
  for (const key of store.listBackupKeys()) {
    const result = await cleanupSite(store, key, keep);
    totals.keys += 1;
    totals.deleted += result.deleted;
    totals.dir_errors += result.dir_errors;
  }
  return totals;
}
