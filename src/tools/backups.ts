import { removeBackup } from '../retention.js';
import type { BackupRecord } from '../types.js';
import { recordOperatorAction, toolError, type OperatorContext } from './common.js';

function backupSummary(record: BackupRecord) {
  const pulled = record.manifest.pulled;
  return {
    id: record.id,
    ts: record.ts,
    agent_id: record.agent_id,
    stack: record.stack,
    site: record.site,
    backup_dir: record.backup_dir,
    ok: record.manifest.ok,
    artifacts: pulled.length,
    artifacts_failed: pulled.filter((p) => !p.ok).length,
    bytes: pulled.reduce((sum, p) => sum + (p.bytes ?? 0), 0),
    rating: record.rating,
    feedback: record.feedback,
  };
}

export async function handleTriggerBackup(ctx: OperatorContext, args: { agent_id: string; stack?: string; site: string }) {
  const key = { agent_id: args.agent_id, stack: args.stack || 'default', site: args.site };
  const result = await ctx.orchestrator.backupSite(key, { actor: 'operator' });
  if (!result.ok) {
    return {
      ...toolError(result.error, result.detail ?? result.error),
      status: result.status,
      body: result.body,
      agent_result: result.agent_result,
    };
  }
  return {
    success: true as const,
    backup_id: result.backup_id,
    backup_dir: result.backup_dir,
    manifest: result.manifest,
  };
}

export function handleListBackups(ctx: OperatorContext, args: {
  agent_id?: string;
  stack?: string;
  site?: string;
  limit?: number;
  offset?: number;
  include_manifest?: boolean;
}) {
  const records = ctx.store.listBackups({
    agent_id: args.agent_id,
    stack: args.stack,
    site: args.site,
    limit: args.limit,
    offset: args.offset,
  });
  return {
    success: true as const,
    count: records.length,
    backups: records.map((record) => (args.include_manifest
      ? { ...backupSummary(record), manifest: record.manifest }
      : backupSummary(record))),
  };
}

export async function handleDeleteBackup(ctx: OperatorContext, args: { backup_id: number }) {
  const record = ctx.store.getBackup(args.backup_id);
  if (!record) return toolError('not_found', `backup ${args.backup_id} does not exist`);
  const removed = await removeBackup(ctx.store, record);
  recordOperatorAction(ctx, 'backup.delete', String(record.id), true, {
    backup_dir: record.backup_dir,
    dir_removed: removed.dir_removed,
  });
  return { success: true as const, backup_id: record.id, ...removed };
}

export function handleRateBackup(ctx: OperatorContext, args: { backup_id: number; rating: number | null; feedback?: string }) {
  const feedback = args.feedback?.trim() ? args.feedback.trim() : null;
  if (!ctx.store.rateBackup(args.backup_id, args.rating, feedback)) {
    return toolError('not_found', `backup ${args.backup_id} does not exist`);
  }
  recordOperatorAction(ctx, 'backup.rate', String(args.backup_id), true, { rating: args.rating });
  return { success: true as const, backup_id: args.backup_id, rating: args.rating, feedback };
}

export async function handleRunSweep(ctx: OperatorContext, args: { force?: boolean }) {
  const result = await ctx.orchestrator.sweep({ force: args.force === true });
  if (result.maintenance) return toolError('maintenance_mode', 'maintenance mode is on; no backups run');
  return { success: true as const, ...result };
}

export function handleGetAuditLog(ctx: OperatorContext, args: { target?: string; action?: string; limit?: number; offset?: number }) {
  const entries = ctx.store.listAudit(args);
  return { success: true as const, count: entries.length, entries };
}

export const backupTools = {
  trigger_backup: {
    description: 'Run one site backup now. Fails with backup_in_progress if a run for the same site is in flight, or maintenance_mode while maintenance is on.',
  },
  list_backups: {
    description: 'List backup records, newest first, optionally filtered by agent, stack and site.',
  },
  delete_backup: {
    description: 'Delete a backup record and its directory on disk.',
  },
  rate_backup: {
    description: 'Rate a backup 1-5 with optional feedback. Pass rating null to clear it.',
  },
  run_sweep: {
    description: 'Run a fleet sweep now: list every agent\'s sites and back up those due (all of them with force).',
  },
  get_audit_log: {
    description: 'Read the audit trail, newest first.',
  },
};
