import { SETTING_DEFAULT_SCHEDULE, SETTING_MAINTENANCE, SETTING_RETENTION_KEEP } from '../config.js';
import { isMaintenanceMode } from '../orchestrator.js';
import { cleanupAll, getRetentionKeep, normalizeKeep } from '../retention.js';
import { getDefaultSchedule } from '../schedule.js';
import type { SiteSchedule } from '../types.js';
import { toUnixSeconds } from '../utils.js';
import { recordOperatorAction, toolError, type OperatorContext } from './common.js';

export function handleGetSettings(ctx: OperatorContext) {
  return {
    success: true as const,
    retention_keep: getRetentionKeep(ctx.store),
    default_schedule: getDefaultSchedule(ctx.store),
    backups_root: ctx.backupsRoot,
    maintenance: isMaintenanceMode(ctx.store),
  };
}

/** While on, scheduled and operator-triggered backups are refused with maintenance_mode. */
export function handleSetMaintenance(ctx: OperatorContext, args: { enabled: boolean }) {
  ctx.store.setSetting(SETTING_MAINTENANCE, args.enabled);
  recordOperatorAction(ctx, 'maintenance.set', SETTING_MAINTENANCE, true, { enabled: args.enabled });
  return { success: true as const, maintenance: args.enabled };
}

export function handleSetSiteSchedule(ctx: OperatorContext, args: SiteSchedule & { agent_id: string; stack?: string; site: string }) {
  if (!ctx.store.getAgent(args.agent_id)) {
    return toolError('not_found', `agent ${args.agent_id} is not registered`);
  }
  const key = { agent_id: args.agent_id, stack: args.stack || 'default', site: args.site };
  const stored = ctx.store.setSchedule(key, {
    frequency: args.frequency,
    time: args.time,
    weekday: args.weekday,
    enabled: args.enabled,
  }, toUnixSeconds(ctx.clock()));
  recordOperatorAction(ctx, 'schedule.set', `${key.agent_id}/${key.stack}/${key.site}`, true, {
    frequency: stored.frequency,
    time: stored.time,
    weekday: stored.weekday,
    enabled: stored.enabled,
  });
  return { success: true as const, schedule: stored };
}

export function handleSetDefaultSchedule(ctx: OperatorContext, args: SiteSchedule) {
  const schedule: SiteSchedule = {
    frequency: args.frequency,
    time: args.time,
    weekday: args.weekday,
    enabled: args.enabled,
  };
  ctx.store.setSetting(SETTING_DEFAULT_SCHEDULE, schedule);
  recordOperatorAction(ctx, 'schedule.default', SETTING_DEFAULT_SCHEDULE, true, { ...schedule });
  return { success: true as const, default_schedule: schedule };
}

export function handleSetRetention(ctx: OperatorContext, args: { keep: number }) {
  const keep = normalizeKeep(args.keep);
  ctx.store.setSetting(SETTING_RETENTION_KEEP, keep);
  recordOperatorAction(ctx, 'retention.set', SETTING_RETENTION_KEEP, true, { keep });
  return { success: true as const, retention_keep: keep };
}

export async function handleRunRetention(ctx: OperatorContext) {
  const keep = getRetentionKeep(ctx.store);
  const totals = await cleanupAll(ctx.store, keep);
  recordOperatorAction(ctx, 'retention.run', 'all', true, { keep, ...totals });
  return { success: true as const, keep, ...totals };
}

export const settingsTools = {
  get_settings: {
    description: 'Show retention depth, default schedule, backups root and whether maintenance mode is on.',
  },
  set_maintenance: {
    description: 'Turn maintenance mode on or off. While on, no backup runs, scheduled or manual.',
  },
  set_site_schedule: {
    description: 'Set the backup schedule of one site (times are UTC).',
  },
  set_default_schedule: {
    description: 'Set the schedule used by sites that have none of their own (times are UTC).',
  },
  set_retention: {
    description: 'Set how many backups to keep per site (1-365).',
  },
  run_retention: {
    description: 'Apply the retention depth to every site now.',
  },
};
