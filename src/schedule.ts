import { z } from 'zod';
import { SETTING_DEFAULT_SCHEDULE } from './config.js';
import type { BackupKey, ControllerStore, SiteSchedule } from './types.js';

export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const siteScheduleSchema = z.object({
  frequency: z.enum(['hourly', 'daily', 'weekly', 'disabled']),
  time: z.string().regex(TIME_OF_DAY_PATTERN, 'time must be HH:MM (UTC)'),
  weekday: z.number().int().min(0).max(6).default(0),
  enabled: z.boolean().default(true),
});

export const DEFAULT_SITE_SCHEDULE: SiteSchedule = {
  frequency: 'daily',
  time: '02:00',
  weekday: 0,
  enabled: true,
};

/** Whether a site is due in the UTC minute containing `nowMs`. */
export function isSiteDue(schedule: SiteSchedule, nowMs: number): boolean {
  if (!schedule.enabled || schedule.frequency === 'disabled') return false;
  const match = TIME_OF_DAY_PATTERN.exec(schedule.time);
  if (!match) return false;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const now = new Date(nowMs);

  if (now.getUTCMinutes() !== minute) return false;
  if (schedule.frequency === 'hourly') return true;
  if (now.getUTCHours() !== hour) return false;
  if (schedule.frequency === 'daily') return true;
  return now.getUTCDay() === schedule.weekday;
}

/** Minute buckets `afterMinute` (exclusive) through `throughMinute` (inclusive). */
export interface MinuteWindow {
  afterMinute: number;
  throughMinute: number;
}

export function isSiteDueInWindow(schedule: SiteSchedule, window: MinuteWindow): boolean {
  for (let minute = window.afterMinute + 1; minute <= window.throughMinute; minute += 1) {
    if (isSiteDue(schedule, minute * 60_000)) return true;
  }
  return false;
}

export function windowIncludesMinuteOfDay(window: MinuteWindow, minuteOfDay: number): boolean {
  for (let minute = window.afterMinute + 1; minute <= window.throughMinute; minute += 1) {
    if (((minute % 1440) + 1440) % 1440 === minuteOfDay) return true;
  }
  return false;
}

export function getDefaultSchedule(store: ControllerStore): SiteSchedule {
  const parsed = siteScheduleSchema.safeParse(store.getSetting(SETTING_DEFAULT_SCHEDULE));
  return parsed.success ? parsed.data : DEFAULT_SITE_SCHEDULE;
}

export function resolveSiteSchedule(store: ControllerStore, key: BackupKey): SiteSchedule {
  const stored = store.getSchedule(key);
  if (!stored) return getDefaultSchedule(store);
  return {
    frequency: stored.frequency,
    time: stored.time,
    weekday: stored.weekday,
    enabled: stored.enabled,
  };
}

/** Index of the UTC minute containing `nowMs`, counted from the epoch. */
export function minuteBucket(nowMs: number): number {
  return Math.floor(nowMs / 60_000);
}
