import fs from 'fs';
import os from 'os';
import path from 'path';

function intFromEnv(name: string, fallback: number, min: number, max: number): number {
  const raw = Number(process.env[name]);
  if (!Number.isFinite(raw)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(raw)));
}

export const DISCOVERY_PORT = intFromEnv('FLEET_BACKUP_DISCOVERY_PORT', 7355, 1, 65535);
export const HTTP_PORT = intFromEnv('FLEET_BACKUP_PORT', 7311, 1, 65535);
export const HTTP_HOST = process.env.FLEET_BACKUP_HOST || '0.0.0.0';

export const PENDING_TOKEN_TTL_SEC = 30;
export const PENDING_TOKEN_MAX = intFromEnv('FLEET_BACKUP_PENDING_TOKEN_MAX', 1024, 16, 100_000);
export const TOKEN_SWEEP_INTERVAL_MS = intFromEnv('FLEET_BACKUP_TOKEN_SWEEP_INTERVAL_MS', 500, 100, 60_000);
export const SIGNATURE_MAX_SKEW_SEC = 60;
export const REANNOUNCE_TOKEN = 'reannounce';

export const AGENT_TIMEOUT_MS = intFromEnv('FLEET_BACKUP_AGENT_TIMEOUT_MS', 30_000, 1_000, 60 * 60 * 1000);
export const PULL_TIMEOUT_MS = intFromEnv('FLEET_BACKUP_PULL_TIMEOUT_MS', 600_000, 1_000, 6 * 60 * 60 * 1000);
export const SWEEP_TICK_MS = intFromEnv('FLEET_BACKUP_SWEEP_TICK_MS', 30_000, 1_000, 60_000);

export const DEFAULT_RETENTION_KEEP = 14;
export const MAX_RETENTION_KEEP = 365;

export const SETTING_RETENTION_KEEP = 'retention.keep';
export const SETTING_DEFAULT_SCHEDULE = 'schedule.default';
export const SETTING_OPERATOR_TOKEN = 'operator.token';
export const SETTING_MAINTENANCE = 'maintenance.enabled';

/** Fleet-wide retention runs once a day at this UTC minute of the day (03:00). */
export const DAILY_RETENTION_MINUTE = 3 * 60;
/** Minutes a late sweep looks back over; older missed slots are dropped. */
export const SWEEP_CATCH_UP_MINUTES = intFromEnv('FLEET_BACKUP_SWEEP_CATCH_UP_MINUTES', 24 * 60, 1, 7 * 24 * 60);

function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function isWritableDir(dir: string): boolean {
  try {
    ensureDir(dir);
    const marker = path.join(dir, '.fleet-backup-write-test');
    fs.writeFileSync(marker, 'ok');
    fs.rmSync(marker, { force: true });
    return true;
  } catch {
    return false;
  }
}

/** XDG state dir, falling back to ~/.local/share/fleet-backup. */
export function resolveStateDir(): string {
  if (process.env.FLEET_BACKUP_STATE_DIR) return ensureDir(process.env.FLEET_BACKUP_STATE_DIR);
  const xdg = process.env.XDG_STATE_HOME || process.env.XDG_DATA_HOME;
  if (xdg) return ensureDir(path.join(xdg, 'fleet-backup'));
  return ensureDir(path.join(os.homedir(), '.local', 'share', 'fleet-backup'));
}

export function resolveDbPath(): string {
  return process.env.FLEET_BACKUP_DB || path.join(resolveStateDir(), 'controller.sqlite3');
}

export function resolveBackupsRoot(): string {
  if (process.env.FLEET_BACKUP_ROOT) return ensureDir(process.env.FLEET_BACKUP_ROOT);
  if (fs.existsSync('/srv') && isWritableDir('/srv/backups')) return '/srv/backups';
  if (isWritableDir('/backups')) return '/backups';
  return ensureDir(path.join(resolveStateDir(), 'backups'));
}
