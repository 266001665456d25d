import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { resolveDbPath } from './config.js';
import type {
  AgentMeta,
  AgentRecord,
  AgentRow,
  AuditEntry,
  BackupKey,
  BackupRecord,
  BackupRow,
  ControllerStore,
  DeclaredStack,
  Manifest,
  PulledArtifact,
  ScheduleFrequency,
  SiteSchedule,
  StoredSiteSchedule,
} from './types.js';
import { newSecret } from './utils.js';

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (!db) {
    const dbPath = resolveDbPath();
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    initSchema(db);
  }
  return db;
}

export function initDb(dbPath?: string): Database.Database {
  const d = new Database(dbPath || ':memory:');
  d.pragma('journal_mode = WAL');
  d.pragma('foreign_keys = ON');
  initSchema(d);
  db = d;
  return d;
}

function initSchema(d: Database.Database): void {
  d.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      k TEXT PRIMARY KEY,
      v TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS agents (
      agent_id TEXT PRIMARY KEY,
      display_name TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      last_seen INTEGER NOT NULL,
      base_url TEXT NOT NULL,
      shared_secret TEXT NOT NULL,
      meta_json TEXT NOT NULL DEFAULT '{}'
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ts INTEGER NOT NULL,
      actor TEXT NOT NULL,
      action TEXT NOT NULL,
      target TEXT NOT NULL,
      ok INTEGER NOT NULL,
      detail_json TEXT NOT NULL DEFAULT '{}'
    );

    CREATE TABLE IF NOT EXISTS backups (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ts INTEGER NOT NULL,
      agent_id TEXT NOT NULL,
      stack TEXT NOT NULL,
      site TEXT NOT NULL,
      backup_dir TEXT NOT NULL,
      manifest_json TEXT NOT NULL,
      rating INTEGER,
      feedback TEXT
    );

    CREATE TABLE IF NOT EXISTS site_schedules (
      agent_id TEXT NOT NULL,
      stack TEXT NOT NULL,
      site TEXT NOT NULL,
      frequency TEXT NOT NULL,
      time TEXT NOT NULL,
      weekday INTEGER NOT NULL DEFAULT 0,
      enabled INTEGER NOT NULL DEFAULT 1,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (agent_id, stack, site)
    );

    CREATE INDEX IF NOT EXISTS idx_backups_key_ts ON backups(agent_id, stack, site, ts DESC, id DESC);
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(ts DESC);
  `);
}

function parseJsonObject(raw: string | null | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) return Object.fromEntries(Object.entries(parsed));
    return {};
  } catch {
    return {};
  }
}

export function normalizeDeclaredStacks(input: unknown): DeclaredStack[] {
  if (!Array.isArray(input)) return [];
  const stacks: DeclaredStack[] = [];
  for (const entry of input) {
    if (!entry || typeof entry !== 'object') continue;
    const row: Record<string, unknown> = Object.fromEntries(Object.entries(entry));
    const stack = typeof row.stack === 'string' && row.stack.trim() ? row.stack.trim() : 'default';
    const sites = Array.isArray(row.sites)
      ? row.sites.filter((site): site is string => typeof site === 'string' && site.length > 0)
      : [];
    stacks.push({ stack, sites });
  }
  return stacks;
}

function displayNameFor(agentId: string, meta: AgentMeta): string {
  if (typeof meta.name === 'string' && meta.name.trim()) return meta.name.trim();
  if (typeof meta.hostname === 'string' && meta.hostname.trim()) return meta.hostname.trim();
  return agentId;
}

function toAgentRecord(row: AgentRow): AgentRecord {
  const meta: AgentMeta = parseJsonObject(row.meta_json);
  return {
    agent_id: row.agent_id,
    display_name: row.display_name,
    created_at: row.created_at,
    last_seen: row.last_seen,
    base_url: row.base_url,
    shared_secret: row.shared_secret,
    meta,
    declared_sites: normalizeDeclaredStacks(meta.stacks),
  };
}

function toManifest(raw: string, fallback: BackupKey & { ts: number }): Manifest {
  const parsed = parseJsonObject(raw);
  return {
    ok: parsed.ok === true,
    ts: typeof parsed.ts === 'number' ? parsed.ts : fallback.ts,
    agent_id: typeof parsed.agent_id === 'string' ? parsed.agent_id : fallback.agent_id,
    stack: typeof parsed.stack === 'string' ? parsed.stack : fallback.stack,
    site: typeof parsed.site === 'string' ? parsed.site : fallback.site,
    agent_result: parsed.agent_result ?? null,
    pulled: normalizePulled(parsed.pulled),
  };
}

function normalizePulled(input: unknown): PulledArtifact[] {
  if (!Array.isArray(input)) return [];
  const pulled: PulledArtifact[] = [];
  for (const entry of input) {
    if (!entry || typeof entry !== 'object') continue;
    const row: Record<string, unknown> = Object.fromEntries(Object.entries(entry));
    pulled.push({
      path: String(row.path ?? ''),
      saved_as: String(row.saved_as ?? ''),
      ok: row.ok === true,
      ...(typeof row.bytes === 'number' ? { bytes: row.bytes } : {}),
      ...(typeof row.sha256 === 'string' ? { sha256: row.sha256 } : {}),
      ...(typeof row.error === 'string' ? { error: row.error } : {}),
    });
  }
  return pulled;
}

function toBackupRecord(row: BackupRow): BackupRecord {
  return {
    id: row.id,
    ts: row.ts,
    agent_id: row.agent_id,
    stack: row.stack,
    site: row.site,
    backup_dir: row.backup_dir,
    manifest: toManifest(row.manifest_json, row),
    rating: row.rating,
    feedback: row.feedback,
  };
}

// --- Settings ---

export function kvGet(key: string): unknown {
  const row = getDb().prepare('SELECT v FROM kv WHERE k = ?').get(key) as { v: string } | undefined;
  if (!row) return undefined;
  try {
    const parsed: unknown = JSON.parse(row.v);
    return parsed;
  } catch {
    return undefined;
  }
}

export function kvSet(key: string, value: unknown): void {
  getDb().prepare(`
    INSERT INTO kv (k, v) VALUES (?, ?)
    ON CONFLICT(k) DO UPDATE SET v = excluded.v
  `).run(key, JSON.stringify(value));
}

/** Process-wide secret, generated on first use and persisted. */
export function ensureProcessSecret(key: string): string {
  const existing = kvGet(key);
  if (typeof existing === 'string' && existing.length > 0) return existing;
  const secret = newSecret();
  kvSet(key, secret);
  return secret;
}

// --- Agents ---

export function getAgent(agentId: string): AgentRecord | null {
  const row = getDb().prepare('SELECT * FROM agents WHERE agent_id = ?').get(agentId) as AgentRow | undefined;
  return row ? toAgentRecord(row) : null;
}

export function listAgents(): AgentRecord[] {
  const rows = getDb().prepare('SELECT * FROM agents ORDER BY agent_id').all() as AgentRow[];
  return rows.map(toAgentRecord);
}

/**
 * Inserts a new agent with a fresh secret, or refreshes an existing one.
 * The stored secret is never replaced here.
 */
export function upsertAgent(args: { agent_id: string; base_url: string; meta: AgentMeta; now: number }): { secret: string; is_new: boolean } {
  const d = getDb();
  const displayName = displayNameFor(args.agent_id, args.meta);
  const metaJson = JSON.stringify(args.meta);
  const tx = d.transaction(() => {
    const existing = d.prepare('SELECT shared_secret FROM agents WHERE agent_id = ?').get(args.agent_id) as { shared_secret: string } | undefined;
    if (existing) {
      d.prepare(`
        UPDATE agents SET base_url = ?, meta_json = ?, display_name = ?, last_seen = ?
        WHERE agent_id = ?
      `).run(args.base_url, metaJson, displayName, args.now, args.agent_id);
      return { secret: existing.shared_secret, is_new: false };
    }
    const secret = newSecret();
    d.prepare(`
      INSERT INTO agents (agent_id, display_name, created_at, last_seen, base_url, shared_secret, meta_json)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(args.agent_id, displayName, args.now, args.now, args.base_url, secret, metaJson);
    return { secret, is_new: true };
  });
  return tx();
}

/** Operator path: sets address and secret explicitly, keeping any stored metadata. */
export function putAgent(args: { agent_id: string; base_url: string; shared_secret: string; now: number }): AgentRecord {
  getDb().prepare(`
    INSERT INTO agents (agent_id, display_name, created_at, last_seen, base_url, shared_secret, meta_json)
    VALUES (?, ?, ?, ?, ?, ?, '{}')
    ON CONFLICT(agent_id) DO UPDATE SET
      base_url = excluded.base_url,
      shared_secret = excluded.shared_secret,
      last_seen = excluded.last_seen
  `).run(args.agent_id, args.agent_id, args.now, args.now, args.base_url, args.shared_secret);
  const row = getDb().prepare('SELECT * FROM agents WHERE agent_id = ?').get(args.agent_id) as AgentRow;
  return toAgentRecord(row);
}

export function updateAgentSites(agentId: string, stacks: DeclaredStack[], now: number): boolean {
  const d = getDb();
  const tx = d.transaction(() => {
    const row = d.prepare('SELECT meta_json FROM agents WHERE agent_id = ?').get(agentId) as { meta_json: string } | undefined;
    if (!row) return false;
    const meta = parseJsonObject(row.meta_json);
    meta.stacks = stacks;
    d.prepare('UPDATE agents SET meta_json = ?, last_seen = ? WHERE agent_id = ?').run(JSON.stringify(meta), now, agentId);
    return true;
  });
  return tx();
}

export function deleteAgent(agentId: string): boolean {
  const d = getDb();
  const tx = d.transaction(() => {
    d.prepare('DELETE FROM site_schedules WHERE agent_id = ?').run(agentId);
    return d.prepare('DELETE FROM agents WHERE agent_id = ?').run(agentId).changes === 1;
  });
  return tx();
}

// --- Backups ---

export function insertBackup(args: Omit<BackupRecord, 'id' | 'rating' | 'feedback'>): BackupRecord {
  const result = getDb().prepare(`
    INSERT INTO backups (ts, agent_id, stack, site, backup_dir, manifest_json)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(args.ts, args.agent_id, args.stack, args.site, args.backup_dir, JSON.stringify(args.manifest));
  return { ...args, id: Number(result.lastInsertRowid), rating: null, feedback: null };
}

export function getBackup(id: number): BackupRecord | null {
  const row = getDb().prepare('SELECT * FROM backups WHERE id = ?').get(id) as BackupRow | undefined;
  return row ? toBackupRecord(row) : null;
}

/** Newest first; same-second runs fall back to insertion order. */
export function listBackupsForKey(key: BackupKey): BackupRecord[] {
  const rows = getDb().prepare(`
    SELECT * FROM backups WHERE agent_id = ? AND stack = ? AND site = ?
    ORDER BY ts DESC, id DESC
  `).all(key.agent_id, key.stack, key.site) as BackupRow[];
  return rows.map(toBackupRecord);
}

export function listBackups(options: Partial<BackupKey> & { limit?: number; offset?: number } = {}): BackupRecord[] {
  let query = 'SELECT * FROM backups WHERE 1=1';
  const params: unknown[] = [];
  if (options.agent_id) {
    query += ' AND agent_id = ?';
    params.push(options.agent_id);
  }
  if (options.stack) {
    query += ' AND stack = ?';
    params.push(options.stack);
  }
  if (options.site) {
    query += ' AND site = ?';
    params.push(options.site);
  }
  const limit = Number.isFinite(options.limit) ? Math.max(1, Math.min(1000, Math.floor(Number(options.limit)))) : 100;
  const offset = Number.isFinite(options.offset) ? Math.max(0, Math.floor(Number(options.offset))) : 0;
  query += ' ORDER BY ts DESC, id DESC LIMIT ? OFFSET ?';
  params.push(limit, offset);
  const rows = getDb().prepare(query).all(...params) as BackupRow[];
  return rows.map(toBackupRecord);
}

export function listBackupKeys(): BackupKey[] {
  return getDb().prepare('SELECT DISTINCT agent_id, stack, site FROM backups ORDER BY agent_id, stack, site').all() as BackupKey[];
}

export function deleteBackup(id: number): boolean {
  return getDb().prepare('DELETE FROM backups WHERE id = ?').run(id).changes === 1;
}

export function rateBackup(id: number, rating: number | null, feedback: string | null): boolean {
  return getDb().prepare('UPDATE backups SET rating = ?, feedback = ? WHERE id = ?').run(rating, feedback, id).changes === 1;
}

// --- Audit ---

export function openAudit(args: { ts: number; actor: string; action: string; target: string; detail?: Record<string, unknown> }): number {
  const result = getDb().prepare(`
    INSERT INTO audit_log (ts, actor, action, target, ok, detail_json)
    VALUES (?, ?, ?, ?, 1, ?)
  `).run(args.ts, args.actor, args.action, args.target, JSON.stringify(args.detail ?? {}));
  return Number(result.lastInsertRowid);
}

export function finishAudit(id: number, ok: boolean, detail: Record<string, unknown>): void {
  getDb().prepare('UPDATE audit_log SET ok = ?, detail_json = ? WHERE id = ?').run(ok ? 1 : 0, JSON.stringify(detail), id);
}

export function listAudit(options: { target?: string; action?: string; limit?: number; offset?: number } = {}): AuditEntry[] {
  let query = 'SELECT * FROM audit_log WHERE 1=1';
  const params: unknown[] = [];
  if (options.target) {
    query += ' AND target = ?';
    params.push(options.target);
  }
  if (options.action) {
    query += ' AND action = ?';
    params.push(options.action);
  }
  const limit = Number.isFinite(options.limit) ? Math.max(1, Math.min(1000, Math.floor(Number(options.limit)))) : 100;
  const offset = Number.isFinite(options.offset) ? Math.max(0, Math.floor(Number(options.offset))) : 0;
  query += ' ORDER BY id DESC LIMIT ? OFFSET ?';
  params.push(limit, offset);
  const rows = getDb().prepare(query).all(...params) as Array<{
    id: number;
    ts: number;
    actor: string;
    action: string;
    target: string;
    ok: number;
    detail_json: string;
  }>;
  return rows.map((row) => ({
    id: row.id,
    ts: row.ts,
    actor: row.actor,
    action: row.action,
    target: row.target,
    ok: row.ok === 1,
    detail: parseJsonObject(row.detail_json),
  }));
}

// --- Schedules ---

function normalizeFrequency(value: string): ScheduleFrequency {
  if (value === 'hourly' || value === 'daily' || value === 'weekly' || value === 'disabled') return value;
  return 'daily';
}

export function getSchedule(key: BackupKey): StoredSiteSchedule | null {
  const row = getDb().prepare(`
    SELECT * FROM site_schedules WHERE agent_id = ? AND stack = ? AND site = ?
  `).get(key.agent_id, key.stack, key.site) as {
    agent_id: string;
    stack: string;
    site: string;
    frequency: string;
    time: string;
    weekday: number;
    enabled: number;
    updated_at: number;
  } | undefined;
  if (!row) return null;
  return {
    agent_id: row.agent_id,
    stack: row.stack,
    site: row.site,
    frequency: normalizeFrequency(row.frequency),
    time: row.time,
    weekday: row.weekday,
    enabled: row.enabled === 1,
    updated_at: row.updated_at,
  };
}

export function setSchedule(key: BackupKey, schedule: SiteSchedule, now: number): StoredSiteSchedule {
  getDb().prepare(`
    INSERT INTO site_schedules (agent_id, stack, site, frequency, time, weekday, enabled, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(agent_id, stack, site) DO UPDATE SET
      frequency = excluded.frequency,
      time = excluded.time,
      weekday = excluded.weekday,
      enabled = excluded.enabled,
      updated_at = excluded.updated_at
  `).run(key.agent_id, key.stack, key.site, schedule.frequency, schedule.time, schedule.weekday, schedule.enabled ? 1 : 0, now);
  return { ...key, ...schedule, updated_at: now };
}

export const sqliteStore: ControllerStore = {
  getAgent,
  listAgents,
  upsertAgent,
  putAgent,
  updateAgentSites,
  deleteAgent,
  insertBackup,
  getBackup,
  listBackupsForKey,
  listBackups,
  listBackupKeys,
  deleteBackup,
  rateBackup,
  openAudit,
  finishAudit,
  listAudit,
  getSchedule,
  setSchedule,
  getSetting: kvGet,
  setSetting: kvSet,
};

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
