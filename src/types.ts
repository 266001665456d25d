export type ScheduleFrequency = 'hourly' | 'daily' | 'weekly' | 'disabled';

export interface DeclaredStack {
  stack: string;
  sites: string[];
}

/** Free-form metadata an agent reports at registration (`name`, `hostname`, `stacks`, ...). */
export type AgentMeta = Record<string, unknown>;

export interface PendingToken {
  token: string;
  agent_id: string;
  source_ip: string;
  created_at: number;
}

export interface AgentRow {
  agent_id: string;
  display_name: string;
  created_at: number;
  last_seen: number;
  base_url: string;
  shared_secret: string;
  meta_json: string;
}

export interface AgentRecord {
  agent_id: string;
  display_name: string;
  created_at: number;
  last_seen: number;
  base_url: string;
  shared_secret: string;
  meta: AgentMeta;
  declared_sites: DeclaredStack[];
}

export interface PulledArtifact {
  path: string;
  saved_as: string;
  ok: boolean;
  bytes?: number;
  sha256?: string;
  error?: string;
}

export interface Manifest {
  ok: boolean;
  ts: number;
  agent_id: string;
  stack: string;
  site: string;
  agent_result: unknown;
  pulled: PulledArtifact[];
}

export interface BackupRow {
  id: number;
  ts: number;
  agent_id: string;
  stack: string;
  site: string;
  backup_dir: string;
  manifest_json: string;
  rating: number | null;
  feedback: string | null;
}

export interface BackupRecord {
  id: number;
  ts: number;
  agent_id: string;
  stack: string;
  site: string;
  backup_dir: string;
  manifest: Manifest;
  rating: number | null;
  feedback: string | null;
}

export interface BackupKey {
  agent_id: string;
  stack: string;
  site: string;
}

export interface AuditEntry {
  id: number;
  ts: number;
  actor: string;
  action: string;
  target: string;
  ok: boolean;
  detail: Record<string, unknown>;
}

export interface SiteSchedule {
  frequency: ScheduleFrequency;
  time: string;
  weekday: number;
  enabled: boolean;
}

export interface StoredSiteSchedule extends SiteSchedule, BackupKey {
  updated_at: number;
}

/**
 * Typed storage operations shared by registration, orchestration and retention.
 * The SQLite implementation lives in db.ts; tests may pass any object of this shape.
 */
export interface ControllerStore {
  getAgent(agentId: string): AgentRecord | null;
  listAgents(): AgentRecord[];
  upsertAgent(args: { agent_id: string; base_url: string; meta: AgentMeta; now: number }): { secret: string; is_new: boolean };
  putAgent(args: { agent_id: string; base_url: string; shared_secret: string; now: number }): AgentRecord;
  updateAgentSites(agentId: string, stacks: DeclaredStack[], now: number): boolean;
  deleteAgent(agentId: string): boolean;

  insertBackup(args: Omit<BackupRecord, 'id' | 'rating' | 'feedback'>): BackupRecord;
  getBackup(id: number): BackupRecord | null;
  listBackupsForKey(key: BackupKey): BackupRecord[];
  listBackups(options?: Partial<BackupKey> & { limit?: number; offset?: number }): BackupRecord[];
  listBackupKeys(): BackupKey[];
  deleteBackup(id: number): boolean;
  rateBackup(id: number, rating: number | null, feedback: string | null): boolean;

  openAudit(args: { ts: number; actor: string; action: string; target: string; detail?: Record<string, unknown> }): number;
  finishAudit(id: number, ok: boolean, detail: Record<string, unknown>): void;
  listAudit(options?: { target?: string; action?: string; limit?: number; offset?: number }): AuditEntry[];

  getSchedule(key: BackupKey): StoredSiteSchedule | null;
  setSchedule(key: BackupKey, schedule: SiteSchedule, now: number): StoredSiteSchedule;

  getSetting(key: string): unknown;
  setSetting(key: string, value: unknown): void;
}
