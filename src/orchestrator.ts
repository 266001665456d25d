import fsp from 'fs/promises';
import path from 'path';
import { SETTING_MAINTENANCE } from './config.js';
import { AgentCallError, AgentClient, type SiteRef } from './agent-client.js';
import { logNotifier, type Notifier } from './notifier.js';
import { cleanupSite, getRetentionKeep } from './retention.js';
import { isSiteDueInWindow, minuteBucket, resolveSiteSchedule, type MinuteWindow } from './schedule.js';
import type { AgentRecord, BackupKey, ControllerStore, DeclaredStack, Manifest, PulledArtifact } from './types.js';
import { bestEffort, errorMessage, safeComponent, systemClock, timestampDirName, toUnixSeconds, type Clock } from './utils.js';

export type BackupErrorCode =
  | 'unknown_agent'
  | 'agent_unreachable'
  | 'agent_error'
  | 'backup_failed'
  | 'backup_in_progress'
  | 'maintenance_mode'
  | 'internal_error';

export type BackupRunFailure = {
  ok: false;
  error: BackupErrorCode;
  detail?: string;
  status?: number;
  body?: string;
  agent_result?: unknown;
};

export type BackupRunSuccess = {
  ok: true;
  backup_id: number;
  backup_dir: string;
  manifest: Manifest;
};

export type BackupRunResult = BackupRunSuccess | BackupRunFailure;

export type RefreshSitesResult =
  | { ok: true; sites: SiteRef[] }
  | { ok: false; error: 'unknown_agent' | 'agent_unreachable' | 'agent_error'; detail?: string };

export interface SweepResult {
  maintenance: boolean;
  agents: number;
  agents_skipped: number;
  sites: number;
  due: number;
  succeeded: number;
  failed: number;
  runs: Array<BackupKey & { ok: boolean; error?: BackupErrorCode }>;
}

export interface OrchestratorOptions {
  store: ControllerStore;
  backupsRoot: string;
  client?: AgentClient;
  notifier?: Notifier;
  clock?: Clock;
  /** Retention depth applied after each run; defaults to the stored operator setting. */
  retentionKeep?: () => number;
  /** Backups are refused while this returns true; defaults to the stored maintenance flag. */
  maintenance?: () => boolean;
}

const MANIFEST_FILE = 'manifest.json';

export function isMaintenanceMode(store: ControllerStore): boolean {
  return store.getSetting(SETTING_MAINTENANCE) === true;
}

export function backupKeyLabel(key: BackupKey): string {
  return `${key.agent_id}/${key.stack}/${key.site}`;
}

export function backupDirFor(root: string, key: BackupKey, nowMs: number): string {
  return path.join(
    root,
    safeComponent(key.agent_id),
    safeComponent(key.stack),
    safeComponent(key.site),
    timestampDirName(nowMs),
  );
}

/** Keys that share a backup directory share a lock. */
function runLockKey(key: BackupKey): string {
  return JSON.stringify([safeComponent(key.agent_id), safeComponent(key.stack), safeComponent(key.site)]);
}

function artifactFileName(artifactPath: string, used: Set<string>): string {
  const base = safeComponent(path.posix.basename(artifactPath.replace(/\\/g, '/')));
  let candidate = base;
  let n = 1;
  while (used.has(candidate) || candidate === MANIFEST_FILE) {
    candidate = `${base}-${n}`;
    n += 1;
  }
  used.add(candidate);
  return candidate;
}

function artifactPaths(agentResult: Record<string, unknown>): string[] {
  if (!Array.isArray(agentResult.artifacts)) return [];
  const paths: string[] = [];
  for (const entry of agentResult.artifacts) {
    if (!entry || typeof entry !== 'object') continue;
    const candidate: unknown = Object.fromEntries(Object.entries(entry)).path;
    if (typeof candidate === 'string' && candidate.length > 0) paths.push(candidate);
  }
  return paths;
}

function groupSites(sites: SiteRef[]): DeclaredStack[] {
  const byStack = new Map<string, string[]>();
  for (const { stack, site } of sites) {
    const list = byStack.get(stack) ?? [];
    if (!list.includes(site)) list.push(site);
    byStack.set(stack, list);
  }
  return [...byStack.entries()].map(([stack, list]) => ({ stack, sites: list }));
}

/**
 * Drives one site's backup against its agent: signed trigger, artifact pull,
 * manifest, record, retention. At most one run per (agent, stack, site) is in flight.
 */
export class BackupOrchestrator {
  private readonly store: ControllerStore;
  private readonly client: AgentClient;
  private readonly notifier: Notifier;
  private readonly clock: Clock;
  private readonly backupsRoot: string;
  private readonly retentionKeep: () => number;
  private readonly maintenance: () => boolean;
  private readonly inFlight = new Set<string>();

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.backupsRoot = options.backupsRoot;
    this.clock = options.clock ?? systemClock;
    this.client = options.client ?? new AgentClient({ clock: this.clock });
    this.notifier = options.notifier ?? logNotifier;
    this.retentionKeep = options.retentionKeep ?? (() => getRetentionKeep(this.store));
    this.maintenance = options.maintenance ?? (() => isMaintenanceMode(this.store));
  }

  isRunning(key: BackupKey): boolean {
    return this.inFlight.has(runLockKey(key));
  }

  async backupSite(key: BackupKey, options: { actor?: string } = {}): Promise<BackupRunResult> {
    if (this.maintenance()) {
      console.log(`[backup] key=${backupKeyLabel(key)} refused: maintenance mode`);
      return { ok: false, error: 'maintenance_mode' };
    }
    const lockKey = runLockKey(key);
    if (this.inFlight.has(lockKey)) {
      console.log(`[backup] key=${backupKeyLabel(key)} skipped: run already in flight`);
      return { ok: false, error: 'backup_in_progress' };
    }
    this.inFlight.add(lockKey);
    try {
      return await this.run(key, options.actor ?? 'operator');
    } finally {
      this.inFlight.delete(lockKey);
    }
  }

  private async run(key: BackupKey, actor: string): Promise<BackupRunResult> {
    const startedAt = this.clock();
    const label = backupKeyLabel(key);

    const agent = this.store.getAgent(key.agent_id);
    if (!agent) {
      console.error(`[backup] key=${label} error=unknown_agent`);
      return { ok: false, error: 'unknown_agent' };
    }

    const audit = await bestEffort('backup', () => this.store.openAudit({
      ts: toUnixSeconds(startedAt),
      actor,
      action: 'backup.request',
      target: label,
    }));
    const auditId = audit.ok ? audit.value : null;

    const fail = async (failure: BackupRunFailure): Promise<BackupRunFailure> => {
      console.error(`[backup] key=${label} error=${failure.error}${failure.detail ? ` detail=${failure.detail}` : ''}`);
      if (auditId !== null) {
        await bestEffort('backup', () => this.store.finishAudit(auditId, false, { ...failure }));
      }
      await this.notify(agent, key, { kind: 'backup.failed', error: failure.error });
      return failure;
    };

    let agentResult: unknown;
    try {
      agentResult = await this.client.backupSite(agent, key);
    } catch (error) {
      if (error instanceof AgentCallError) {
        return fail({
          ok: false,
          error: error.code,
          detail: error.message,
          ...(error.status !== undefined ? { status: error.status } : {}),
          ...(error.body !== undefined ? { body: error.body } : {}),
        });
      }
      return fail({ ok: false, error: 'internal_error', detail: errorMessage(error) });
    }

    if (!agentResult || typeof agentResult !== 'object' || Array.isArray(agentResult)) {
      return fail({ ok: false, error: 'backup_failed', agent_result: agentResult, detail: 'agent returned a non-object envelope' });
    }
    const envelope: Record<string, unknown> = Object.fromEntries(Object.entries(agentResult));
    if (envelope.ok !== true) {
      const agentError = typeof envelope.error === 'string' ? envelope.error : undefined;
      return fail({ ok: false, error: 'backup_failed', agent_result: envelope, ...(agentError ? { detail: agentError } : {}) });
    }

    try {
      const backupDir = backupDirFor(this.backupsRoot, key, startedAt);
      await fsp.mkdir(backupDir, { recursive: true });

      const pulled = await this.pullArtifacts(agent, backupDir, artifactPaths(envelope));

      const ts = toUnixSeconds(this.clock());
      const manifest: Manifest = {
        ok: true,
        ts,
        agent_id: key.agent_id,
        stack: key.stack,
        site: key.site,
        agent_result: envelope,
        pulled,
      };
      await fsp.writeFile(path.join(backupDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2), 'utf8');

      const record = this.store.insertBackup({ ts, ...key, backup_dir: backupDir, manifest });

      await bestEffort('retention', () => cleanupSite(this.store, key, this.retentionKeep()));

      if (auditId !== null) {
        await bestEffort('backup', () => this.store.finishAudit(auditId, true, {
          backup_id: record.id,
          backup_dir: backupDir,
          pulled,
        }));
      }
      const durationMs = this.clock() - startedAt;
      await this.notify(agent, key, { kind: 'backup.succeeded', duration_ms: durationMs });
      const pulledOk = pulled.filter((p) => p.ok).length;
      console.log(`[backup] key=${label} ok backup_id=${record.id} pulled=${pulledOk}/${pulled.length} duration_ms=${durationMs}`);
      return { ok: true, backup_id: record.id, backup_dir: backupDir, manifest };
    } catch (error) {
      return fail({ ok: false, error: 'internal_error', detail: errorMessage(error) });
    }
  }

  private async pullArtifacts(agent: AgentRecord, backupDir: string, paths: string[]): Promise<PulledArtifact[]> {
    const used = new Set<string>();
    const pulled: PulledArtifact[] = [];
    for (const artifactPath of paths) {
      const savedAs = path.join(backupDir, artifactFileName(artifactPath, used));
      try {
        const { bytes, sha256 } = await this.client.pullArtifact(agent, artifactPath, savedAs);
        pulled.push({ path: artifactPath, saved_as: savedAs, ok: true, bytes, sha256 });
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[backup] agent=${agent.agent_id} artifact=${artifactPath} pull failed: ${message}`);
        pulled.push({ path: artifactPath, saved_as: savedAs, ok: false, error: message });
      }
    }
    return pulled;
  }

  private async notify(
    agent: AgentRecord,
    key: BackupKey,
    event: { kind: 'backup.succeeded'; duration_ms: number } | { kind: 'backup.failed'; error: string },
  ): Promise<void> {
    await bestEffort('notify', () => this.notifier.notify({
      ...event,
      agent_id: agent.agent_id,
      display_name: agent.display_name,
      stack: key.stack,
      site: key.site,
    }));
  }

  /** Lists an agent's sites and records them as its declared sites. */
  async refreshAgentSites(agentId: string): Promise<RefreshSitesResult> {
    const agent = this.store.getAgent(agentId);
    if (!agent) return { ok: false, error: 'unknown_agent' };
    return this.listAndRecordSites(agent);
  }

  private async listAndRecordSites(agent: AgentRecord): Promise<RefreshSitesResult> {
    let sites: SiteRef[];
    try {
      sites = await this.client.listSites(agent);
    } catch (error) {
      if (error instanceof AgentCallError) return { ok: false, error: error.code, detail: error.message };
      return { ok: false, error: 'agent_error', detail: errorMessage(error) };
    }
    await bestEffort('sweep', () => this.store.updateAgentSites(agent.agent_id, groupSites(sites), toUnixSeconds(this.clock())));
    return { ok: true, sites };
  }

  /**
   * One fleet-wide pass. Agents that cannot be listed are skipped; a failing
   * site never stops the pass. A site runs when its schedule matches any minute
   * of `window` (the current minute by default); `force` runs every listed site.
   * Nothing runs in maintenance mode.
   */
  async sweep(options: { force?: boolean; window?: MinuteWindow } = {}): Promise<SweepResult> {
    const result: SweepResult = { maintenance: false, agents: 0, agents_skipped: 0, sites: 0, due: 0, succeeded: 0, failed: 0, runs: [] };
    if (this.maintenance()) {
      console.log('[sweep] skipped: maintenance mode');
      return { ...result, maintenance: true };
    }
    const current = minuteBucket(this.clock());
    const window = options.window ?? { afterMinute: current - 1, throughMinute: current };

    for (const agent of this.store.listAgents()) {
      result.agents += 1;
      const listed = await this.listAndRecordSites(agent);
      if (!listed.ok) {
        result.agents_skipped += 1;
        console.error(`[sweep] agent=${agent.agent_id} skipped: ${listed.error}${listed.detail ? ` (${listed.detail})` : ''}`);
        continue;
      }

      for (const site of listed.sites) {
        result.sites += 1;
        const key: BackupKey = { agent_id: agent.agent_id, stack: site.stack, site: site.site };
        if (!options.force && !isSiteDueInWindow(resolveSiteSchedule(this.store, key), window)) continue;
        result.due += 1;
        const run = await this.backupSite(key, { actor: 'scheduler' });
        if (run.ok) {
          result.succeeded += 1;
          result.runs.push({ ...key, ok: true });
        } else {
          result.failed += 1;
          result.runs.push({ ...key, ok: false, error: run.error });
        }
      }
    }

    if (result.due > 0 || result.agents_skipped > 0) {
      console.log(`[sweep] agents=${result.agents} skipped=${result.agents_skipped} sites=${result.sites} due=${result.due} ok=${result.succeeded} failed=${result.failed}`);
    }
    return result;
  }
}
