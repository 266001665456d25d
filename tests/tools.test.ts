import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AgentClient } from '../src/agent-client.js';
import { closeDb, initDb, sqliteStore } from '../src/db.js';
import { BackupOrchestrator } from '../src/orchestrator.js';
import { handleAddAgent, handleDeleteAgent, handleListAgents, handleRefreshAgentSites } from '../src/tools/agents.js';
import {
  handleDeleteBackup,
  handleGetAuditLog,
  handleListBackups,
  handleRateBackup,
  handleRunSweep,
  handleTriggerBackup,
} from '../src/tools/backups.js';
import type { OperatorContext } from '../src/tools/common.js';
import {
  handleGetSettings,
  handleRunRetention,
  handleSetDefaultSchedule,
  handleSetMaintenance,
  handleSetRetention,
  handleSetSiteSchedule,
} from '../src/tools/settings.js';
import { startFakeAgent, type FakeAgent } from './fake-agent.js';

const now = Date.UTC(2026, 2, 1, 2, 0, 5);
const clock = () => now;
const nowSec = () => Math.floor(now / 1000);

let root: string;
let ctx: OperatorContext;
let agent: FakeAgent | null = null;

beforeEach(() => {
  initDb(':memory:');
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-backup-tools-'));
  ctx = {
    store: sqliteStore,
    clock,
    backupsRoot: root,
    orchestrator: new BackupOrchestrator({
      store: sqliteStore,
      backupsRoot: root,
      clock,
      client: new AgentClient({ clock, timeoutMs: 5_000 }),
      notifier: { notify: async () => undefined },
    }),
  };
});

afterEach(async () => {
  await agent?.close();
  agent = null;
  closeDb();
  fs.rmSync(root, { recursive: true, force: true });
});

describe('agent tools', () => {
  it('adds an agent by hand and lists it without the secret', () => {
    const added = handleAddAgent(ctx, { agent_id: 'A1', base_url: 'http://10.0.0.5:8080/', shared_secret: 'test-secret' });
    expect(added).toMatchObject({ success: true, created: true, shared_secret: 'test-secret' });

    const listed = handleListAgents(ctx);
    expect(listed.count).toBe(1);
    expect(listed.agents[0]).toEqual({
      agent_id: 'A1',
      display_name: 'A1',
      base_url: 'http://10.0.0.5:8080',
      created_at: nowSec(),
      last_seen: nowSec(),
      declared_sites: [],
      meta: {},
    });
    expect(handleGetAuditLog(ctx, { action: 'agent.add' }).entries[0]).toMatchObject({
      actor: 'operator',
      target: 'A1',
      ok: true,
      detail: { base_url: 'http://10.0.0.5:8080', secret_changed: true },
    });
  });

  it('keeps the current secret when none is given', () => {
    const { secret } = sqliteStore.upsertAgent({ agent_id: 'A1', base_url: 'http://h:1', meta: {}, now: 1 });
    const result = handleAddAgent(ctx, { agent_id: 'A1', base_url: 'http://h:2' });
    expect(result).toMatchObject({ success: true, created: false, shared_secret: secret });
  });

  it('deletes agents and reports unknown ones', () => {
    handleAddAgent(ctx, { agent_id: 'A1', base_url: 'http://h:1' });
    expect(handleDeleteAgent(ctx, { agent_id: 'A1' })).toEqual({ success: true, agent_id: 'A1' });
    expect(handleDeleteAgent(ctx, { agent_id: 'A1' })).toEqual({
      success: false,
      error_code: 'not_found',
      error: 'agent A1 is not registered',
    });
  });

  it('refreshes declared sites from the agent', async () => {
    agent = await startFakeAgent({ secret: 'test-secret', nowSec, sites: [{ stack: 'main', site: 'example.com' }] });
    handleAddAgent(ctx, { agent_id: 'A1', base_url: agent.baseUrl, shared_secret: 'test-secret' });

    const result = await handleRefreshAgentSites(ctx, { agent_id: 'A1' });

    expect(result).toEqual({ success: true, agent_id: 'A1', sites: [{ stack: 'main', site: 'example.com' }] });
    expect(sqliteStore.getAgent('A1')?.declared_sites).toEqual([{ stack: 'main', sites: ['example.com'] }]);
  });
});

describe('backup tools', () => {
  beforeEach(async () => {
    agent = await startFakeAgent({
      secret: 'test-secret',
      nowSec,
      sites: [{ stack: 'main', site: 'example.com' }],
      backup: () => ({ json: { ok: true, artifacts: [{ path: '/srv/dump.sql' }] } }),
      artifacts: { '/srv/dump.sql': 'select 1;' },
    });
    handleAddAgent(ctx, { agent_id: 'A1', base_url: agent.baseUrl, shared_secret: 'test-secret' });
  });

  it('triggers, lists, rates and deletes a backup', async () => {
    const triggered = await handleTriggerBackup(ctx, { agent_id: 'A1', stack: 'main', site: 'example.com' });
    expect(triggered.success).toBe(true);
    if (!triggered.success) return;

    const listed = handleListBackups(ctx, { agent_id: 'A1' });
    expect(listed.count).toBe(1);
    expect(listed.backups[0]).toMatchObject({
      id: triggered.backup_id,
      ok: true,
      artifacts: 1,
      artifacts_failed: 0,
      bytes: 9,
      rating: null,
    });

    expect(handleRateBackup(ctx, { backup_id: triggered.backup_id, rating: 5, feedback: ' restored ' })).toEqual({
      success: true,
      backup_id: triggered.backup_id,
      rating: 5,
      feedback: 'restored',
    });

    const deleted = await handleDeleteBackup(ctx, { backup_id: triggered.backup_id });
    expect(deleted).toEqual({ success: true, backup_id: triggered.backup_id, dir_removed: true, row_removed: true });
    expect(fs.existsSync(triggered.backup_dir)).toBe(false);
    expect(await handleDeleteBackup(ctx, { backup_id: triggered.backup_id })).toMatchObject({ success: false, error_code: 'not_found' });
  });

  it('reports orchestrator failures with their code', async () => {
    expect(await handleTriggerBackup(ctx, { agent_id: 'ghost', site: 'x' })).toEqual({
      success: false,
      error_code: 'unknown_agent',
      error: 'unknown_agent',
      status: undefined,
      body: undefined,
      agent_result: undefined,
    });
  });

  it('runs a forced sweep', async () => {
    const result = await handleRunSweep(ctx, { force: true });
    expect(result).toMatchObject({ success: true, agents: 1, sites: 1, due: 1, succeeded: 1 });
  });
});

describe('settings tools', () => {
  it('stores site and default schedules', () => {
    expect(handleSetSiteSchedule(ctx, { agent_id: 'ghost', site: 'x', frequency: 'daily', time: '01:00', weekday: 0, enabled: true }))
      .toMatchObject({ success: false, error_code: 'not_found' });

    handleAddAgent(ctx, { agent_id: 'A1', base_url: 'http://h:1' });
    const stored = handleSetSiteSchedule(ctx, { agent_id: 'A1', site: 'blog', frequency: 'weekly', time: '05:30', weekday: 3, enabled: true });
    expect(stored).toEqual({
      success: true,
      schedule: { agent_id: 'A1', stack: 'default', site: 'blog', frequency: 'weekly', time: '05:30', weekday: 3, enabled: true, updated_at: nowSec() },
    });

    handleSetDefaultSchedule(ctx, { frequency: 'hourly', time: '00:15', weekday: 0, enabled: true });
    expect(handleGetSettings(ctx).default_schedule).toEqual({ frequency: 'hourly', time: '00:15', weekday: 0, enabled: true });
  });

  it('sets and applies retention', async () => {
    expect(handleSetRetention(ctx, { keep: 500 })).toEqual({ success: true, retention_keep: 365 });
    expect(handleSetRetention(ctx, { keep: 1 })).toEqual({ success: true, retention_keep: 1 });

    const key = { agent_id: 'A1', stack: 'main', site: 'example.com' };
    for (const ts of [10, 20, 30]) {
      sqliteStore.insertBackup({
        ts,
        ...key,
        backup_dir: path.join(root, String(ts)),
        manifest: { ok: true, ts, ...key, agent_result: null, pulled: [] },
      });
    }

    expect(await handleRunRetention(ctx)).toEqual({ success: true, keep: 1, keys: 1, deleted: 2, dir_errors: 0 });
    expect(handleGetSettings(ctx)).toMatchObject({ retention_keep: 1, backups_root: root });
  });

  it('pauses every backup while maintenance mode is on', async () => {
    expect(handleGetSettings(ctx).maintenance).toBe(false);
    expect(handleSetMaintenance(ctx, { enabled: true })).toEqual({ success: true, maintenance: true });
    expect(handleGetSettings(ctx).maintenance).toBe(true);

    handleAddAgent(ctx, { agent_id: 'A1', base_url: 'http://127.0.0.1:9' });
    expect(await handleTriggerBackup(ctx, { agent_id: 'A1', site: 'example.com' })).toMatchObject({
      success: false,
      error_code: 'maintenance_mode',
    });
    expect(await handleRunSweep(ctx, { force: true })).toEqual({
      success: false,
      error_code: 'maintenance_mode',
      error: 'maintenance mode is on; no backups run',
    });
    expect(sqliteStore.listAudit({ action: 'backup.request' })).toEqual([]);

    const toggles = sqliteStore.listAudit({ action: 'maintenance.set' });
    expect(toggles).toHaveLength(1);
    expect(toggles[0]).toMatchObject({ actor: 'operator', target: 'maintenance.enabled', ok: true, detail: { enabled: true } });

    handleSetMaintenance(ctx, { enabled: false });
    expect(handleGetSettings(ctx).maintenance).toBe(false);
  });
});
