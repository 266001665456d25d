import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDb, initDb, sqliteStore } from '../src/db.js';
import { PendingTokenRegistry } from '../src/pending-tokens.js';
import { REGISTER_PATH, registerAgent } from '../src/registration.js';
import { sign } from '../src/security.js';

let now = 1_767_225_600_000;
const clock = () => now;
let registry: PendingTokenRegistry;

function register(body: unknown, sourceIp = '10.0.0.5', headers: Record<string, string> = {}) {
  return registerAgent({ store: sqliteStore, registry, clock }, { body, sourceIp, headers });
}

beforeEach(() => {
  initDb(':memory:');
  now = 1_767_225_600_000;
  registry = new PendingTokenRegistry(clock);
});

afterEach(() => {
  closeDb();
});

describe('registerAgent', () => {
  it('registers an agent with a fresh token', async () => {
    const { token } = registry.issue('A1', '10.0.0.5');

    const result = await register({ token, agent_id: 'A1', port: 8080, meta: { name: 'web-1' } });

    expect(result.status).toBe(200);
    if (result.status !== 200) return;
    expect(result.body.ok).toBe(true);
    expect(result.body.dashboard_ts).toBe(1_767_225_600);
    const agent = sqliteStore.getAgent('A1');
    expect(agent).toMatchObject({ base_url: 'http://10.0.0.5:8080', display_name: 'web-1', shared_secret: result.body.shared_secret });

    const audit = sqliteStore.listAudit({ action: 'agent.register' });
    expect(audit).toHaveLength(1);
    expect(audit[0]).toMatchObject({ actor: 'agent:A1', target: 'A1', ok: true });
  });

  it('accepts a token only once', async () => {
    const { token } = registry.issue('A1', '10.0.0.5');
    expect((await register({ token, agent_id: 'A1', port: 8080 })).status).toBe(200);
    expect(await register({ token, agent_id: 'A1', port: 8080 })).toEqual({ status: 403, body: { ok: false, error: 'invalid_token' } });
  });

  it('rejects tokens for another agent or address', async () => {
    const { token } = registry.issue('A1', '10.0.0.5');
    expect((await register({ token, agent_id: 'A2', port: 8080 })).status).toBe(403);
    expect((await register({ token, agent_id: 'A1', port: 8080 }, '10.0.0.6')).status).toBe(403);
    expect(sqliteStore.listAgents()).toEqual([]);
  });

  it('rejects an expired token', async () => {
    const { token } = registry.issue('A1', '10.0.0.5');
    now += 31_000;
    expect(await register({ token, agent_id: 'A1', port: 8080 })).toEqual({ status: 403, body: { ok: false, error: 'invalid_token' } });
  });

  it('keeps the secret when the agent registers again', async () => {
    const first = await register({ token: registry.issue('A1', '10.0.0.5').token, agent_id: 'A1', port: 8080 });
    const second = await register({ token: registry.issue('A1', '10.0.0.7').token, agent_id: 'A1', port: 9090 }, '10.0.0.7');

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    if (first.status !== 200 || second.status !== 200) return;
    expect(second.body.shared_secret).toBe(first.body.shared_secret);
    expect(sqliteStore.getAgent('A1')?.base_url).toBe('http://10.0.0.7:9090');
  });

  it('answers bad_request for malformed bodies', async () => {
    const bad = { status: 400, body: { ok: false, error: 'bad_request' } };
    expect(await register(null)).toEqual(bad);
    expect(await register({ token: 't', agent_id: 'A1' })).toEqual(bad);
    expect(await register({ token: 't', agent_id: '', port: 8080 })).toEqual(bad);
    expect(await register({ token: 't', agent_id: 'A1', port: 'eighty' })).toEqual(bad);
    expect(await register({ token: 't', agent_id: 'A1', port: 8080 }, '')).toEqual(bad);
  });

  describe('reannounce', () => {
    it('is refused for unknown agents', async () => {
      expect(await register({ token: 'reannounce', agent_id: 'A1', port: 8080 })).toEqual({
        status: 404,
        body: { ok: false, error: 'not_registered' },
      });
    });

    it('needs a signature made with the current secret', async () => {
      const first = await register({ token: registry.issue('A1', '10.0.0.5').token, agent_id: 'A1', port: 8080 });
      if (first.status !== 200) throw new Error('registration failed');
      const secret = first.body.shared_secret;
      const body = { token: 'reannounce', agent_id: 'A1', port: 8181, meta: { name: 'web-1' } };
      const ts = Math.floor(now / 1000);

      expect((await register(body)).status).toBe(403);
      expect((await register(body, '10.0.0.5', {
        'x-timestamp': String(ts),
        'x-signature': sign('test-secret', { ts, method: 'POST', path: REGISTER_PATH, body }),
      })).status).toBe(403);

      const signature = sign(secret, { ts, method: 'POST', path: REGISTER_PATH, body });
      const result = await register(body, '10.0.0.5', { 'x-timestamp': String(ts), 'x-signature': signature });

      expect(result).toEqual({ status: 200, body: { ok: true, shared_secret: secret, dashboard_ts: ts } });
      expect(sqliteStore.getAgent('A1')).toMatchObject({ base_url: 'http://10.0.0.5:8181', display_name: 'web-1' });
      expect(sqliteStore.listAudit({ action: 'agent.reannounce' })).toHaveLength(1);
    });
  });
});
