import { z } from 'zod';
import { REANNOUNCE_TOKEN } from './config.js';
import type { PendingTokenRegistry } from './pending-tokens.js';
import { readSignedHeaders, verify } from './security.js';
import type { ControllerStore } from './types.js';
import { bestEffort, toUnixSeconds, type Clock } from './utils.js';

export const REGISTER_PATH = '/api/agents/register';

export const registerRequestSchema = z.object({
  token: z.string().min(1),
  agent_id: z.string().trim().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  meta: z.record(z.unknown()).nullish(),
});

export type RegisterRequest = z.infer<typeof registerRequestSchema>;

export type RegistrationError = 'bad_request' | 'invalid_token' | 'not_registered';

export type RegistrationResponse =
  | { status: 200; body: { ok: true; shared_secret: string; dashboard_ts: number } }
  | { status: 400 | 403 | 404; body: { ok: false; error: RegistrationError } };

export interface RegistrationDeps {
  store: ControllerStore;
  registry: PendingTokenRegistry;
  clock: Clock;
}

function rejected(status: 400 | 403 | 404, error: RegistrationError): RegistrationResponse {
  return { status, body: { ok: false, error } };
}

/**
 * Trust-on-first-use registration. A discovery token admits the agent once;
 * `reannounce` admits an agent that is already known and signs with its current secret.
 */
export async function registerAgent(
  deps: RegistrationDeps,
  request: { body: unknown; sourceIp: string; headers: Record<string, string | string[] | undefined> },
): Promise<RegistrationResponse> {
  const parsed = registerRequestSchema.safeParse(request.body);
  if (!parsed.success || !request.sourceIp) return rejected(400, 'bad_request');
  const { token, agent_id: agentId, port } = parsed.data;
  const now = deps.clock();

  if (token === REANNOUNCE_TOKEN) {
    const existing = deps.store.getAgent(agentId);
    if (!existing) {
      console.log(`[register] reannounce from unknown agent=${agentId} ip=${request.sourceIp}`);
      return rejected(404, 'not_registered');
    }
    const signed = readSignedHeaders(request.headers);
    const valid = signed !== null && verify(existing.shared_secret, {
      ts: signed.ts,
      method: 'POST',
      path: REGISTER_PATH,
      body: request.body,
      signature: signed.signature,
    }, { nowSec: toUnixSeconds(now) });
    if (!valid) {
      console.log(`[register] reannounce rejected agent=${agentId} ip=${request.sourceIp}: bad signature`);
      return rejected(403, 'invalid_token');
    }
  } else {
    const outcome = deps.registry.claim(token, agentId, request.sourceIp);
    if (outcome !== 'claimed') {
      console.log(`[register] token rejected agent=${agentId} ip=${request.sourceIp}: ${outcome}`);
      return rejected(403, 'invalid_token');
    }
  }

  const baseUrl = `http://${request.sourceIp.includes(':') ? `[${request.sourceIp}]` : request.sourceIp}:${port}`;
  const { secret, is_new: isNew } = deps.store.upsertAgent({
    agent_id: agentId,
    base_url: baseUrl,
    meta: parsed.data.meta ?? {},
    now: toUnixSeconds(now),
  });

  await bestEffort('register', () => {
    const auditId = deps.store.openAudit({
      ts: toUnixSeconds(now),
      actor: `agent:${agentId}`,
      action: token === REANNOUNCE_TOKEN ? 'agent.reannounce' : 'agent.register',
      target: agentId,
      detail: { base_url: baseUrl, source_ip: request.sourceIp },
    });
    deps.store.finishAudit(auditId, true, { base_url: baseUrl, is_new: isNew });
  });

  console.log(`[register] agent=${agentId} base_url=${baseUrl} new=${isNew}`);
  return { status: 200, body: { ok: true, shared_secret: secret, dashboard_ts: toUnixSeconds(now) } };
}
