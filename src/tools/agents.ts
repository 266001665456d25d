import type { AgentRecord } from '../types.js';
import { newSecret, toUnixSeconds } from '../utils.js';
import { recordOperatorAction, toolError, type OperatorContext } from './common.js';

/** Agent listing without the shared secret. */
function publicAgent(agent: AgentRecord) {
  return {
    agent_id: agent.agent_id,
    display_name: agent.display_name,
    base_url: agent.base_url,
    created_at: agent.created_at,
    last_seen: agent.last_seen,
    declared_sites: agent.declared_sites,
    meta: agent.meta,
  };
}

export function handleListAgents(ctx: OperatorContext) {
  const agents = ctx.store.listAgents().map(publicAgent);
  return { success: true as const, count: agents.length, agents };
}

/**
 * Adds an agent by hand or re-keys an existing one. Without `shared_secret`
 * a known agent keeps its secret and a new one gets a fresh secret.
 */
export function handleAddAgent(ctx: OperatorContext, args: { agent_id: string; base_url: string; shared_secret?: string }) {
  const agentId = args.agent_id.trim();
  if (!agentId) return toolError('bad_request', 'agent_id must not be empty');
  const existing = ctx.store.getAgent(agentId);
  const secret = args.shared_secret?.trim() || existing?.shared_secret || newSecret();
  const agent = ctx.store.putAgent({
    agent_id: agentId,
    base_url: args.base_url.replace(/\/+$/, ''),
    shared_secret: secret,
    now: toUnixSeconds(ctx.clock()),
  });
  recordOperatorAction(ctx, 'agent.add', agentId, true, {
    base_url: agent.base_url,
    secret_changed: existing ? existing.shared_secret !== secret : true,
  });
  return { success: true as const, created: !existing, agent: publicAgent(agent), shared_secret: secret };
}

export function handleDeleteAgent(ctx: OperatorContext, args: { agent_id: string }) {
  if (!ctx.store.deleteAgent(args.agent_id)) {
    return toolError('not_found', `agent ${args.agent_id} is not registered`);
  }
  recordOperatorAction(ctx, 'agent.delete', args.agent_id, true);
  return { success: true as const, agent_id: args.agent_id };
}

export async function handleRefreshAgentSites(ctx: OperatorContext, args: { agent_id: string }) {
  const result = await ctx.orchestrator.refreshAgentSites(args.agent_id);
  if (!result.ok) return toolError(result.error, result.detail ?? result.error);
  return { success: true as const, agent_id: args.agent_id, sites: result.sites };
}

export const agentTools = {
  list_agents: {
    description: 'List registered agents with their address, liveness and declared sites.',
  },
  add_agent: {
    description: 'Add an agent manually or overwrite its address/secret. Returns the shared secret to install on the agent.',
  },
  delete_agent: {
    description: 'Remove an agent and its site schedules. Existing backups stay on disk.',
  },
  refresh_agent_sites: {
    description: 'Ask an agent for its stacks and sites and store them as its declared sites.',
  },
};
