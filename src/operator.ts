import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { TIME_OF_DAY_PATTERN } from './schedule.js';
import { agentTools, handleAddAgent, handleDeleteAgent, handleListAgents, handleRefreshAgentSites } from './tools/agents.js';
import {
  backupTools,
  handleDeleteBackup,
  handleGetAuditLog,
  handleListBackups,
  handleRateBackup,
  handleRunSweep,
  handleTriggerBackup,
} from './tools/backups.js';
import { toolError, type OperatorContext } from './tools/common.js';
import {
  settingsTools,
  handleGetSettings,
  handleRunRetention,
  handleSetDefaultSchedule,
  handleSetMaintenance,
  handleSetRetention,
  handleSetSiteSchedule,
} from './tools/settings.js';
import { errorMessage } from './utils.js';

export function mcpTextResponse(payload: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload) }],
  };
}

const scheduleShape = {
  frequency: z.enum(['hourly', 'daily', 'weekly', 'disabled']).describe('How often the site is backed up'),
  time: z.string().regex(TIME_OF_DAY_PATTERN, 'time must be HH:MM').describe('UTC time of day, HH:MM (hourly uses only the minutes)'),
  weekday: z.number().int().min(0).max(6).default(0).describe('Day for weekly schedules, 0 = Sunday'),
  enabled: z.boolean().default(true).describe('Set false to pause without losing the schedule'),
};

const pagingShape = {
  limit: z.number().int().min(1).max(1000).optional().describe('Max entries (default 100)'),
  offset: z.number().int().min(0).optional().describe('Entries to skip'),
};

/** One MCP server per request; every tool answers with a JSON text payload. */
export function createOperatorServer(ctx: OperatorContext): McpServer {
  const server = new McpServer({
    name: 'fleet-backup-controller',
    version: '1.0.0',
  });

  const runTool = async (toolName: string, call: () => unknown) => {
    try {
      return mcpTextResponse(await call());
    } catch (error) {
      console.error(`[operator] ${toolName} error`, errorMessage(error));
      return mcpTextResponse(toolError('internal_error', errorMessage(error)));
    }
  };

  // --- Agents ---

  server.tool('list_agents', agentTools.list_agents.description, {}, () => runTool('list_agents', () => handleListAgents(ctx)));

  server.tool(
    'add_agent',
    agentTools.add_agent.description,
    {
      agent_id: z.string().min(1).describe('Agent identifier'),
      base_url: z.string().url().describe('Agent base URL, e.g. http://10.0.0.5:8080'),
      shared_secret: z.string().min(1).optional().describe('Secret to install; omitted keeps the current one or mints a new one'),
    },
    (args) => runTool('add_agent', () => handleAddAgent(ctx, args)),
  );

  server.tool(
    'delete_agent',
    agentTools.delete_agent.description,
    { agent_id: z.string().min(1).describe('Agent identifier') },
    (args) => runTool('delete_agent', () => handleDeleteAgent(ctx, args)),
  );

  server.tool(
    'refresh_agent_sites',
    agentTools.refresh_agent_sites.description,
    { agent_id: z.string().min(1).describe('Agent identifier') },
    (args) => runTool('refresh_agent_sites', () => handleRefreshAgentSites(ctx, args)),
  );

  // --- Backups ---

  server.tool(
    'trigger_backup',
    backupTools.trigger_backup.description,
    {
      agent_id: z.string().min(1).describe('Agent identifier'),
      stack: z.string().optional().describe('Stack name (default "default")'),
      site: z.string().min(1).describe('Site name'),
    },
    (args) => runTool('trigger_backup', () => handleTriggerBackup(ctx, args)),
  );

  server.tool(
    'list_backups',
    backupTools.list_backups.description,
    {
      agent_id: z.string().optional(),
      stack: z.string().optional(),
      site: z.string().optional(),
      include_manifest: z.boolean().optional().describe('Include the full manifest of each backup'),
      ...pagingShape,
    },
    (args) => runTool('list_backups', () => handleListBackups(ctx, args)),
  );

  server.tool(
    'delete_backup',
    backupTools.delete_backup.description,
    { backup_id: z.number().int().positive() },
    (args) => runTool('delete_backup', () => handleDeleteBackup(ctx, args)),
  );

  server.tool(
    'rate_backup',
    backupTools.rate_backup.description,
    {
      backup_id: z.number().int().positive(),
      rating: z.number().int().min(1).max(5).nullable(),
      feedback: z.string().max(2000).optional(),
    },
    (args) => runTool('rate_backup', () => handleRateBackup(ctx, args)),
  );

  server.tool(
    'run_sweep',
    backupTools.run_sweep.description,
    { force: z.boolean().optional().describe('Back up every listed site regardless of schedule') },
    (args) => runTool('run_sweep', () => handleRunSweep(ctx, args)),
  );

  server.tool(
    'get_audit_log',
    backupTools.get_audit_log.description,
    {
      target: z.string().optional(),
      action: z.string().optional(),
      ...pagingShape,
    },
    (args) => runTool('get_audit_log', () => handleGetAuditLog(ctx, args)),
  );

  // --- Settings ---

  server.tool('get_settings', settingsTools.get_settings.description, {}, () => runTool('get_settings', () => handleGetSettings(ctx)));

  server.tool(
    'set_maintenance',
    settingsTools.set_maintenance.description,
    { enabled: z.boolean().describe('true to pause all backups') },
    (args) => runTool('set_maintenance', () => handleSetMaintenance(ctx, args)),
  );

  server.tool(
    'set_site_schedule',
    settingsTools.set_site_schedule.description,
    {
      agent_id: z.string().min(1),
      stack: z.string().optional(),
      site: z.string().min(1),
      ...scheduleShape,
    },
    (args) => runTool('set_site_schedule', () => handleSetSiteSchedule(ctx, args)),
  );

  server.tool(
    'set_default_schedule',
    settingsTools.set_default_schedule.description,
    scheduleShape,
    (args) => runTool('set_default_schedule', () => handleSetDefaultSchedule(ctx, args)),
  );

  server.tool(
    'set_retention',
    settingsTools.set_retention.description,
    { keep: z.number().int().min(1).max(365).describe('Backups kept per site') },
    (args) => runTool('set_retention', () => handleSetRetention(ctx, args)),
  );

  server.tool('run_retention', settingsTools.run_retention.description, {}, () => runTool('run_retention', () => handleRunRetention(ctx)));

  return server;
}
