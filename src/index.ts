#!/usr/bin/env node

import { DISCOVERY_PORT, HTTP_HOST, HTTP_PORT, SETTING_OPERATOR_TOKEN, resolveBackupsRoot, resolveDbPath } from './config.js';
import { createApp } from './app.js';
import { ensureProcessSecret, getDb, sqliteStore } from './db.js';
import { DiscoveryListener } from './discovery.js';
import { BackupOrchestrator } from './orchestrator.js';
import { PendingTokenRegistry } from './pending-tokens.js';
import { SweepScheduler } from './scheduler.js';
import { errorMessage, systemClock } from './utils.js';

getDb();
const clock = systemClock;
const backupsRoot = resolveBackupsRoot();
const operatorToken = ensureProcessSecret(SETTING_OPERATOR_TOKEN);

const registry = new PendingTokenRegistry(clock);
const orchestrator = new BackupOrchestrator({ store: sqliteStore, backupsRoot, clock });
const discovery = new DiscoveryListener({ registry, port: DISCOVERY_PORT, dashboardPort: HTTP_PORT });

const app = createApp({ store: sqliteStore, registry, orchestrator, clock, operatorToken, backupsRoot });

const scheduler = new SweepScheduler({ orchestrator, store: sqliteStore, clock });
scheduler.start();

discovery.start().catch((error: unknown) => {
  console.error('[discovery] failed to start', errorMessage(error));
});

app.listen(HTTP_PORT, HTTP_HOST, () => {
  console.log(`Fleet backup controller running at http://${HTTP_HOST}:${HTTP_PORT} (db=${resolveDbPath()}, backups=${backupsRoot})`);
  console.log(`Operator tools at /mcp; send "Authorization: Bearer ${operatorToken}"`);
});
