import { createHash, timingSafeEqual } from 'crypto';
import express from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createOperatorServer } from './operator.js';
import type { BackupOrchestrator } from './orchestrator.js';
import type { PendingTokenRegistry } from './pending-tokens.js';
import { REGISTER_PATH, registerAgent } from './registration.js';
import type { ControllerStore } from './types.js';
import { errorMessage, normalizeIp, type Clock } from './utils.js';

export interface AppDeps {
  store: ControllerStore;
  registry: PendingTokenRegistry;
  orchestrator: BackupOrchestrator;
  clock: Clock;
  operatorToken: string;
  backupsRoot: string;
}

function upsertRawHeader(rawHeaders: string[], name: string, value: string) {
  const target = name.toLowerCase();
  let replaced = false;

  for (let i = 0; i < rawHeaders.length; i += 2) {
    if ((rawHeaders[i] ?? '').toLowerCase() === target) {
      rawHeaders[i + 1] = value;
      replaced = true;
    }
  }

  if (!replaced) {
    rawHeaders.push(name, value);
  }
}

function jsonRpcErrorResponse(id: unknown, code: number, message: string) {
  return {
    jsonrpc: '2.0',
    error: { code, message },
    id: id ?? null,
  };
}

function requestId(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return null;
  return Object.fromEntries(Object.entries(body)).id ?? null;
}

function bearerMatches(header: string | undefined, expected: string): boolean {
  const match = /^Bearer\s+(.+)$/i.exec(header ?? '');
  if (!match) return false;
  const given = createHash('sha256').update(match[1].trim()).digest();
  const wanted = createHash('sha256').update(expected).digest();
  return timingSafeEqual(given, wanted);
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // --- Agent registration ---

  app.post(REGISTER_PATH, async (req, res) => {
    try {
      const result = await registerAgent(deps, {
        body: req.body,
        sourceIp: normalizeIp(req.socket.remoteAddress),
        headers: req.headers,
      });
      res.status(result.status).json(result.body);
    } catch (error) {
      console.error('[register] error', errorMessage(error));
      res.status(500).json({ ok: false, error: 'internal_error' });
    }
  });

  app.get('/health', (_req, res) => {
    try {
      res.json({
        status: 'ok',
        pending_tokens: deps.registry.size,
        agents: deps.store.listAgents().length,
      });
    } catch (error) {
      console.error('[health] error', errorMessage(error));
      res.status(500).json({ status: 'error' });
    }
  });

  // --- Operator tools (stateless MCP) ---

  app.post('/mcp', async (req, res) => {
    if (!bearerMatches(req.headers.authorization, deps.operatorToken)) {
      res.status(401).json(jsonRpcErrorResponse(requestId(req.body), -32001, 'Unauthorized: operator token required'));
      return;
    }

    // The SDK wants both media types in Accept on POST.
    const acceptHeader = req.headers.accept ?? '';
    if (!acceptHeader.includes('application/json') || !acceptHeader.includes('text/event-stream')) {
      const normalizedAccept = 'application/json, text/event-stream';
      req.headers.accept = normalizedAccept;
      upsertRawHeader(req.rawHeaders, 'Accept', normalizedAccept);
    }

    const server = createOperatorServer({
      store: deps.store,
      orchestrator: deps.orchestrator,
      clock: deps.clock,
      backupsRoot: deps.backupsRoot,
    });
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on('close', () => {
      Promise.allSettled([transport.close(), server.close()]).catch((error: unknown) => {
        console.error('[operator] close error', errorMessage(error));
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('[operator] error', errorMessage(error));
      if (!res.headersSent) {
        res.status(500).json(jsonRpcErrorResponse(requestId(req.body), -32603, 'Internal server error'));
      }
    }
  });

  const methodNotAllowed: express.RequestHandler = (_req, res) => {
    res.status(405).json(jsonRpcErrorResponse(null, -32000, 'Method not allowed: this endpoint is stateless, use POST'));
  };
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  const bodyErrors: express.ErrorRequestHandler = (error, req, res, next) => {
    if (error instanceof SyntaxError) {
      res.status(400).json(req.path === REGISTER_PATH
        ? { ok: false, error: 'bad_request' }
        : jsonRpcErrorResponse(null, -32700, 'Parse error'));
      return;
    }
    next(error);
  };
  app.use(bodyErrors);

  return app;
}
