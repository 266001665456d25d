import express from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { readSignedHeaders, verify } from '../src/security.js';

export interface FakeReply {
  status?: number;
  json?: unknown;
  text?: string;
  delayMs?: number;
}

export interface FakeAgentOptions {
  secret: string | (() => string);
  nowSec?: () => number;
  backup?: (body: unknown) => FakeReply;
  sites?: unknown;
  artifacts?: Record<string, string | Buffer>;
}

export interface FakeCall {
  method: string;
  url: string;
  verified: boolean;
  body: unknown;
}

export interface FakeAgent {
  baseUrl: string;
  port: number;
  calls: FakeCall[];
  close(): Promise<void>;
}

/** In-process stand-in for a backup agent: checks request signatures and answers with canned replies. */
export async function startFakeAgent(options: FakeAgentOptions): Promise<FakeAgent> {
  const app = express();
  app.use(express.json());
  const calls: FakeCall[] = [];
  const timers = new Set<NodeJS.Timeout>();

  const record = (req: express.Request): boolean => {
    const secret = typeof options.secret === 'function' ? options.secret() : options.secret;
    const body: unknown = req.method === 'POST' ? req.body : {};
    const signed = readSignedHeaders(req.headers);
    const verified = signed !== null && verify(secret, {
      ts: signed.ts,
      method: req.method,
      path: req.originalUrl,
      body,
      signature: signed.signature,
    }, { nowSec: options.nowSec ? options.nowSec() : Math.floor(Date.now() / 1000) });
    calls.push({ method: req.method, url: req.originalUrl, verified, body });
    return verified;
  };

  const reply = (res: express.Response, fake: FakeReply) => {
    const send = () => {
      res.status(fake.status ?? 200);
      if (fake.text !== undefined) {
        res.type('text/plain').send(fake.text);
      } else {
        res.json(fake.json ?? {});
      }
    };
    if (!fake.delayMs) {
      send();
      return;
    }
    const timer = setTimeout(() => {
      timers.delete(timer);
      if (!res.writableEnded && !res.destroyed) send();
    }, fake.delayMs);
    timers.add(timer);
  };

  app.post('/api/backup_site', (req, res) => {
    if (!record(req)) {
      res.status(401).json({ ok: false, error: 'bad signature' });
      return;
    }
    reply(res, options.backup ? options.backup(req.body) : { json: { ok: true, artifacts: [] } });
  });

  app.get('/api/list_sites', (req, res) => {
    if (!record(req)) {
      res.status(401).json({ ok: false, error: 'bad signature' });
      return;
    }
    res.json({ sites: options.sites ?? [] });
  });

  app.get('/api/pull_artifact', (req, res) => {
    if (!record(req)) {
      res.status(401).json({ ok: false, error: 'bad signature' });
      return;
    }
    const wanted = typeof req.query.path === 'string' ? req.query.path : '';
    const content = options.artifacts?.[wanted];
    if (content === undefined) {
      res.status(404).json({ ok: false, error: 'no such artifact' });
      return;
    }
    res.type('application/octet-stream').send(Buffer.from(content));
  });

  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') throw new Error('fake agent did not bind a TCP port');
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    port,
    calls,
    close: () => new Promise<void>((resolve) => {
      for (const timer of timers) clearTimeout(timer);
      timers.clear();
      server.closeAllConnections();
      server.close(() => resolve());
    }),
  };
}
