import { createHash } from 'crypto';
import fsp from 'fs/promises';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { AGENT_TIMEOUT_MS, PULL_TIMEOUT_MS } from './config.js';
import { signedHeaders } from './security.js';
import { canonicalJson, errorMessage, snip, systemClock, toUnixSeconds, type Clock } from './utils.js';

export const BACKUP_SITE_PATH = '/api/backup_site';
export const LIST_SITES_PATH = '/api/list_sites';
export const PULL_ARTIFACT_PATH = '/api/pull_artifact';

export type AgentCallErrorCode = 'agent_unreachable' | 'agent_error';

export class AgentCallError extends Error {
  constructor(
    readonly code: AgentCallErrorCode,
    message: string,
    readonly status?: number,
    readonly body?: string,
  ) {
    super(message);
    this.name = 'AgentCallError';
  }
}

export interface AgentEndpoint {
  agent_id: string;
  base_url: string;
  shared_secret: string;
}

export interface SiteRef {
  stack: string;
  site: string;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const listSitesResponseSchema = z.object({
  sites: z.array(z.object({
    stack: z.unknown().optional(),
    site: z.unknown().optional(),
  }).passthrough()).nullish(),
}).passthrough();

/** Signed controller→agent calls. Transport problems surface as `AgentCallError`. */
export class AgentClient {
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly pullTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: { clock?: Clock; timeoutMs?: number; pullTimeoutMs?: number; fetchImpl?: FetchLike } = {}) {
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs ?? AGENT_TIMEOUT_MS;
    this.pullTimeoutMs = options.pullTimeoutMs ?? PULL_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async request(agent: AgentEndpoint, args: {
    method: 'GET' | 'POST';
    path: string;
    body: Record<string, unknown>;
    timeoutMs: number;
  }): Promise<Response> {
    const ts = toUnixSeconds(this.clock());
    const headers: Record<string, string> = {
      ...signedHeaders(agent.shared_secret, { ts, method: args.method, path: args.path, body: args.body }),
    };
    const init: RequestInit = {
      method: args.method,
      headers,
      signal: AbortSignal.timeout(args.timeoutMs),
    };
    if (args.method === 'POST') {
      headers['Content-Type'] = 'application/json';
      init.body = canonicalJson(args.body);
    }

    let res: Response;
    try {
      res = await this.fetchImpl(`${agent.base_url.replace(/\/+$/, '')}${args.path}`, init);
    } catch (error) {
      throw new AgentCallError('agent_unreachable', errorMessage(error));
    }
    if (!res.ok) {
      const text = await res.text().catch((error: unknown) => `<unreadable body: ${errorMessage(error)}>`);
      throw new AgentCallError('agent_error', `agent responded ${res.status}`, res.status, snip(text));
    }
    return res;
  }

  private async readJson(res: Response): Promise<unknown> {
    let text: string;
    try {
      text = await res.text();
    } catch (error) {
      throw new AgentCallError('agent_unreachable', errorMessage(error));
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new AgentCallError('agent_error', 'agent returned a non-JSON body', res.status, snip(text));
    }
  }

  /** Triggers a site backup; returns the agent's JSON envelope untouched. */
  async backupSite(agent: AgentEndpoint, site: SiteRef): Promise<unknown> {
    const res = await this.request(agent, {
      method: 'POST',
      path: BACKUP_SITE_PATH,
      body: { stack: site.stack, site: site.site },
      timeoutMs: this.timeoutMs,
    });
    return this.readJson(res);
  }

  async listSites(agent: AgentEndpoint): Promise<SiteRef[]> {
    const res = await this.request(agent, { method: 'GET', path: LIST_SITES_PATH, body: {}, timeoutMs: this.timeoutMs });
    const parsed = listSitesResponseSchema.safeParse(await this.readJson(res));
    if (!parsed.success) {
      throw new AgentCallError('agent_error', 'unexpected list_sites response', res.status);
    }
    const sites: SiteRef[] = [];
    for (const entry of parsed.data.sites ?? []) {
      const site = typeof entry.site === 'string' ? entry.site : '';
      if (!site) continue;
      const stack = typeof entry.stack === 'string' && entry.stack ? entry.stack : 'default';
      sites.push({ stack, site });
    }
    return sites;
  }

  /**
   * Streams the body to `destination`, hashing as it goes. A failed pull
   * leaves no partial file behind.
   */
  async pullArtifact(agent: AgentEndpoint, artifactPath: string, destination: string): Promise<{ bytes: number; sha256: string }> {
    const res = await this.request(agent, {
      method: 'GET',
      path: `${PULL_ARTIFACT_PATH}?path=${encodeURIComponent(artifactPath)}`,
      body: {},
      timeoutMs: this.pullTimeoutMs,
    });

    const hash = createHash('sha256');
    let bytes = 0;
    const tap = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        hash.update(chunk);
        bytes += chunk.length;
        callback(null, chunk);
      },
    });
    const handle = await fsp.open(destination, 'w');
    const out = handle.createWriteStream();
    const failed: { write: Error | null } = { write: null };
    out.once('error', (error) => {
      failed.write = error;
    });

    try {
      const source = res.body ? Readable.fromWeb(res.body) : Readable.from([]);
      await pipeline(source, tap, out);
    } catch (error) {
      await fsp.rm(destination, { force: true }).catch((rmError: unknown) => {
        console.error('[pull] could not remove partial file', destination, errorMessage(rmError));
      });
      if (failed.write) throw failed.write;
      throw new AgentCallError('agent_unreachable', errorMessage(error));
    }
    return { bytes, sha256: hash.digest('hex') };
  }
}
