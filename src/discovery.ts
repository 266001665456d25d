import dgram from 'dgram';
import { z } from 'zod';
import { DISCOVERY_PORT, TOKEN_SWEEP_INTERVAL_MS } from './config.js';
import type { PendingTokenRegistry } from './pending-tokens.js';
import { errorMessage, normalizeIp } from './utils.js';

export const HELLO_TYPE = 'agent.hello';
export const OFFER_TYPE = 'dashboard.offer';

const FALLBACK_LOCAL_IP = '127.0.0.1';

const helloSchema = z.object({
  type: z.literal(HELLO_TYPE),
  agent_id: z.string().trim().min(1),
  port: z.coerce.number().int().min(1).max(65535),
});

export interface AgentHello {
  agent_id: string;
  port: number;
}

export interface DashboardOffer {
  type: typeof OFFER_TYPE;
  dashboard_url: string;
  token: string;
  expires_in: number;
}

/** Returns null for anything that is not a well-formed hello; such datagrams are dropped silently. */
export function parseHello(payload: Buffer | string): AgentHello | null {
  let raw: unknown;
  try {
    raw = JSON.parse(typeof payload === 'string' ? payload : payload.toString('utf8'));
  } catch {
    return null;
  }
  const parsed = helloSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { agent_id: parsed.data.agent_id, port: parsed.data.port };
}

export function dashboardUrl(localIp: string, dashboardPort: number): string {
  const host = localIp.includes(':') ? `[${localIp}]` : localIp;
  return `http://${host}:${dashboardPort}`;
}

export type LocalIpResolver = (peerIp: string, peerPort: number) => Promise<string>;

/**
 * The local address the OS would use to reach `peerIp`, found by connecting
 * a throwaway UDP socket (no packet is sent).
 */
export const localIpForPeer: LocalIpResolver = (peerIp, peerPort) => new Promise((resolve) => {
  const socket = dgram.createSocket(peerIp.includes(':') ? 'udp6' : 'udp4');
  let settled = false;
  const finish = (ip: string) => {
    if (settled) return;
    settled = true;
    socket.close();
    resolve(ip);
  };
  socket.once('error', (error) => {
    console.error('[discovery] local address lookup failed', errorMessage(error));
    finish(FALLBACK_LOCAL_IP);
  });
  socket.connect(peerPort, peerIp, () => {
    const { address } = socket.address();
    finish(address && address !== '0.0.0.0' && address !== '::' ? address : FALLBACK_LOCAL_IP);
  });
});

export interface DiscoveryOptions {
  registry: PendingTokenRegistry;
  dashboardPort: number;
  port?: number;
  host?: string;
  sweepIntervalMs?: number;
  resolveLocalIp?: LocalIpResolver;
}

/** Issues a pending token for a hello and builds the offer to send back. */
export async function buildOffer(
  options: Pick<DiscoveryOptions, 'registry' | 'dashboardPort' | 'resolveLocalIp'>,
  hello: AgentHello,
  peer: { address: string; port: number },
): Promise<DashboardOffer> {
  const sourceIp = normalizeIp(peer.address);
  const pending = options.registry.issue(hello.agent_id, sourceIp);
  const localIp = await (options.resolveLocalIp ?? localIpForPeer)(sourceIp, peer.port);
  return {
    type: OFFER_TYPE,
    dashboard_url: dashboardUrl(localIp, options.dashboardPort),
    token: pending.token,
    expires_in: options.registry.ttlSec,
  };
}

/** UDP listener answering agent hellos with dashboard offers. */
export class DiscoveryListener {
  private socket: dgram.Socket | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: DiscoveryOptions) {}

  async start(): Promise<number> {
    if (this.socket) return this.socket.address().port;
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    socket.on('message', (msg, rinfo) => {
      this.handleMessage(socket, msg, rinfo).catch((error: unknown) => {
        console.error('[discovery] error', errorMessage(error));
      });
    });
    socket.on('error', (error) => {
      console.error('[discovery] socket error', errorMessage(error));
    });

    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(this.options.port ?? DISCOVERY_PORT, this.options.host ?? '0.0.0.0', () => {
        socket.off('error', reject);
        resolve();
      });
    });
    this.socket = socket;

    this.sweepTimer = setInterval(() => {
      this.options.registry.sweep();
    }, this.options.sweepIntervalMs ?? TOKEN_SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();

    const { port } = socket.address();
    console.log(`[discovery] listening on udp/${port}`);
    return port;
  }

  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
  }

  private async handleMessage(socket: dgram.Socket, msg: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    const hello = parseHello(msg);
    if (!hello) return;
    const offer = await buildOffer(this.options, hello, rinfo);
    await new Promise<void>((resolve, reject) => {
      socket.send(JSON.stringify(offer), rinfo.port, rinfo.address, (error) => (error ? reject(error) : resolve()));
    });
    console.log(`[discovery] offer agent=${hello.agent_id} peer=${normalizeIp(rinfo.address)}:${rinfo.port} url=${offer.dashboard_url}`);
  }
}
