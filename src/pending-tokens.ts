import { PENDING_TOKEN_MAX, PENDING_TOKEN_TTL_SEC } from './config.js';
import type { PendingToken } from './types.js';
import { newSecret, systemClock, type Clock } from './utils.js';

export type ClaimOutcome = 'claimed' | 'unknown' | 'expired' | 'agent_mismatch' | 'ip_mismatch';

/**
 * Short-lived registration tokens handed out in discovery offers.
 * All mutations are synchronous, so a claim is atomic with respect to
 * the discovery socket handler and the periodic sweep.
 */
export class PendingTokenRegistry {
  private readonly tokens = new Map<string, PendingToken>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;

  constructor(private readonly clock: Clock = systemClock, options: { ttlSec?: number; maxEntries?: number } = {}) {
    this.ttlMs = (options.ttlSec ?? PENDING_TOKEN_TTL_SEC) * 1000;
    this.maxEntries = options.maxEntries ?? PENDING_TOKEN_MAX;
  }

  get size(): number {
    return this.tokens.size;
  }

  get ttlSec(): number {
    return this.ttlMs / 1000;
  }

  issue(agentId: string, sourceIp: string): PendingToken {
    this.sweep();
    // Oldest first: Map iteration follows insertion order.
    while (this.tokens.size >= this.maxEntries) {
      const oldest = this.tokens.keys().next();
      if (oldest.done) break;
      this.tokens.delete(oldest.value);
    }
    const pending: PendingToken = {
      token: newSecret(),
      agent_id: agentId,
      source_ip: sourceIp,
      created_at: this.clock(),
    };
    this.tokens.set(pending.token, pending);
    return pending;
  }

  private isExpired(pending: PendingToken, now: number): boolean {
    return now - pending.created_at > this.ttlMs;
  }

  claim(token: string, agentId: string, sourceIp: string): ClaimOutcome {
    const pending = this.tokens.get(token);
    if (!pending) return 'unknown';
    if (this.isExpired(pending, this.clock())) {
      this.tokens.delete(token);
      return 'expired';
    }
    if (pending.agent_id !== agentId) return 'agent_mismatch';
    if (pending.source_ip !== sourceIp) return 'ip_mismatch';
    this.tokens.delete(token);
    return 'claimed';
  }

  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [token, pending] of this.tokens.entries()) {
      if (!this.isExpired(pending, now)) continue;
      this.tokens.delete(token);
      removed += 1;
    }
    return removed;
  }
}
