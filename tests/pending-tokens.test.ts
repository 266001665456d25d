import { describe, it, expect } from 'vitest';
import { PendingTokenRegistry } from '../src/pending-tokens.js';

function registryAt(start = 1_000_000) {
  let now = start;
  const registry = new PendingTokenRegistry(() => now);
  return {
    registry,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe('PendingTokenRegistry', () => {
  it('accepts a claim 29 s after issue', () => {
    const { registry, advance } = registryAt();
    const { token } = registry.issue('A1', '10.0.0.5');
    advance(29_000);
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('claimed');
  });

  it('still accepts a claim at exactly 30 s', () => {
    const { registry, advance } = registryAt();
    const { token } = registry.issue('A1', '10.0.0.5');
    advance(30_000);
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('claimed');
  });

  it('rejects a claim 31 s after issue and forgets the token', () => {
    const { registry, advance } = registryAt();
    const { token } = registry.issue('A1', '10.0.0.5');
    advance(31_000);
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('expired');
    expect(registry.size).toBe(0);
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('unknown');
  });

  it('rejects a mismatched agent or address without burning the token', () => {
    const { registry } = registryAt();
    const { token } = registry.issue('A1', '10.0.0.5');
    expect(registry.claim(token, 'A2', '10.0.0.5')).toBe('agent_mismatch');
    expect(registry.claim(token, 'A1', '10.0.0.6')).toBe('ip_mismatch');
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('claimed');
  });

  it('is single use', () => {
    const { registry } = registryAt();
    const { token } = registry.issue('A1', '10.0.0.5');
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('claimed');
    expect(registry.claim(token, 'A1', '10.0.0.5')).toBe('unknown');
  });

  it('issues distinct tokens for repeated hellos', () => {
    const { registry } = registryAt();
    const first = registry.issue('A1', '10.0.0.5');
    const second = registry.issue('A1', '10.0.0.5');
    expect(first.token).not.toBe(second.token);
    expect(registry.size).toBe(2);
    expect(registry.ttlSec).toBe(30);
  });

  it('sweeps expired tokens', () => {
    const { registry, advance } = registryAt();
    registry.issue('A1', '10.0.0.5');
    advance(20_000);
    const fresh = registry.issue('A2', '10.0.0.6');
    advance(11_000);
    expect(registry.sweep()).toBe(1);
    expect(registry.size).toBe(1);
    expect(registry.claim(fresh.token, 'A2', '10.0.0.6')).toBe('claimed');
  });

  it('evicts the oldest token at capacity', () => {
    const registry = new PendingTokenRegistry(() => 0, { maxEntries: 2 });
    const oldest = registry.issue('A1', '10.0.0.1');
    registry.issue('A2', '10.0.0.2');
    const newest = registry.issue('A3', '10.0.0.3');
    expect(registry.size).toBe(2);
    expect(registry.claim(oldest.token, 'A1', '10.0.0.1')).toBe('unknown');
    expect(registry.claim(newest.token, 'A3', '10.0.0.3')).toBe('claimed');
  });
});
