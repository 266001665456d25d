import { createHash, randomBytes } from 'crypto';

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function toUnixSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

export function b64url(value: Buffer): string {
  return value.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

export function unb64url(value: string): Buffer {
  const normalized = value.replace(/-/g, '+').replace(/_/g, '/');
  const pad = '='.repeat((4 - (normalized.length % 4)) % 4);
  return Buffer.from(normalized + pad, 'base64');
}

/** 32 random bytes, URL-safe for storage and transport. */
export function newSecret(): string {
  return b64url(randomBytes(32));
}

export function sha256Hex(value: string | Buffer): string {
  return createHash('sha256').update(value).digest('hex');
}

function asciiJson(value: unknown): string {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

/**
 * JSON with object keys sorted by code point at every depth, no whitespace,
 * and every character outside printable ASCII written as `\uXXXX`.
 * Both ends sign this form.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return asciiJson(value ?? null);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => compareCodePoints(a, b));
  return `{${entries.map(([k, v]) => `${asciiJson(k)}:${canonicalJson(v)}`).join(',')}}`;
}

const SAFE_COMPONENT_MAX_CHARS = 128;

export function safeComponent(value: string): string {
  const cleaned = (value || '').replace(/[^A-Za-z0-9._@-]/g, '').slice(0, SAFE_COMPONENT_MAX_CHARS);
  if (!cleaned || cleaned === '.' || cleaned === '..') return 'unknown';
  return cleaned;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** UTC `YYYY-MM-DD_HH-MM-SS`, used as the leaf directory of a backup run. */
export function timestampDirName(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}_${pad2(d.getUTCHours())}-${pad2(d.getUTCMinutes())}-${pad2(d.getUTCSeconds())}`;
}

export function snip(value: string, maxChars = 2000): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}…`;
}

export function normalizeIp(address: string | undefined): string {
  if (!address) return '';
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * Runs a step whose failure must not change the caller's outcome (audit writes, notifications, cleanup IO).
 * Failures are logged under `label` and returned, never thrown.
 */
export async function bestEffort<T>(label: string, step: () => T | Promise<T>): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[${label}] error`, message);
    return { ok: false, error: message };
  }
}
