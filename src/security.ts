import { createHmac, timingSafeEqual } from 'crypto';
import { SIGNATURE_MAX_SKEW_SEC } from './config.js';
import { b64url, canonicalJson, unb64url } from './utils.js';

export const TIMESTAMP_HEADER = 'X-Timestamp';
export const SIGNATURE_HEADER = 'X-Signature';

export interface SignInput {
  ts: number;
  method: string;
  path: string;
  body: unknown;
}

/** HMAC-SHA256 over `ts\nMETHOD\npath\ncanonical-body`, keyed by the decoded shared secret. */
export function sign(secret: string, input: SignInput): string {
  const message = Buffer.concat([
    Buffer.from(String(input.ts), 'utf8'),
    Buffer.from('\n'),
    Buffer.from(input.method.toUpperCase(), 'utf8'),
    Buffer.from('\n'),
    Buffer.from(input.path, 'utf8'),
    Buffer.from('\n'),
    Buffer.from(canonicalJson(input.body), 'utf8'),
  ]);
  return b64url(createHmac('sha256', unb64url(secret)).update(message).digest());
}

export function verify(
  secret: string,
  input: SignInput & { signature: string },
  options: { nowSec: number; maxSkewSec?: number },
): boolean {
  const maxSkew = options.maxSkewSec ?? SIGNATURE_MAX_SKEW_SEC;
  if (!Number.isFinite(input.ts) || Math.abs(options.nowSec - input.ts) > maxSkew) return false;
  const expected = Buffer.from(sign(secret, input), 'utf8');
  const given = Buffer.from(input.signature || '', 'utf8');
  if (expected.length !== given.length) return false;
  return timingSafeEqual(expected, given);
}

export function signedHeaders(secret: string, input: SignInput): Record<string, string> {
  return {
    [TIMESTAMP_HEADER]: String(input.ts),
    [SIGNATURE_HEADER]: sign(secret, input),
  };
}

/** Reads the signature headers from a Node/express header bag (lower-cased keys). */
export function readSignedHeaders(headers: Record<string, string | string[] | undefined>): { ts: number; signature: string } | null {
  const rawTs = headers[TIMESTAMP_HEADER.toLowerCase()];
  const rawSig = headers[SIGNATURE_HEADER.toLowerCase()];
  if (typeof rawTs !== 'string' || typeof rawSig !== 'string' || !rawSig) return null;
  const ts = Number(rawTs);
  if (!Number.isInteger(ts)) return null;
  return { ts, signature: rawSig };
}
