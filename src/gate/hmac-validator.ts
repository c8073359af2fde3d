import { Buffer } from 'node:buffer';

import { hmacSha256, timingSafeEqualBytes } from '../crypto.js';
import {
  ConfigError,
  ExpiredTokenError,
  InvalidSignatureError,
} from '../errors/app-error.js';

import { parseCloudflareToken } from './token-parser.js';
import type {
  ClientIdentity,
  CloudflareToken,
  ValidationContext,
} from './types.js';

export const DEFAULT_VALIDITY_WINDOW_SECONDS = 300;

export interface ValidationContextInput {
  readonly secret?: string | undefined;
  readonly validityWindowSeconds?: number;
  readonly clockSkewSeconds?: number;
}

interface ContextSuccess {
  readonly ok: true;
  readonly context: ValidationContext;
}

interface ContextFailure {
  readonly ok: false;
  readonly error: ConfigError;
}

export type ValidationContextResult = ContextSuccess | ContextFailure;

function isUsableDuration(value: number, allowZero: boolean): boolean {
  return Number.isFinite(value) && (allowZero ? value >= 0 : value > 0);
}

/** Builds the frozen per-process context, or throws ConfigError. */
export function createValidationContext(
  input: ValidationContextInput
): ValidationContext {
  const { secret } = input;
  if (secret === undefined || secret.length === 0) {
    throw new ConfigError({ reason: 'missing-secret' });
  }

  const validityWindowSeconds =
    input.validityWindowSeconds ?? DEFAULT_VALIDITY_WINDOW_SECONDS;
  const clockSkewSeconds = input.clockSkewSeconds ?? 0;
  if (!isUsableDuration(validityWindowSeconds, false)) {
    throw new ConfigError({ reason: 'invalid-validity-window' });
  }
  if (!isUsableDuration(clockSkewSeconds, true)) {
    throw new ConfigError({ reason: 'invalid-clock-skew' });
  }

  return Object.freeze({
    secret: Buffer.from(secret, 'utf8'),
    validityWindowSeconds,
    clockSkewSeconds,
  });
}

export function tryCreateValidationContext(
  input: ValidationContextInput
): ValidationContextResult {
  try {
    return { ok: true, context: createValidationContext(input) };
  } catch (error: unknown) {
    if (error instanceof ConfigError) return { ok: false, error };
    throw error;
  }
}

export function buildSignedMessage(
  clientIp: ClientIdentity,
  timestampText: string
): string {
  return `${clientIp}:${timestampText}`;
}

function assertSignature(
  token: CloudflareToken,
  clientIp: ClientIdentity,
  context: ValidationContext
): void {
  const expected = hmacSha256(
    context.secret,
    buildSignedMessage(clientIp, token.timestampText)
  );
  if (!timingSafeEqualBytes(expected, token.signature)) {
    throw new InvalidSignatureError();
  }
}

function assertFresh(
  token: CloudflareToken,
  context: ValidationContext,
  nowMs: number
): void {
  const ageSeconds = nowMs / 1000 - token.timestamp;
  if (ageSeconds > context.validityWindowSeconds) {
    throw new ExpiredTokenError({ reason: 'expired' });
  }
  if (ageSeconds < -context.clockSkewSeconds) {
    throw new ExpiredTokenError({ reason: 'future-dated' });
  }
}

/**
 * Validates `timestamp-signature` for the given client.
 * Order: format, signature, then the time window.
 */
export function validateCloudflareToken(
  cloudflareToken: string,
  clientIp: ClientIdentity,
  context: ValidationContext,
  nowMs: number
): CloudflareToken {
  const token = parseCloudflareToken(cloudflareToken);
  assertSignature(token, clientIp, context);
  assertFresh(token, context, nowMs);
  return token;
}
