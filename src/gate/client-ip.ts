import type { IncomingHttpHeaders } from 'node:http';

import { MissingClientIdentityError } from '../errors/app-error.js';

import type { ClientIdentity, ClientIpHeaderNames } from './types.js';

function normalizeHeaderValue(
  header: string | string[] | undefined
): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}

function readDirectIp(
  headers: IncomingHttpHeaders,
  name: string
): string | undefined {
  const value = normalizeHeaderValue(headers[name]);
  if (value === undefined || value.trim().length === 0) return undefined;
  return value;
}

function readFirstForwardedIp(
  headers: IncomingHttpHeaders,
  name: string
): string | undefined {
  const value = normalizeHeaderValue(headers[name]);
  const first = value?.split(',')[0]?.trim();
  return first ? first : undefined;
}

/**
 * Resolves the IP a token is bound to.
 *
 * | direct header | forwarded-for | result                        |
 * |---------------|---------------|-------------------------------|
 * | present       | any           | direct header, verbatim       |
 * | absent        | present       | first forwarded entry, trimmed |
 * | absent        | absent        | MissingClientIdentityError    |
 *
 * The direct header is written by the trusted edge; forwarded-for is
 * client-controlled and only consulted when the edge header is missing.
 */
export function resolveClientIp(
  headers: IncomingHttpHeaders,
  names: ClientIpHeaderNames
): ClientIdentity {
  const direct = readDirectIp(headers, names.clientIpHeader);
  if (direct !== undefined) return direct;

  const forwarded = readFirstForwardedIp(headers, names.forwardedForHeader);
  if (forwarded !== undefined) return forwarded;

  throw new MissingClientIdentityError();
}
