import type { IncomingHttpHeaders, ServerResponse } from 'node:http';
import os from 'node:os';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { Agent, type Dispatcher, request } from 'undici';

import {
  ForwardingError,
  MethodNotAllowedError,
  RequestCanceledError,
} from '../errors/app-error.js';
import { serializeCookie } from '../gate/request-rewriter.js';
import type { CookieDirective } from '../gate/types.js';

const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

// `host` is rewritten by the dispatcher to the origin's authority.
const DROPPED_REQUEST_HEADERS: ReadonlySet<string> = new Set([
  ...HOP_BY_HOP_HEADERS,
  'host',
  'expect',
]);

const FORWARDABLE_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
]);

const BODYLESS_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

/* -------------------------------------------------------------------------------------------------
 * Dispatcher lifecycle
 * ------------------------------------------------------------------------------------------------- */

function getAgentOptions(): ConstructorParameters<typeof Agent>[0] {
  const cpuCount = os.availableParallelism();
  return {
    keepAliveTimeout: 60000,
    connections: Math.max(cpuCount * 2, 25),
    pipelining: 1,
  };
}

export const dispatcher: Dispatcher = new Agent(getAgentOptions());

export async function destroyDispatcher(): Promise<void> {
  await dispatcher.close();
}

/* -------------------------------------------------------------------------------------------------
 * Forwarding
 * ------------------------------------------------------------------------------------------------- */

export interface OriginRequest {
  readonly method: string;
  readonly path: string;
  /** Raw query without `?`; empty means none. */
  readonly query: string;
  readonly headers: IncomingHttpHeaders;
  readonly body: Readable | null;
}

export interface ForwardOptions {
  readonly origin: URL;
  readonly timeoutMs: number;
  readonly dispatcher?: Dispatcher;
  /** Aborted when the client goes away. */
  readonly signal?: AbortSignal;
}

export interface OriginResponse {
  readonly statusCode: number;
  readonly headers: Record<string, string | string[] | undefined>;
  readonly body: Readable;
}

function isForwardableMethod(method: string): method is Dispatcher.HttpMethod {
  return FORWARDABLE_METHODS.has(method);
}

export function buildOriginUrl(
  origin: URL,
  path: string,
  query: string
): string {
  const basePath = origin.pathname.replace(/\/+$/, '');
  const suffix = path.startsWith('/') ? path : `/${path}`;
  const search = query.length > 0 ? `?${query}` : '';
  return `${origin.origin}${basePath}${suffix}${search}`;
}

export function buildForwardHeaders(
  headers: IncomingHttpHeaders
): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    if (DROPPED_REQUEST_HEADERS.has(name.toLowerCase())) continue;
    out[name] = value;
  }
  return out;
}

function buildRequestSignal(
  timeoutSignal: AbortSignal,
  external?: AbortSignal
): AbortSignal {
  return external ? AbortSignal.any([external, timeoutSignal]) : timeoutSignal;
}

function mapForwardError(
  error: unknown,
  timeoutSignal: AbortSignal,
  options: ForwardOptions
): Error {
  if (options.signal?.aborted) {
    return new RequestCanceledError({ stage: 'origin' });
  }
  if (timeoutSignal.aborted) {
    return new ForwardingError(
      'Origin request timed out',
      { reason: 'timeout', timeoutMs: options.timeoutMs },
      { cause: error }
    );
  }
  return new ForwardingError(
    'Origin unreachable',
    { reason: 'network' },
    { cause: error }
  );
}

/**
 * Sends the request to the origin and resolves once response headers arrive.
 * The timeout covers the wait for headers only; the body stays bound to the
 * client signal. There is no retry: one failure is terminal for the request.
 */
export async function forwardToOrigin(
  originRequest: OriginRequest,
  options: ForwardOptions
): Promise<OriginResponse> {
  const { method } = originRequest;
  if (!isForwardableMethod(method)) {
    throw new MethodNotAllowedError(method, [...FORWARDABLE_METHODS]);
  }

  const url = buildOriginUrl(
    options.origin,
    originRequest.path,
    originRequest.query
  );
  const timeout = new AbortController();
  const timer = setTimeout(() => {
    timeout.abort();
  }, options.timeoutMs);

  try {
    const response = await request(url, {
      method,
      headers: buildForwardHeaders(originRequest.headers),
      body: BODYLESS_METHODS.has(method) ? null : originRequest.body,
      signal: buildRequestSignal(timeout.signal, options.signal),
      dispatcher: options.dispatcher ?? dispatcher,
    });

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  } catch (error: unknown) {
    throw mapForwardError(error, timeout.signal, options);
  } finally {
    clearTimeout(timer);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Relay
 * ------------------------------------------------------------------------------------------------- */

/**
 * Writes the origin's status, headers and body to the client. The only
 * addition is a `Set-Cookie` for the promoted access token.
 */
export async function relayOriginResponse(
  res: ServerResponse,
  originResponse: OriginResponse,
  cookie?: CookieDirective
): Promise<void> {
  res.statusCode = originResponse.statusCode;

  for (const [name, value] of Object.entries(originResponse.headers)) {
    if (value === undefined) continue;
    if (HOP_BY_HOP_HEADERS.has(name.toLowerCase())) continue;
    res.setHeader(name, value);
  }

  if (cookie) {
    res.appendHeader('Set-Cookie', serializeCookie(cookie));
  }

  await pipeline(originResponse.body, res);
}
