import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Dispatcher } from 'undici';

import type { GateConfig, OriginConfig, SigningConfig } from '../config/types.js';
import { GateError, RequestCanceledError } from '../errors/app-error.js';
import {
  type ValidationContextResult,
  tryCreateValidationContext,
} from '../gate/hmac-validator.js';
import { evaluateGateRequest } from '../gate/pipeline.js';
import {
  parseRawQuery,
  splitRequestTarget,
} from '../gate/request-inspector.js';
import type { CookieDirective, GateDecision } from '../gate/types.js';
import { logDebug, logWarn } from '../services/logger.js';
import {
  forwardToOrigin,
  relayOriginResponse,
} from '../services/origin-forwarder.js';
import { getErrorMessage } from '../utils/error-utils.js';

export interface TokenGateOptions {
  readonly gate: GateConfig;
  readonly signing: SigningConfig;
  readonly origin: OriginConfig;
  readonly dispatcher?: Dispatcher;
  /** Milliseconds since the epoch; injectable for tests. */
  readonly now?: () => number;
}

function createClientAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function logRejection(error: GateError, req: Request): void {
  logWarn('Token validation failed', {
    code: error.code,
    ...error.details,
    method: req.method,
    path: req.path,
  });
}

async function forwardDecision(
  req: Request,
  res: Response,
  options: TokenGateOptions,
  query: string,
  cookie: CookieDirective | undefined
): Promise<void> {
  const { path } = splitRequestTarget(req.originalUrl);
  const signal = createClientAbortSignal(res);

  const originResponse = await forwardToOrigin(
    { method: req.method, path, query, headers: req.headers, body: req },
    {
      origin: options.origin.url,
      timeoutMs: options.origin.timeoutMs,
      signal,
      ...(options.dispatcher && { dispatcher: options.dispatcher }),
    }
  );

  await relayOriginResponse(res, originResponse, cookie);
}

// Origin headers may already be staged on `res` when the relay fails.
function clearStagedHeaders(res: Response): void {
  for (const name of res.getHeaderNames()) res.removeHeader(name);
}

function queryFor(decision: GateDecision, rawQuery: string): string {
  return decision.kind === 'forward' ? decision.query : rawQuery;
}

/**
 * Terminal middleware: validates login requests, then proxies every
 * request to the origin. Rejections go to the error handler untouched by
 * the origin.
 */
export function createTokenGateMiddleware(
  options: TokenGateOptions
): RequestHandler {
  const signing: ValidationContextResult = tryCreateValidationContext(
    options.signing
  );
  const now = options.now ?? Date.now;

  return async (req: Request, res: Response, next: NextFunction) => {
    const { rawQuery } = splitRequestTarget(req.originalUrl);

    let decision: GateDecision;
    try {
      decision = evaluateGateRequest(
        { query: parseRawQuery(rawQuery), headers: req.headers },
        options.gate,
        signing,
        now()
      );
    } catch (error: unknown) {
      if (error instanceof GateError) logRejection(error, req);
      next(error);
      return;
    }

    if (decision.kind === 'bypass') {
      logDebug('Bypassing token validation', { path: req.path });
    } else {
      logDebug('Login token accepted', {
        clientIp: decision.clientIp,
        path: req.path,
      });
    }

    try {
      await forwardDecision(
        req,
        res,
        options,
        queryFor(decision, rawQuery),
        decision.kind === 'forward' ? decision.cookie : undefined
      );
    } catch (error: unknown) {
      if (
        error instanceof RequestCanceledError ||
        res.headersSent ||
        res.destroyed
      ) {
        logDebug('Origin relay ended early', {
          error: getErrorMessage(error),
        });
        res.destroy();
        return;
      }
      clearStagedHeaders(res);
      next(error);
    }
  };
}
