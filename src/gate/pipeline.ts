import { resolveClientIp } from './client-ip.js';
import {
  type ValidationContextResult,
  validateCloudflareToken,
} from './hmac-validator.js';
import { isLoginFlowRequest } from './request-inspector.js';
import { buildCookieDirective, rewriteQuery } from './request-rewriter.js';
import { extractTokenParameter, parseCompositeToken } from './token-parser.js';
import type { GateDecision, GateOptions, GateRequest } from './types.js';

/**
 * Runs inspector, parser, IP resolver, validator and rewriter in order.
 * Throws a GateError on the first failure; nothing here touches the network.
 */
export function evaluateGateRequest(
  request: GateRequest,
  options: GateOptions,
  signing: ValidationContextResult,
  nowMs: number
): GateDecision {
  if (
    !isLoginFlowRequest(
      request.query,
      options.routingParam,
      options.loginFunctionId
    )
  ) {
    return { kind: 'bypass' };
  }

  if (!signing.ok) throw signing.error;

  const rawToken = extractTokenParameter(request.query, options.tokenParam);
  const token = parseCompositeToken(rawToken);
  const clientIp = resolveClientIp(request.headers, options);

  validateCloudflareToken(
    token.cloudflareToken,
    clientIp,
    signing.context,
    nowMs
  );

  const cookie = buildCookieDirective(
    token.accessToken,
    options.accessCookieName
  );

  return {
    kind: 'forward',
    query: rewriteQuery(request.query, options.tokenParam, token.rawFormsToken),
    clientIp,
    ...(cookie && { cookie }),
  };
}
