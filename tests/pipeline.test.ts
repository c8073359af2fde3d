import assert from 'node:assert/strict';
import type { IncomingHttpHeaders } from 'node:http';
import { describe, it } from 'node:test';

import {
  ConfigError,
  ExpiredTokenError,
  InvalidSignatureError,
  MalformedTokenError,
  MissingClientIdentityError,
  MissingParameterError,
} from '../src/errors/app-error.js';
import { tryCreateValidationContext } from '../src/gate/hmac-validator.js';
import { evaluateGateRequest } from '../src/gate/pipeline.js';
import { parseRawQuery } from '../src/gate/request-inspector.js';
import type { GateOptions } from '../src/gate/types.js';

import {
  cloudflareToken,
  findTimestamp,
  NOW_MS,
  TEST_SECRET,
} from './helpers/tokens.js';

const IP = '127.0.0.1';
const LOGIN = 'function_id=APPS_LOGIN_DEFAULT';

const OPTIONS: GateOptions = {
  routingParam: 'function_id',
  loginFunctionId: 'APPS_LOGIN_DEFAULT',
  tokenParam: 'oait',
  accessCookieName: 'CF_Authorization',
  clientIpHeader: 'cf-connecting-ip',
  forwardedForHeader: 'x-forwarded-for',
};

const signing = tryCreateValidationContext({ secret: TEST_SECRET });
const headers: IncomingHttpHeaders = { 'cf-connecting-ip': IP };

function evaluate(
  rawQuery: string,
  requestHeaders: IncomingHttpHeaders = headers,
  signingResult = signing
) {
  return evaluateGateRequest(
    { query: parseRawQuery(rawQuery), headers: requestHeaders },
    OPTIONS,
    signingResult,
    NOW_MS
  );
}

const encodedToken = encodeURIComponent(cloudflareToken(IP));

describe('evaluateGateRequest', () => {
  it('bypasses requests outside the login flow', () => {
    assert.deepEqual(evaluate('function_id=OTHER&oait=junk'), { kind: 'bypass' });
    assert.deepEqual(evaluate(''), { kind: 'bypass' });
  });

  it('bypasses without a secret', () => {
    const unconfigured = tryCreateValidationContext({});
    assert.deepEqual(evaluate('x=1', headers, unconfigured), { kind: 'bypass' });
  });

  it('reports missing configuration before a missing token', () => {
    const unconfigured = tryCreateValidationContext({});
    assert.throws(() => evaluate(LOGIN, headers, unconfigured), ConfigError);
  });

  it('requires the token parameter', () => {
    assert.throws(() => evaluate(LOGIN), MissingParameterError);
  });

  it('gates when any routing parameter carries the sentinel', () => {
    assert.throws(
      () => evaluate(`function_id=OTHER&${LOGIN}`),
      MissingParameterError
    );
  });

  for (const value of ['invalidtoken', '', 'forms_token++', 'forms_token++invalid-hmac-token']) {
    it(`rejects oait=${JSON.stringify(value)} as malformed`, () => {
      assert.throws(() => evaluate(`${LOGIN}&oait=${value}`), MalformedTokenError);
    });
  }

  it('rejects an expired token', () => {
    const old = encodeURIComponent(cloudflareToken(IP, '1000000000.000'));
    assert.throws(
      () => evaluate(`${LOGIN}&oait=forms_token++${old}`),
      ExpiredTokenError
    );
  });

  it('rejects a token issued for another IP', () => {
    assert.throws(
      () =>
        evaluate(`${LOGIN}&oait=forms_token++${encodedToken}`, {
          'cf-connecting-ip': '198.51.100.1',
        }),
      InvalidSignatureError
    );
  });

  it('requires a client identity', () => {
    assert.throws(
      () => evaluate(`${LOGIN}&oait=forms_token++${encodedToken}`, {}),
      MissingClientIdentityError
    );
  });

  it('parses the token before resolving the client IP', () => {
    assert.throws(() => evaluate(`${LOGIN}&oait=invalidtoken`, {}), MalformedTokenError);
  });

  it('forwards a valid token with the query rewritten', () => {
    assert.deepEqual(
      evaluate(`${LOGIN}&oait=forms_token++${encodedToken}&lang=en`),
      {
        kind: 'forward',
        query: `${LOGIN}&oait=forms_token&lang=en`,
        clientIp: IP,
      }
    );
  });

  it('promotes the access token to a cookie', () => {
    assert.deepEqual(
      evaluate(`${LOGIN}&oait=forms_token++${encodedToken}++access_token_123`),
      {
        kind: 'forward',
        query: `${LOGIN}&oait=forms_token`,
        clientIp: IP,
        cookie: { name: 'CF_Authorization', value: 'access_token_123' },
      }
    );
  });

  it('resolves the IP from forwarded-for when the edge header is absent', () => {
    const decision = evaluate(`${LOGIN}&oait=forms_token++${encodedToken}`, {
      'x-forwarded-for': `${IP}, 10.0.0.1`,
    });
    assert.equal(decision.kind, 'forward');
  });

  it('accepts a signature beginning with "+" when encoded', () => {
    const ts = findTimestamp(IP, (sig) => sig.startsWith('+'));
    const token = encodeURIComponent(cloudflareToken(IP, ts));
    const decision = evaluate(`${LOGIN}&oait=forms_token++${token}++access`);
    assert.equal(decision.kind, 'forward');
  });

  it('distinguishes an unencoded "++" in the signature from its encoded form', () => {
    const ts = findTimestamp(IP, (sig) => sig.includes('++'));
    const raw = cloudflareToken(IP, ts);
    assert.throws(() => evaluate(`${LOGIN}&oait=forms_token++${raw}`), MalformedTokenError);

    const decision = evaluate(
      `${LOGIN}&oait=forms_token++${encodeURIComponent(raw)}`
    );
    assert.equal(decision.kind, 'forward');
  });

  it('rejects duplicate token parameters', () => {
    assert.throws(
      () =>
        evaluate(
          `${LOGIN}&oait=forms_token++${encodedToken}&oait=other`
        ),
      MalformedTokenError
    );
  });
});
