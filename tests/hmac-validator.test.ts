import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  ConfigError,
  ExpiredTokenError,
  InvalidSignatureError,
  MalformedTokenError,
} from '../src/errors/app-error.js';
import {
  buildSignedMessage,
  createValidationContext,
  DEFAULT_VALIDITY_WINDOW_SECONDS,
  tryCreateValidationContext,
  validateCloudflareToken,
} from '../src/gate/hmac-validator.js';

import {
  cloudflareToken,
  NOW_MS,
  NOW_TEXT,
  signature,
  TEST_SECRET,
  timestampAt,
} from './helpers/tokens.js';

const IP = '203.0.113.7';
const context = createValidationContext({ secret: TEST_SECRET });

function assertExpired(fn: () => unknown, reason: string): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof ExpiredTokenError);
    assert.equal(error.statusCode, 403);
    assert.deepEqual(error.details, { reason });
    return true;
  });
}

describe('createValidationContext', () => {
  it('applies defaults', () => {
    assert.equal(context.validityWindowSeconds, DEFAULT_VALIDITY_WINDOW_SECONDS);
    assert.equal(context.clockSkewSeconds, 0);
    assert.equal(context.secret.toString('utf8'), TEST_SECRET);
    assert.ok(Object.isFrozen(context));
  });

  it('rejects a missing or empty secret', () => {
    for (const secret of [undefined, '']) {
      assert.throws(
        () => createValidationContext({ secret }),
        (error: unknown) =>
          error instanceof ConfigError &&
          error.statusCode === 400 &&
          error.details.reason === 'missing-secret'
      );
    }
  });

  it('rejects unusable durations', () => {
    assert.throws(
      () =>
        createValidationContext({ secret: TEST_SECRET, validityWindowSeconds: 0 }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.details.reason === 'invalid-validity-window'
    );
    assert.throws(
      () =>
        createValidationContext({ secret: TEST_SECRET, clockSkewSeconds: -1 }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.details.reason === 'invalid-clock-skew'
    );
  });
});

describe('tryCreateValidationContext', () => {
  it('wraps the outcome', () => {
    const ok = tryCreateValidationContext({ secret: TEST_SECRET });
    assert.equal(ok.ok, true);

    const failed = tryCreateValidationContext({});
    assert.equal(failed.ok, false);
    if (!failed.ok) assert.ok(failed.error instanceof ConfigError);
  });
});

describe('buildSignedMessage', () => {
  it('joins IP and timestamp with a colon', () => {
    assert.equal(buildSignedMessage('::1', '1700000000.000'), '::1:1700000000.000');
  });
});

describe('validateCloudflareToken', () => {
  it('accepts a fresh token for the bound IP', () => {
    const token = validateCloudflareToken(
      cloudflareToken(IP),
      IP,
      context,
      NOW_MS
    );
    assert.equal(token.timestampText, NOW_TEXT);
    assert.equal(token.timestamp, 1_700_000_000);
  });

  it('accepts a token exactly at the window edge', () => {
    const ts = timestampAt(-300);
    assert.doesNotThrow(() =>
      validateCloudflareToken(cloudflareToken(IP, ts), IP, context, NOW_MS)
    );
  });

  it('rejects a token just past the window', () => {
    const ts = timestampAt(-301);
    assertExpired(
      () => validateCloudflareToken(cloudflareToken(IP, ts), IP, context, NOW_MS),
      'expired'
    );
  });

  it('rejects a very old token', () => {
    assertExpired(
      () =>
        validateCloudflareToken(
          cloudflareToken(IP, '1000000000.000'),
          IP,
          context,
          NOW_MS
        ),
      'expired'
    );
  });

  it('rejects future-dated tokens without skew', () => {
    const ts = timestampAt(5);
    assertExpired(
      () => validateCloudflareToken(cloudflareToken(IP, ts), IP, context, NOW_MS),
      'future-dated'
    );
  });

  it('admits future-dated tokens within the configured skew', () => {
    const skewed = createValidationContext({
      secret: TEST_SECRET,
      clockSkewSeconds: 10,
    });
    const ts = timestampAt(5);
    assert.doesNotThrow(() =>
      validateCloudflareToken(cloudflareToken(IP, ts), IP, skewed, NOW_MS)
    );
  });

  it('binds the token to the client IP', () => {
    assert.throws(
      () =>
        validateCloudflareToken(cloudflareToken(IP), '198.51.100.1', context, NOW_MS),
      InvalidSignatureError
    );
  });

  it('rejects a signature made with another secret', () => {
    const forged = cloudflareToken(IP, NOW_TEXT, 'base64', 'other-secret');
    assert.throws(
      () => validateCloudflareToken(forged, IP, context, NOW_MS),
      InvalidSignatureError
    );
  });

  it('rejects a signature with one flipped byte', () => {
    const bytes = Buffer.from(signature(IP, NOW_TEXT), 'base64');
    bytes[0] = (bytes[0] ?? 0) ^ 0x01;
    const tampered = `${NOW_TEXT}-${bytes.toString('base64')}`;
    assert.throws(
      () => validateCloudflareToken(tampered, IP, context, NOW_MS),
      InvalidSignatureError
    );
  });

  it('signs the timestamp text as issued', () => {
    // Same instant, different spelling: the signature no longer matches.
    const sig = signature(IP, '1700000000');
    assert.throws(
      () => validateCloudflareToken(`${NOW_TEXT}-${sig}`, IP, context, NOW_MS),
      InvalidSignatureError
    );
    assert.doesNotThrow(() =>
      validateCloudflareToken(`1700000000-${sig}`, IP, context, NOW_MS)
    );
  });

  it('checks the signature before the time window', () => {
    const forged = cloudflareToken(IP, '1000000000.000', 'base64', 'other-secret');
    assert.throws(
      () => validateCloudflareToken(forged, IP, context, NOW_MS),
      InvalidSignatureError
    );
  });

  it('accepts URL-safe signatures', () => {
    assert.doesNotThrow(() =>
      validateCloudflareToken(
        cloudflareToken(IP, NOW_TEXT, 'base64url'),
        IP,
        context,
        NOW_MS
      )
    );
  });

  it('rejects malformed tokens before any HMAC work', () => {
    assert.throws(
      () => validateCloudflareToken('invalid-hmac-token', IP, context, NOW_MS),
      MalformedTokenError
    );
  });
});
