import { Buffer } from 'node:buffer';

import { SHA256_DIGEST_BYTES } from '../crypto.js';
import {
  MalformedTokenError,
  MissingParameterError,
} from '../errors/app-error.js';

import { findPairs } from './request-inspector.js';
import type {
  CloudflareToken,
  CompositeToken,
  QueryPair,
  SignatureEncoding,
} from './types.js';

export const TOKEN_DELIMITER = '++';

const TIMESTAMP_PATTERN = /^\d{1,12}(?:\.\d{1,3})?$/;
const BASE64_SIGNATURE_PATTERN = /^[A-Za-z0-9+/]{43}=$/;
const BASE64URL_SIGNATURE_PATTERN = /^[A-Za-z0-9_-]{43}=?$/;

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new MalformedTokenError('undecodable-segment');
  }
}

/**
 * Returns the raw value of the single token parameter.
 * Duplicates are refused: only one value can be validated and rewritten.
 */
export function extractTokenParameter(
  pairs: readonly QueryPair[],
  tokenParam: string
): string {
  const matches = findPairs(pairs, tokenParam);
  const [first] = matches;
  if (!first) throw new MissingParameterError(tokenParam);
  if (matches.length > 1) throw new MalformedTokenError('duplicate-parameter');
  return first.rawValue;
}

/**
 * Splits `formsToken++cloudflareToken[++accessToken]`.
 *
 * The split runs on the raw, still percent-encoded value; segments are
 * decoded afterwards. A `+` inside a signature therefore has to arrive as
 * `%2B`, which cannot be confused with the delimiter.
 */
export function parseCompositeToken(rawValue: string): CompositeToken {
  const segments = rawValue.split(TOKEN_DELIMITER);
  if (segments.length < 2 || segments.length > 3) {
    throw new MalformedTokenError('segment-count');
  }

  const [rawForms = '', rawCloudflare = '', rawAccess = ''] = segments;
  const formsToken = decodeSegment(rawForms);
  const cloudflareToken = decodeSegment(rawCloudflare);
  const accessToken = decodeSegment(rawAccess);

  if (formsToken.length === 0) throw new MalformedTokenError('empty-forms-token');
  if (cloudflareToken.length === 0) {
    throw new MalformedTokenError('empty-cloudflare-token');
  }

  parseCloudflareToken(cloudflareToken);

  return {
    formsToken,
    rawFormsToken: rawForms,
    cloudflareToken,
    ...(accessToken.length > 0 && { accessToken }),
  };
}

function detectSignatureEncoding(text: string): SignatureEncoding | null {
  if (BASE64_SIGNATURE_PATTERN.test(text)) return 'base64';
  if (BASE64URL_SIGNATURE_PATTERN.test(text)) return 'base64url';
  return null;
}

function decodeSignature(text: string, encoding: SignatureEncoding): Buffer {
  const bytes = Buffer.from(text, encoding);
  if (bytes.byteLength !== SHA256_DIGEST_BYTES) {
    throw new MalformedTokenError('signature-length');
  }

  // Reject encodings with non-zero trailing bits: one digest, one spelling.
  const canonical = bytes.toString(encoding);
  const expected = encoding === 'base64url' ? text.replace(/=$/, '') : text;
  if (canonical !== expected) {
    throw new MalformedTokenError('signature-not-canonical');
  }
  return bytes;
}

/**
 * Parses `timestamp-signature`. The timestamp never contains `-`, so the
 * first `-` separates the parts; this also admits URL-safe signatures.
 */
export function parseCloudflareToken(value: string): CloudflareToken {
  const separator = value.indexOf('-');
  if (separator <= 0) throw new MalformedTokenError('missing-separator');

  const timestampText = value.slice(0, separator);
  const signatureText = value.slice(separator + 1);

  if (!TIMESTAMP_PATTERN.test(timestampText)) {
    throw new MalformedTokenError('timestamp-format');
  }
  const timestamp = Number(timestampText);
  if (!Number.isFinite(timestamp)) {
    throw new MalformedTokenError('timestamp-format');
  }

  const encoding = detectSignatureEncoding(signatureText);
  if (!encoding) throw new MalformedTokenError('signature-format');

  return {
    timestamp,
    timestampText,
    signature: decodeSignature(signatureText, encoding),
  };
}
