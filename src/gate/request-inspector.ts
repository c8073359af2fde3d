import type { QueryPair } from './types.js';

function decodeFormComponent(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return value;
  }
}

function toQueryPair(raw: string): QueryPair {
  const separator = raw.indexOf('=');
  const rawKey = separator === -1 ? raw : raw.slice(0, separator);
  const rawValue = separator === -1 ? '' : raw.slice(separator + 1);

  return {
    raw,
    rawKey,
    rawValue,
    key: decodeFormComponent(rawKey),
    value: decodeFormComponent(rawValue),
  };
}

/**
 * Splits a raw query string (without the leading `?`) into its pairs.
 * Empty entries such as the middle of `a=1&&b=2` are kept so the query can
 * be re-joined verbatim.
 */
export function parseRawQuery(rawQuery: string): QueryPair[] {
  if (rawQuery.length === 0) return [];
  return rawQuery.split('&').map(toQueryPair);
}

export function splitRequestTarget(target: string): {
  path: string;
  rawQuery: string;
} {
  const index = target.indexOf('?');
  if (index === -1) return { path: target, rawQuery: '' };
  return { path: target.slice(0, index), rawQuery: target.slice(index + 1) };
}

export function findPairs(
  pairs: readonly QueryPair[],
  key: string
): QueryPair[] {
  return pairs.filter((pair) => pair.key === key);
}

/**
 * True when any routing parameter carries the login sentinel. Checking every
 * occurrence keeps `function_id=OTHER&function_id=<sentinel>` from skipping
 * validation when the origin reads a later duplicate.
 */
export function isLoginFlowRequest(
  pairs: readonly QueryPair[],
  routingParam: string,
  loginFunctionId: string
): boolean {
  return findPairs(pairs, routingParam).some(
    (pair) => pair.value === loginFunctionId
  );
}
