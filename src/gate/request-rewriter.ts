import type { CookieDirective, QueryPair } from './types.js';

const COOKIE_ATTRIBUTES = 'Path=/; HttpOnly; Secure; SameSite=Strict';

// RFC 6265 cookie-octet
const COOKIE_OCTETS = /^[\x21\x23-\x2B\x2D-\x3A\x3C-\x5B\x5D-\x7E]*$/;

/**
 * Replaces the token parameter's value with the raw forms segment. Every
 * other pair, including its original encoding and position, is untouched.
 */
export function rewriteQuery(
  pairs: readonly QueryPair[],
  tokenParam: string,
  rawFormsToken: string
): string {
  return pairs
    .map((pair) =>
      pair.key === tokenParam ? `${pair.rawKey}=${rawFormsToken}` : pair.raw
    )
    .join('&');
}

export function buildCookieDirective(
  accessToken: string | undefined,
  cookieName: string
): CookieDirective | undefined {
  if (!accessToken) return undefined;
  return { name: cookieName, value: accessToken };
}

export function serializeCookie(directive: CookieDirective): string {
  const value = COOKIE_OCTETS.test(directive.value)
    ? directive.value
    : encodeURIComponent(directive.value);
  return `${directive.name}=${value}; ${COOKIE_ATTRIBUTES}`;
}
