import type { IncomingHttpHeaders } from 'node:http';

/** One `&`-separated entry of the query string. */
export interface QueryPair {
  /** Exact text between separators, forwarded byte for byte. */
  readonly raw: string;
  readonly rawKey: string;
  readonly rawValue: string;
  /** Form-decoded key. */
  readonly key: string;
  /** Form-decoded value. */
  readonly value: string;
}

export interface CompositeToken {
  readonly formsToken: string;
  /** Forms segment as it appeared in the URL, before percent-decoding. */
  readonly rawFormsToken: string;
  readonly cloudflareToken: string;
  readonly accessToken?: string;
}

export type SignatureEncoding = 'base64' | 'base64url';

export interface CloudflareToken {
  /** Seconds since the epoch. */
  readonly timestamp: number;
  /** Timestamp exactly as issued; part of the signed message. */
  readonly timestampText: string;
  readonly signature: Uint8Array;
}

export interface ValidationContext {
  readonly secret: Buffer;
  readonly validityWindowSeconds: number;
  readonly clockSkewSeconds: number;
}

export type ClientIdentity = string;

export interface CookieDirective {
  readonly name: string;
  readonly value: string;
}

export interface ClientIpHeaderNames {
  readonly clientIpHeader: string;
  readonly forwardedForHeader: string;
}

export interface GateRequest {
  readonly query: readonly QueryPair[];
  readonly headers: IncomingHttpHeaders;
}

export interface GateOptions extends ClientIpHeaderNames {
  readonly routingParam: string;
  readonly loginFunctionId: string;
  readonly tokenParam: string;
  readonly accessCookieName: string;
}

export type GateDecision =
  | { readonly kind: 'bypass' }
  | {
      readonly kind: 'forward';
      readonly query: string;
      readonly clientIp: ClientIdentity;
      readonly cookie?: CookieDirective;
    };
