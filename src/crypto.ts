import { Buffer } from 'node:buffer';
import { createHmac, timingSafeEqual } from 'node:crypto';

export const SHA256_DIGEST_BYTES = 32;

function padBuffer(buffer: Uint8Array, length: number): Buffer {
  const padded = Buffer.alloc(length);
  padded.set(buffer);
  return padded;
}

/**
 * Fixed-time comparison over the full length of both inputs.
 * A length mismatch still walks `max(a, b)` bytes before reporting false.
 */
export function timingSafeEqualBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength === b.byteLength) {
    return timingSafeEqual(a, b);
  }

  const maxLength = Math.max(a.byteLength, b.byteLength);
  const paddedA = padBuffer(a, maxLength);
  const paddedB = padBuffer(b, maxLength);

  return timingSafeEqual(paddedA, paddedB) && a.byteLength === b.byteLength;
}

export function hmacSha256(
  key: string | Uint8Array,
  input: string | Uint8Array
): Buffer {
  return createHmac('sha256', key).update(input).digest();
}
