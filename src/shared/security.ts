import { timingSafeEqual } from 'node:crypto';

/**
 * Constant-time string comparison to prevent timing attacks.
 * Returns true if a === b, using crypto.timingSafeEqual internally.
 */
export function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    // Still perform a comparison to avoid leaking length info via timing
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
}

export interface BasicCredentials {
  username: string;
  password: string;
}

/** Decode an `Authorization: Basic ...` header. Returns null when absent or malformed. */
export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith('Basic ')) return null;

  const decoded = Buffer.from(header.slice(6).trim(), 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}
