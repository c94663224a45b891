import { randomBytes } from 'node:crypto';

export const SESSION_TOKEN_BYTES = 32;
export const TASK_TOKEN_BYTES = 24;

/**
 * URL-safe random token over `[A-Za-z0-9_]`. `size` is the number of random
 * bytes, so 32 bytes give a 43-character token.
 */
export function createToken(size = SESSION_TOKEN_BYTES): string {
  return randomBytes(size).toString('base64url').replace(/-/g, '_');
}
