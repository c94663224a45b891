/**
 * Session cookie for browsers coming through the callback URL.
 *
 * The value is `<sessionId>.<signature>`, an HMAC of the session id, so a
 * browser cannot claim a session it was never sent to.
 */

import { createHmac } from 'node:crypto';
import { safeCompare } from './security.js';

export interface SessionCookieOptions {
  name: string;
  secret: string;
  secure?: boolean;
}

function sign(sessionId: string, secret: string): string {
  return createHmac('sha256', secret).update(sessionId).digest('base64url');
}

export function signSessionId(sessionId: string, secret: string): string {
  return `${sessionId}.${sign(sessionId, secret)}`;
}

/** The session id of a signed value, or null when the signature does not match. */
export function verifySessionId(value: string, secret: string): string | null {
  const separator = value.lastIndexOf('.');
  if (separator <= 0) return null;

  const sessionId = value.slice(0, separator);
  const signature = value.slice(separator + 1);
  return safeCompare(signature, sign(sessionId, secret)) ? sessionId : null;
}

/** Raw cookie values. Nothing is URL-decoded: the session cookie is base64url and never needs it. */
export function parseCookies(cookieHeader: string | undefined): Record<string, string> {
  if (!cookieHeader) return {};
  const cookies: Record<string, string> = {};
  for (const pair of cookieHeader.split(';')) {
    const [name, ...rest] = pair.trim().split('=');
    if (name) {
      cookies[name.trim()] = rest.join('=').trim();
    }
  }
  return cookies;
}

export function readSessionCookie(cookieHeader: string | undefined, options: SessionCookieOptions): string | null {
  const value = parseCookies(cookieHeader)[options.name];
  if (!value) return null;
  return verifySessionId(value, options.secret);
}

/** `Set-Cookie` value binding the browser to a session. */
export function serializeSessionCookie(sessionId: string, options: SessionCookieOptions): string {
  const parts = [
    `${options.name}=${signSessionId(sessionId, options.secret)}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Lax',
  ];

  if (options.secure) {
    parts.push('Secure');
  }

  return parts.join('; ');
}
