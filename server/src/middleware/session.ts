import type { RequestHandler, Response } from 'express';
import { SESSION_COOKIE } from 'xunlei-launcher-shared';
import type { AuthGate } from '../auth.js';
import { createSession, generateSessionId, isValidSessionId } from '../sessions.js';
import type { SessionStore } from '../sessions.js';

/** Parse cookies from cookie header string */
export function parseCookies(cookieHeader: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!cookieHeader) return cookies;

  for (const cookie of cookieHeader.split(';')) {
    const [name, ...rest] = cookie.split('=');
    if (name && rest.length > 0) {
      cookies[name.trim()] = rest.join('=').trim();
    }
  }
  return cookies;
}

/** Set XUNLEI_SID; a ttl of 0 means a browser-session cookie with no Max-Age */
export function issueSessionCookie(res: Response, id: string, ttlSeconds: number): void {
  res.cookie(SESSION_COOKIE, id, {
    path: '/',
    httpOnly: true,
    sameSite: 'lax',
    ...(ttlSeconds > 0 ? { maxAge: ttlSeconds * 1000 } : {}),
  });
}

export interface SessionMiddlewareOptions {
  store: SessionStore;
  auth: AuthGate;
  ttlSeconds: number;
}

/**
 * Resolve the XUNLEI_SID cookie to a session before routing.
 * A cookie the store no longer knows is evicted; a missing cookie gets a fresh id.
 * With authentication disabled every request carries a session.
 */
export function sessionMiddleware({ store, auth, ttlSeconds }: SessionMiddlewareOptions): RequestHandler {
  return (req, res, next) => {
    const cookieId = parseCookies(req.headers.cookie)[SESSION_COOKIE];
    const fromClient = cookieId !== undefined && isValidSessionId(cookieId);
    const id = fromClient && cookieId ? cookieId : generateSessionId();

    let data = fromClient ? store.get(id) ?? null : null;
    if (!data && !auth.enabled) data = createSession();

    if (data) {
      data.lastSeenAt = Date.now();
      store.put(id, data);
    } else if (fromClient) {
      store.remove(id);
    }

    req.panelSession = { id, fromClient, data };
    issueSessionCookie(res, id, ttlSeconds);
    next();
  };
}
