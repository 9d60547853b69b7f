import express, { Router } from 'express';
import type { RequestHandler } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { AuthGate } from '../auth.js';
import { renderLoginPage, sha3BrowserScript } from '../assets.js';
import { issueSessionCookie } from '../middleware/session.js';
import { createSession, generateSessionId } from '../sessions.js';
import type { SessionStore } from '../sessions.js';

export interface LoginRouterOptions {
  store: SessionStore;
  auth: AuthGate;
  ttlSeconds: number;
  /** Attempts per minute per client, 0 = unlimited */
  rateLimit?: number;
}

const WRONG_CREDENTIALS = 'Wrong login/password';

function formField(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : undefined;
}

export function createLoginRouter({ store, auth, ttlSeconds, rateLimit: limit = 0 }: LoginRouterOptions): Router {
  const router = Router();

  // Login surface only; the proxied web UI sets its own headers
  const security = helmet({ contentSecurityPolicy: false });

  const loginHandlers: RequestHandler[] = [security, express.urlencoded({ extended: false, limit: '4kb' })];
  if (limit > 0) {
    loginHandlers.unshift(rateLimit({
      windowMs: 60 * 1000,
      max: limit,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many login attempts' },
    }));
  }

  // Checked before the session: a logged-in browser may log in again
  router.post('/login', ...loginHandlers, (req, res) => {
    const session = req.panelSession;
    const user = formField(req.body, 'auth_user');
    const password = formField(req.body, 'auth_password');
    if (!session || user === undefined || password === undefined) {
      res.status(400).json({ error: 'Invalid login form' });
      return;
    }

    if (!auth.decide(user, password)) {
      console.warn(`[login] Failed login from ${req.socket.remoteAddress ?? 'unknown'}`);
      res.status(200).type('html').send(renderLoginPage(WRONG_CREDENTIALS));
      return;
    }

    // a successful login never keeps the id the browser arrived with
    const data = session.data ?? createSession();
    const id = generateSessionId();
    store.remove(session.id);
    store.put(id, data);
    req.panelSession = { id, fromClient: false, data };
    res.removeHeader('Set-Cookie');
    issueSessionCookie(res, id, ttlSeconds);
    res.redirect(303, '/');
  });

  router.get('/login', security, (req, res, next) => {
    if (req.panelSession?.data) return next();
    res.type('html').send(renderLoginPage());
  });

  router.get('/js/sha3.min.js', security, (req, res, next) => {
    if (req.panelSession?.data) return next();
    res.type('application/javascript').send(sha3BrowserScript());
  });

  return router;
}

/** Everything past this point needs a session */
export const requireSession: RequestHandler = (req, res, next) => {
  if (req.panelSession?.data) return next();
  res.redirect(303, '/login');
};
