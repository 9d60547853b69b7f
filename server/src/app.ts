import express from 'express';
import type { ErrorRequestHandler, Express, RequestHandler } from 'express';
import compression from 'compression';
import type { AuthGate } from './auth.js';
import { GatewayError, errorMessage } from './errors.js';
import { sessionMiddleware } from './middleware/session.js';
import { createLoginRouter, requireSession } from './routes/login.js';
import { createWebUiRouter } from './routes/webui.js';
import type { Gateway } from './routes/webui.js';
import type { SessionStore } from './sessions.js';

export interface PanelAppOptions {
  store: SessionStore;
  auth: AuthGate;
  gateway: Gateway;
  sessionTtlSeconds: number;
  loginRateLimit?: number;
  /** One line per request on stdout (default on) */
  accessLog?: boolean;
}

const accessLog: RequestHandler = (req, res, next) => {
  const started = Date.now();
  res.on('finish', () => {
    const remote = req.socket.remoteAddress ?? '-';
    console.log(`[http] ${remote} ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
  });
  next();
};

/** Request failures become a plaintext response carrying the error message */
const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = err instanceof GatewayError ? err.status : 500;
  console.error(`[http] ${req.method} ${req.originalUrl} failed:`, errorMessage(err));
  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.status(status).type('text/plain').send(`An error occurred: ${errorMessage(err)}`);
};

/**
 * Panel routing: session lookup → POST /login → unauthenticated login surface →
 * authenticated web UI (CGI gateway).
 */
export function createPanelApp(options: PanelAppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  if (options.accessLog !== false) app.use(accessLog);
  app.use(compression());
  app.use(sessionMiddleware({
    store: options.store,
    auth: options.auth,
    ttlSeconds: options.sessionTtlSeconds,
  }));

  app.use(createLoginRouter({
    store: options.store,
    auth: options.auth,
    ttlSeconds: options.sessionTtlSeconds,
    rateLimit: options.loginRateLimit,
  }));
  app.use(requireSession);
  app.use(createWebUiRouter(options.gateway));

  app.use(errorHandler);
  return app;
}
