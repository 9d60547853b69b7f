import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Request, Response } from 'express';
import { SESSION_COOKIE } from 'xunlei-launcher-shared';
import { createPanelApp } from './app.js';
import { AuthGate, hashAuthMessage, resolveCredentials } from './auth.js';
import { GatewayError } from './errors.js';
import { parseCookies } from './middleware/session.js';
import { MemorySessionStore } from './sessions.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function setup(options: { auth?: boolean; loginRateLimit?: number; sessionTtlSeconds?: number } = {}) {
  const sessionTtlSeconds = options.sessionTtlSeconds ?? 3600;
  const store = new MemorySessionStore(sessionTtlSeconds * 1000);
  const credentials = options.auth === false ? null : resolveCredentials('admin', 'test-secret');
  const gateway = {
    proxy: vi.fn(async (req: Request, res: Response) => {
      res.status(200).type('text/plain').send(`proxied ${req.originalUrl}`);
    }),
  };
  const app = createPanelApp({
    store,
    auth: new AuthGate(credentials),
    gateway,
    sessionTtlSeconds,
    loginRateLimit: options.loginRateLimit,
    accessLog: false,
  });
  return { app, store, gateway };
}

function sessionIdFrom(res: request.Response): string {
  const cookies: unknown = res.headers['set-cookie'];
  const lines = Array.isArray(cookies) ? cookies.map(String) : [];
  for (const line of lines) {
    const match = new RegExp(`^${SESSION_COOKIE}=([a-f0-9]{64});`).exec(line);
    if (match?.[1]) return match[1];
  }
  throw new Error('response carries no session cookie');
}

const goodForm = {
  auth_user: hashAuthMessage('admin'),
  auth_password: hashAuthMessage('test-secret'),
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('parseCookies', () => {
  it('splits name=value pairs and keeps = inside values', () => {
    expect(parseCookies('a=1; XUNLEI_SID=abc; token=x=y')).toEqual({ a: '1', XUNLEI_SID: 'abc', token: 'x=y' });
  });

  it('returns nothing for a missing header', () => {
    expect(parseCookies(undefined)).toEqual({});
  });
});

describe('panel app', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('redirects an anonymous request to the login page', async () => {
    const { app, gateway } = setup();
    const res = await request(app).get('/');
    expect(res.status).toBe(303);
    expect(res.headers.location).toBe('/login');
    expect(gateway.proxy).not.toHaveBeenCalled();
  });

  it('always issues a session cookie', async () => {
    const { app } = setup();
    const res = await request(app).get('/');
    expect(sessionIdFrom(res)).toMatch(/^[a-f0-9]{64}$/);
    const cookie = String(res.headers['set-cookie']);
    expect(cookie).toContain('Path=/');
    expect(cookie).toContain('HttpOnly');
    expect(cookie).toContain('SameSite=Lax');
    expect(cookie).toContain('Max-Age=3600');
  });

  it('serves the login page without a session', async () => {
    const { app } = setup();
    const res = await request(app).get('/login');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(res.text).toContain('name="auth_password"');
    expect(res.text).toContain('<p class="error"></p>');
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('serves the hashing script without a session', async () => {
    const { app } = setup();
    const res = await request(app).get('/js/sha3.min.js');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('application/javascript; charset=utf-8');
    expect(res.text.length).toBeGreaterThan(0);
  });

  it('logs in with the right hashes and reaches the web UI with the cookie', async () => {
    const { app, store, gateway } = setup();
    const login = await request(app).post('/login').type('form').send(goodForm);
    expect(login.status).toBe(303);
    expect(login.headers.location).toBe('/');

    const sid = sessionIdFrom(login);
    expect(store.get(sid)).toBeDefined();

    const res = await request(app)
      .get('/webman/3rdparty/pan-xunlei-com/index.cgi/')
      .set('Cookie', `${SESSION_COOKIE}=${sid}`);
    expect(res.status).toBe(200);
    expect(res.text).toBe('proxied /webman/3rdparty/pan-xunlei-com/index.cgi/');
    expect(gateway.proxy).toHaveBeenCalledTimes(1);
    expect(sessionIdFrom(res)).toBe(sid);
  });

  it('issues a new id on login instead of the one the browser sent', async () => {
    const { app, store } = setup();
    const planted = 'a'.repeat(64);
    const login = await request(app)
      .post('/login')
      .set('Cookie', `${SESSION_COOKIE}=${planted}`)
      .type('form')
      .send(goodForm);
    expect(login.status).toBe(303);

    const cookies: unknown = login.headers['set-cookie'];
    expect(Array.isArray(cookies) ? cookies.length : 0).toBe(1);
    const sid = sessionIdFrom(login);
    expect(sid).not.toBe(planted);
    expect(store.get(planted)).toBeUndefined();
    expect(store.get(sid)).toBeDefined();
    expect(store.size).toBe(1);
  });

  it('drops the old session when a logged-in browser logs in again', async () => {
    const { app, store } = setup();
    const first = sessionIdFrom(await request(app).post('/login').type('form').send(goodForm));
    const second = sessionIdFrom(
      await request(app).post('/login').set('Cookie', `${SESSION_COOKIE}=${first}`).type('form').send(goodForm),
    );
    expect(second).not.toBe(first);
    expect(store.get(first)).toBeUndefined();
    expect(store.get(second)).toBeDefined();
  });

  it('issues a browser-session cookie when the ttl is 0', async () => {
    const { app, gateway } = setup({ sessionTtlSeconds: 0 });
    const login = await request(app).post('/login').type('form').send(goodForm);
    const sid = sessionIdFrom(login);
    expect(login.headers['set-cookie']).toEqual([`${SESSION_COOKIE}=${sid}; Path=/; HttpOnly; SameSite=Lax`]);

    const res = await request(app).get('/webman/').set('Cookie', `${SESSION_COOKIE}=${sid}`);
    expect(res.status).toBe(200);
    expect(gateway.proxy).toHaveBeenCalledTimes(1);
  });

  it('re-renders the login page on wrong credentials', async () => {
    const { app, store } = setup();
    const res = await request(app)
      .post('/login')
      .type('form')
      .send({ ...goodForm, auth_password: hashAuthMessage('nope') });
    expect(res.status).toBe(200);
    expect(res.text).toContain('<p class="error">Wrong login/password</p>');
    expect(store.size).toBe(0);
  });

  it('rejects plaintext credentials', async () => {
    const { app, store } = setup();
    const res = await request(app).post('/login').type('form').send({ auth_user: 'admin', auth_password: 'test-secret' });
    expect(res.status).toBe(200);
    expect(res.text).toContain('Wrong login/password');
    expect(store.size).toBe(0);
  });

  it('answers 400 to a form without both fields', async () => {
    const { app } = setup();
    const res = await request(app).post('/login').type('form').send({ auth_user: goodForm.auth_user });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid login form' });
  });

  it('evicts a cookie the store does not know', async () => {
    const { app, gateway } = setup();
    const stale = 'a'.repeat(64);
    const res = await request(app).get('/webman/').set('Cookie', `${SESSION_COOKIE}=${stale}`);
    expect(res.status).toBe(303);
    expect(res.headers.location).toBe('/login');
    expect(gateway.proxy).not.toHaveBeenCalled();
  });

  it('replaces a malformed cookie with a fresh id', async () => {
    const { app } = setup();
    const res = await request(app).get('/').set('Cookie', `${SESSION_COOKIE}=not-an-id`);
    expect(res.status).toBe(303);
    expect(sessionIdFrom(res)).not.toBe('not-an-id');
  });

  it('proxies every request when authentication is disabled', async () => {
    const { app, gateway, store } = setup({ auth: false });
    const res = await request(app).get('/webman/3rdparty/pan-xunlei-com/index.cgi/');
    expect(res.status).toBe(200);
    expect(gateway.proxy).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(1);
  });

  it('hands the login page to the gateway when already logged in', async () => {
    const { app, gateway } = setup({ auth: false });
    const res = await request(app).get('/login');
    expect(res.status).toBe(200);
    expect(res.text).toBe('proxied /login');
    expect(gateway.proxy).toHaveBeenCalledTimes(1);
  });

  it('redirects POST /login home when authentication is disabled', async () => {
    const { app } = setup({ auth: false });
    const res = await request(app).post('/login').type('form').send({ auth_user: 'x', auth_password: 'y' });
    expect(res.status).toBe(303);
    expect(res.headers.location).toBe('/');
  });

  it('answers the login.cgi probe without calling the gateway', async () => {
    const { app, gateway } = setup({ auth: false });
    const res = await request(app).get('/webman/login.cgi');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(res.text).toBe('{"SynoToken":""}');
    expect(gateway.proxy).not.toHaveBeenCalled();
  });

  it('turns a gateway failure into a plaintext error', async () => {
    const { app, gateway } = setup({ auth: false });
    gateway.proxy.mockRejectedValueOnce(new GatewayError('CGI timed out after 50ms', 504));
    const res = await request(app).get('/webman/');
    expect(res.status).toBe(504);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.text).toBe('An error occurred: CGI timed out after 50ms');
  });

  it('answers 500 to an unexpected failure', async () => {
    const { app, gateway } = setup({ auth: false });
    gateway.proxy.mockRejectedValueOnce(new Error('boom'));
    const res = await request(app).get('/webman/');
    expect(res.status).toBe(500);
    expect(res.text).toBe('An error occurred: boom');
  });

  it('limits login attempts when configured', async () => {
    const { app } = setup({ loginRateLimit: 2 });
    const wrong = { ...goodForm, auth_password: hashAuthMessage('nope') };
    await request(app).post('/login').type('form').send(wrong);
    await request(app).post('/login').type('form').send(wrong);
    const res = await request(app).post('/login').type('form').send(goodForm);
    expect(res.status).toBe(429);
    expect(res.body).toEqual({ error: 'Too many login attempts' });
  });
});
