import { Router } from 'express';
import type { CgiGateway } from '../cgi.js';

/** `{"SynoToken":""}`: the web UI probes this before its first real call */
const LOGIN_CGI_RESPONSE = JSON.stringify({ SynoToken: '' });

export type Gateway = Pick<CgiGateway, 'proxy'>;

export function createWebUiRouter(gateway: Gateway): Router {
  const router = Router();

  router.get('/webman/login.cgi', (_req, res) => {
    res.status(200).type('application/json; charset=utf-8').send(LOGIN_CGI_RESPONSE);
  });

  router.use((req, res, next) => {
    gateway.proxy(req, res).catch(next);
  });

  return router;
}
