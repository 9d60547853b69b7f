import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import type { IncomingHttpHeaders } from 'http';
import type { Readable, Writable } from 'stream';
import type { Request, Response } from 'express';
import { GatewayError, errorMessage } from './errors.js';
import { debug } from './log.js';

/** Headers never forwarded into the CGI environment (httpoxy) */
const DENIED_HEADERS = new Set(['PROXY']);

export interface CgiHead {
  status: number;
  headers: Array<[string, string]>;
}

/** Request metadata the CGI environment is derived from */
export interface CgiRequest {
  method: string;
  /** Raw request target, path plus query, as received */
  url: string;
  headers: IncomingHttpHeaders;
  remoteAddress?: string;
}

/** The subset of ChildProcess the gateway relies on */
export interface CgiProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type CgiSpawnFn = (command: string, args: string[], options: SpawnOptions) => CgiProcess;

export interface CgiGatewayOptions {
  executable: string;
  cwd: string;
  uid: number;
  gid: number;
  debug: boolean;
  /** Port the panel listens on, reported as SERVER_PORT */
  port: number;
  /** Only URLs containing this path are proxied; everything else is redirected to it */
  webUiHome: string;
  /** Base environment shared with the backend daemon */
  env: Record<string, string>;
  /** Kill a CGI child still running after this long, 0 = never */
  timeoutMs?: number;
  spawn?: CgiSpawnFn;
}

function splitUrl(url: string): { path: string; query: string } {
  const q = url.indexOf('?');
  return q === -1 ? { path: url, query: '' } : { path: url.slice(0, q), query: url.slice(q + 1) };
}

function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

function headerValue(value: string | string[] | undefined): string {
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(', ') : value;
}

/** CGI/1.1 meta-variables for one request, layered over the shared base environment */
export function buildCgiEnv(
  req: CgiRequest,
  base: Record<string, string>,
  port: number,
): Record<string, string> {
  const { path, query } = splitUrl(req.url);
  const decodedPath = decodePath(path);
  const remote = req.remoteAddress ?? '';

  const env: Record<string, string> = {
    ...base,
    SERVER_SOFTWARE: 'node',
    SERVER_PROTOCOL: 'HTTP/1.1',
    // replaced by the Host header below when the client sent one
    HTTP_HOST: remote,
    GATEWAY_INTERFACE: 'CGI/1.1',
    REQUEST_METHOD: req.method,
    QUERY_STRING: query,
    REQUEST_URI: req.url,
    PATH_INFO: decodedPath,
    SCRIPT_NAME: '.',
    SCRIPT_FILENAME: decodedPath,
    SERVER_PORT: String(port),
    REMOTE_ADDR: remote,
    SERVER_NAME: remote,
  };

  for (const [name, raw] of Object.entries(req.headers)) {
    const key = name.toUpperCase();
    if (DENIED_HEADERS.has(key)) continue;
    const value = headerValue(raw);
    if (value) env[`HTTP_${key}`] = value;
  }

  const contentType = headerValue(req.headers['content-type']);
  if (contentType) env.CONTENT_TYPE = contentType;
  const contentLength = headerValue(req.headers['content-length']);
  if (contentLength) env.CONTENT_LENGTH = contentLength;

  return env;
}

/** Parse the CGI header block (without its terminating blank line) */
export function parseCgiHeaderLines(lines: string[]): CgiHead {
  let status = 200;
  const headers: Array<[string, string]> = [];

  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new GatewayError(`Malformed CGI header line: ${JSON.stringify(line)}`, 502);
    }
    const name = line.slice(0, colon);
    const rawValue = line.slice(colon + 1);
    const value = rawValue.startsWith(' ') ? rawValue.slice(1) : rawValue;

    if (name.toLowerCase() === 'status') {
      const code = value.slice(0, 3);
      if (!/^\d{3}$/.test(code) || Number(code) < 100) {
        throw new GatewayError(`Status returned by CGI program is invalid: ${JSON.stringify(value)}`, 400);
      }
      status = Number(code);
    } else {
      headers.push([name, value]);
    }
  }

  return { status, headers };
}

/**
 * Incremental splitter for CGI stdout: collects header lines (LF or CRLF)
 * until the first blank line and hands back the bytes after it.
 */
export class CgiHeadParser {
  private pending: Buffer = Buffer.alloc(0);
  private lines: string[] = [];
  private done = false;

  /** Feed stdout bytes; returns the leftover body bytes once the blank line was seen */
  push(chunk: Buffer): Buffer | null {
    if (this.done) return chunk;
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

    let newline = this.pending.indexOf(0x0a);
    while (newline !== -1) {
      let line = this.pending.subarray(0, newline).toString('utf-8');
      this.pending = this.pending.subarray(newline + 1);
      if (line.endsWith('\r')) line = line.slice(0, -1);
      if (line === '') {
        this.done = true;
        return this.pending;
      }
      this.lines.push(line);
      newline = this.pending.indexOf(0x0a);
    }
    return null;
  }

  /** stdout ended before a blank line: a trailing partial line still counts as a header */
  finish(): void {
    if (this.done) return;
    this.done = true;
    let line = this.pending.toString('utf-8');
    this.pending = Buffer.alloc(0);
    if (line.endsWith('\r')) line = line.slice(0, -1);
    if (line) this.lines.push(line);
  }

  head(): CgiHead {
    return parseCgiHeaderLines(this.lines);
  }
}

export interface CgiOutput {
  head: CgiHead;
  /** The rest of stdout, paused, positioned at the first body byte */
  body: Readable;
  /** stdout already ended while the head was read; the body is empty */
  ended: boolean;
}

/** Read the head off CGI stdout without consuming any of the body */
export function readCgiHead(stdout: Readable): Promise<CgiOutput> {
  return new Promise((resolve, reject) => {
    const parser = new CgiHeadParser();

    const settle = (ended: boolean) => {
      try {
        resolve({ head: parser.head(), body: stdout, ended });
      } catch (err) {
        reject(err);
      }
    };
    const cleanup = () => {
      stdout.off('data', onData);
      stdout.off('end', onEnd);
      stdout.off('error', onError);
    };
    const onData = (chunk: Buffer | string) => {
      const rest = parser.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      if (rest === null) return;
      cleanup();
      stdout.pause();
      if (rest.length > 0) stdout.unshift(rest);
      settle(false);
    };
    const onEnd = () => {
      cleanup();
      parser.finish();
      settle(true);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new GatewayError(`Failed to read CGI stdout: ${err.message}`, 502, { cause: err }));
    };

    stdout.on('data', onData);
    stdout.once('end', onEnd);
    stdout.once('error', onError);
  });
}

/**
 * Runs the web UI CGI executable once per request: request metadata goes in through
 * the environment, the body through stdin; stdout is parsed into status, headers and
 * a streamed body.
 */
export class CgiGateway {
  private readonly spawnFn: CgiSpawnFn;

  constructor(private readonly options: CgiGatewayOptions) {
    this.spawnFn = options.spawn ?? spawn;
  }

  async proxy(req: Request, res: Response): Promise<void> {
    const { webUiHome } = this.options;
    if (!req.originalUrl.includes(webUiHome)) {
      res.redirect(307, webUiHome);
      return;
    }

    const env = buildCgiEnv(
      {
        method: req.method,
        url: req.originalUrl,
        headers: req.headers,
        remoteAddress: req.socket.remoteAddress,
      },
      this.options.env,
      this.options.port,
    );
    debug(`[cgi] ${req.method} ${req.originalUrl}`);

    const child = this.start(env);
    const { stdin, stdout } = child;
    if (!stdin || !stdout) {
      child.kill('SIGKILL');
      throw new GatewayError('CGI process has no stdin/stdout', 502);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const failed = new Promise<never>((_resolve, reject) => {
      child.once('error', (err) => {
        reject(new GatewayError(`Failed to run CGI: ${err.message}`, 502, { cause: err }));
      });
      stdin.once('error', (err) => {
        reject(new GatewayError(`Failed to write CGI stdin: ${err.message}`, 502, { cause: err }));
      });
      const timeoutMs = this.options.timeoutMs ?? 0;
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          if (child.exitCode !== null) return;
          console.warn(`[cgi] ${req.method} ${req.originalUrl} still running after ${timeoutMs}ms, killing it`);
          child.kill('SIGKILL');
          reject(new GatewayError(`CGI timed out after ${timeoutMs}ms`, 504));
        }, timeoutMs);
      }
    });
    // late failures (after the head was sent) only end the stream
    failed.catch((err: unknown) => debug('[cgi]', errorMessage(err)));
    child.once('close', (code, signal) => {
      clearTimeout(timer);
      debug(`[cgi] ${req.originalUrl} exited with ${signal ?? code}`);
    });

    res.on('close', () => {
      if (!res.writableFinished && child.exitCode === null) {
        debug(`[cgi] Client went away, killing CGI for ${req.originalUrl}`);
        child.kill('SIGKILL');
      }
    });

    req.pipe(stdin);

    let output: CgiOutput;
    try {
      output = await Promise.race([readCgiHead(stdout), failed]);
    } catch (err) {
      if (child.exitCode === null) child.kill('SIGKILL');
      throw err;
    }
    if (res.destroyed) return;

    res.status(output.head.status);
    for (const [name, value] of output.head.headers) {
      res.appendHeader(name, value);
    }
    if (output.ended) {
      res.end();
      return;
    }
    output.body.once('error', (err) => {
      console.error(`[cgi] Body stream failed for ${req.originalUrl}:`, err.message);
      res.destroy(err);
    });
    output.body.pipe(res);
  }

  private start(env: Record<string, string>): CgiProcess {
    try {
      return this.spawnFn(this.options.executable, [], {
        cwd: this.options.cwd,
        env,
        uid: this.options.uid,
        gid: this.options.gid,
        stdio: ['pipe', 'pipe', this.options.debug ? 'inherit' : 'ignore'],
      });
    } catch (err) {
      throw new GatewayError(`Failed to spawn CGI: ${errorMessage(err)}`, 502, { cause: err });
    }
  }
}
