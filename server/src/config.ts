import { isIP } from 'net';
import {
  DEFAULT_BIND_DOWNLOAD_PATH,
  DEFAULT_CONFIG_PATH,
  DEFAULT_DOWNLOAD_PATH,
  DEFAULT_SESSION_TTL_SECONDS,
  WEB_UI_HOME,
} from 'xunlei-launcher-shared';
import type { LauncherConfig } from 'xunlei-launcher-shared';
import { ConfigError } from './errors.js';

const PORT_MIN = 1024;
const PORT_MAX = 65535;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseCount(name: string, value: string | undefined, fallback: number): number {
  if (!nonEmpty(value)) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name}: \`${value}\` isn't a non-negative integer`);
  }
  return parsed;
}

function parseId(name: string, value: string | undefined, fallback: () => number): number {
  return nonEmpty(value) ? parseCount(name, value, 0) : fallback();
}

function parsePort(value: string | undefined): number {
  if (!nonEmpty(value)) return 5055;
  const port = Number(value);
  if (!Number.isInteger(port)) {
    throw new ConfigError(`\`${value}\` isn't a port number`);
  }
  if (port < PORT_MIN || port > PORT_MAX) {
    throw new ConfigError(`Port not in range ${PORT_MIN}-${PORT_MAX}`);
  }
  return port;
}

function parseHost(value: string | undefined): string {
  const host = nonEmpty(value) ?? '0.0.0.0';
  if (isIP(host) === 0) {
    throw new ConfigError(`\`${host}\` isn't a ip address`);
  }
  return host;
}

function currentUid(): number {
  return process.getuid ? process.getuid() : 0;
}

function currentGid(): number {
  return process.getgid ? process.getgid() : 0;
}

/** Resolve launcher configuration from the environment (dotenv is loaded by the entry point) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LauncherConfig {
  return {
    authUser: nonEmpty(env.XUNLEI_AUTH_USER),
    authPassword: nonEmpty(env.XUNLEI_AUTH_PASSWORD),
    host: parseHost(env.XUNLEI_HOST),
    port: parsePort(env.XUNLEI_PORT),
    uid: parseId('XUNLEI_UID', env.XUNLEI_UID, currentUid),
    gid: parseId('XUNLEI_GID', env.XUNLEI_GID, currentGid),
    debug: parseFlag(env.XUNLEI_DEBUG),
    configPath: nonEmpty(env.XUNLEI_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH,
    downloadPath: nonEmpty(env.XUNLEI_DOWNLOAD_PATH) ?? DEFAULT_DOWNLOAD_PATH,
    mountBindDownloadPath: nonEmpty(env.XUNLEI_MOUNT_BIND_DOWNLOAD_PATH) ?? DEFAULT_BIND_DOWNLOAD_PATH,
    webUiHome: nonEmpty(env.XUNLEI_WEB_UI_HOME) ?? WEB_UI_HOME,
    sessionTtlSeconds: parseCount('XUNLEI_SESSION_TTL', env.XUNLEI_SESSION_TTL, DEFAULT_SESSION_TTL_SECONDS),
    maxConnections: parseCount('XUNLEI_MAX_CONNECTIONS', env.XUNLEI_MAX_CONNECTIONS, 0),
    cgiTimeoutMs: parseCount('XUNLEI_CGI_TIMEOUT', env.XUNLEI_CGI_TIMEOUT, 0),
    loginRateLimit: parseCount('XUNLEI_LOGIN_RATE_LIMIT', env.XUNLEI_LOGIN_RATE_LIMIT, 0),
  };
}

/** Config summary for the startup banner, secrets masked */
export function describeConfig(config: LauncherConfig): Record<string, string | number | boolean> {
  return {
    listen: `${config.host}:${config.port}`,
    auth: config.authUser && config.authPassword ? 'Login required' : 'No authentication',
    uid: config.uid,
    gid: config.gid,
    debug: config.debug,
    configPath: config.configPath,
    downloadPath: config.downloadPath,
    mountBindDownloadPath: config.mountBindDownloadPath,
    webUiHome: config.webUiHome,
  };
}
