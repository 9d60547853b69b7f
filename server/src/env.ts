import {
  DSM_VERSION_BUILD,
  DSM_VERSION_MAJOR,
  DSM_VERSION_MINOR,
  ENV_FILE,
  INST_LOG,
  LAUNCH_LOG_FILE,
  LAUNCH_PID_FILE,
  LOG_FILE,
  PID_FILE,
  PKG_DEST,
  PKG_NAME,
  SOCK_FILE,
} from 'xunlei-launcher-shared';
import type { BackendEnvironment, LauncherConfig } from 'xunlei-launcher-shared';

type EnvPaths = Pick<LauncherConfig, 'configPath' | 'mountBindDownloadPath'>;

/** Build the daemon's integration environment. Computed once at startup and shared with every CGI call. */
export function buildBackendEnvironment(config: EnvPaths, inheritedPath: string | undefined): BackendEnvironment {
  const env: BackendEnvironment = {
    DriveListen: SOCK_FILE,
    OS_VERSION: `dsm ${DSM_VERSION_MAJOR}.${DSM_VERSION_MINOR}-${DSM_VERSION_BUILD}`,
    HOME: config.configPath,
    ConfigPath: config.configPath,
    // the daemon only ever sees the bind target, never the real download dir
    DownloadPATH: config.mountBindDownloadPath,
    SYNOPKG_DSM_VERSION_MAJOR: DSM_VERSION_MAJOR,
    SYNOPKG_DSM_VERSION_MINOR: DSM_VERSION_MINOR,
    SYNOPKG_DSM_VERSION_BUILD: DSM_VERSION_BUILD,
    SYNOPKG_PKGDEST: PKG_DEST,
    SYNOPKG_PKGNAME: PKG_NAME,
    SVC_CWD: PKG_DEST,
    PID_FILE,
    ENV_FILE,
    LOG_FILE,
    LAUNCH_LOG_FILE,
    LAUNCH_PID_FILE,
    INST_LOG,
    GIN_MODE: 'release',
  };
  if (inheritedPath) env.PATH = inheritedPath;
  return env;
}

/** Flatten to the plain map child_process expects */
export function toEnvRecord(env: BackendEnvironment): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string') record[key] = value;
  }
  return record;
}
