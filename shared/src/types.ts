// Launcher configuration, resolved once at startup

export interface LauncherConfig {
  /** Plain configured user name; hashed before it reaches the panel */
  authUser?: string;
  authPassword?: string;
  host: string;
  port: number;
  uid: number;
  gid: number;
  debug: boolean;
  configPath: string;
  downloadPath: string;
  mountBindDownloadPath: string;
  webUiHome: string;
  sessionTtlSeconds: number;
  /** 0 = unbounded */
  maxConnections: number;
  /** 0 = no timeout */
  cgiTimeoutMs: number;
  /** Login attempts per minute per client, 0 = no limit */
  loginRateLimit: number;
}

/**
 * Integration variables the backend daemon reads at startup.
 * One named field per variable so a typo fails the type-check instead of the daemon.
 */
export interface BackendEnvironment {
  DriveListen: string;
  OS_VERSION: string;
  HOME: string;
  ConfigPath: string;
  DownloadPATH: string;
  SYNOPKG_DSM_VERSION_MAJOR: string;
  SYNOPKG_DSM_VERSION_MINOR: string;
  SYNOPKG_DSM_VERSION_BUILD: string;
  SYNOPKG_PKGDEST: string;
  SYNOPKG_PKGNAME: string;
  SVC_CWD: string;
  PID_FILE: string;
  ENV_FILE: string;
  LOG_FILE: string;
  LAUNCH_LOG_FILE: string;
  LAUNCH_PID_FILE: string;
  INST_LOG: string;
  GIN_MODE: 'release' | 'debug';
  PATH?: string;
}

export type BackendState = 'running' | 'signaled-graceful' | 'signaled-forced' | 'exited';

export interface BackendProcessHandle {
  pid: number;
  state: BackendState;
}
