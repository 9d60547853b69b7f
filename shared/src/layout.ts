/**
 * Fixed package layout the backend daemon is built against.
 * The daemon ships as a DSM package and resolves every path below at compile time,
 * so these are not configurable.
 */

export const PKG_NAME = 'pan-xunlei-com';
export const PKG_BASE = `/var/packages/${PKG_NAME}`;
export const PKG_DEST = `${PKG_BASE}/target`;
export const PKG_VAR = `${PKG_DEST}/var`;

export const DSM_VERSION_MAJOR = '7';
export const DSM_VERSION_MINOR = '0';
export const DSM_VERSION_BUILD = '1';

/** Backend launcher executable, spawned by the supervisor */
export const LAUNCHER_EXE = `${PKG_DEST}/xunlei-pan-cli-launcher`;
/** Web UI CGI executable, spawned once per proxied request */
export const CGI_EXE = `${PKG_DEST}/ui/index.cgi`;

export const LAUNCHER_SOCK = `unix://${PKG_VAR}/${PKG_NAME}-launcher.sock`;
export const SOCK_FILE = `unix://${PKG_VAR}/${PKG_NAME}.sock`;
export const PID_FILE = `${PKG_VAR}/${PKG_NAME}.pid`;
export const ENV_FILE = `${PKG_VAR}/${PKG_NAME}.env`;
export const LOG_FILE = `${PKG_VAR}/${PKG_NAME}.log`;
export const LAUNCH_PID_FILE = `${PKG_VAR}/${PKG_NAME}-launcher.pid`;
export const LAUNCH_LOG_FILE = `${PKG_VAR}/${PKG_NAME}-launcher.log`;
export const INST_LOG = `${PKG_VAR}/${PKG_NAME}-install.log`;

/** Path prefix the daemon's web UI lives under */
export const WEB_UI_HOME = `/webman/3rdparty/${PKG_NAME}/index.cgi`;

export const DEFAULT_CONFIG_PATH = '/opt/xunlei';
export const DEFAULT_DOWNLOAD_PATH = '/opt/xunlei/downloads';
export const DEFAULT_BIND_DOWNLOAD_PATH = '/xunlei';

export const SESSION_COOKIE = 'XUNLEI_SID';
export const DEFAULT_SESSION_TTL_SECONDS = 3600;
