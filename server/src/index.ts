import { createServer } from 'http';
import { config as loadDotenv } from 'dotenv';
import { CGI_EXE, PKG_DEST } from 'xunlei-launcher-shared';
import { createPanelApp } from './app.js';
import { AuthGate, resolveCredentials } from './auth.js';
import { BackendSupervisor } from './backend.js';
import { CgiGateway } from './cgi.js';
import { describeConfig, loadConfig } from './config.js';
import { buildBackendEnvironment, toEnvRecord } from './env.js';
import { setDebug } from './log.js';
import { SystemMountBinder } from './mount.js';
import { MemorySessionStore } from './sessions.js';

loadDotenv();

const SESSION_SWEEP_INTERVAL = 60 * 1000;

process.on('unhandledRejection', (reason) => {
  console.error('[FATAL] Unhandled promise rejection:', reason);
});

async function main() {
  const config = loadConfig();
  setDebug(config.debug);

  const backendEnv = buildBackendEnvironment(config, process.env.PATH);
  const store = new MemorySessionStore(config.sessionTtlSeconds * 1000);
  const auth = new AuthGate(resolveCredentials(config.authUser, config.authPassword));

  const gateway = new CgiGateway({
    executable: CGI_EXE,
    cwd: PKG_DEST,
    uid: config.uid,
    gid: config.gid,
    debug: config.debug,
    port: config.port,
    webUiHome: config.webUiHome,
    env: toEnvRecord(backendEnv),
    timeoutMs: config.cgiTimeoutMs,
  });

  const app = createPanelApp({
    store,
    auth,
    gateway,
    sessionTtlSeconds: config.sessionTtlSeconds,
    loginRateLimit: config.loginRateLimit,
  });

  const server = createServer(app);
  if (config.maxConnections > 0) server.maxConnections = config.maxConnections;
  server.on('error', (err) => {
    console.error('[panel] Server error:', err);
  });
  server.listen(config.port, config.host, () => {
    const summary = describeConfig(config);
    console.log('');
    console.log('='.repeat(50));
    console.log('  Xunlei Launcher');
    console.log('='.repeat(50));
    for (const [key, value] of Object.entries(summary)) {
      console.log(`  ${key.padEnd(22)} ${value}`);
    }
    console.log('='.repeat(50));
    console.log('');
  });

  const sweepTimer = setInterval(() => {
    const removed = store.sweep();
    if (removed > 0) console.log(`[sessions] Expired ${removed} idle sessions`);
  }, SESSION_SWEEP_INTERVAL);
  sweepTimer.unref();

  const supervisor = new BackendSupervisor(
    {
      downloadPath: config.downloadPath,
      mountBindDownloadPath: config.mountBindDownloadPath,
      uid: config.uid,
      gid: config.gid,
      debug: config.debug,
      env: backendEnv,
    },
    { binder: new SystemMountBinder() },
  );

  try {
    await supervisor.run();
  } finally {
    clearInterval(sweepTimer);
    server.close();
    server.closeAllConnections();
  }
  console.log('[launcher] All services have been complete');
}

main().then(
  () => process.exit(0),
  (err) => {
    console.error('[launcher] Fatal:', err instanceof Error ? err.message : err);
    process.exit(1);
  },
);
