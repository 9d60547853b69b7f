import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import { chown, mkdir, stat } from 'fs/promises';
import {
  LAUNCHER_EXE,
  LAUNCHER_SOCK,
  LAUNCH_LOG_FILE,
  PID_FILE,
  PKG_DEST,
  PKG_VAR,
} from 'xunlei-launcher-shared';
import type { BackendEnvironment, BackendProcessHandle } from 'xunlei-launcher-shared';
import { SupervisorError, errorMessage } from './errors.js';
import { toEnvRecord } from './env.js';
import { debug } from './log.js';
import type { MountBinder } from './mount.js';

/** Signals that stop the backend */
export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGHUP', 'SIGTERM'];
/** Signals observed only to be logged */
export const IGNORED_SIGNALS: readonly NodeJS.Signals[] = ['SIGUSR2'];

const DEFAULT_STOP_TIMEOUT_MS = 10_000;

export type SupervisorState = 'starting' | 'running' | 'stopping' | 'stopped';

/** The subset of ChildProcess the supervisor relies on */
export interface SpawnedProcess {
  readonly pid?: number | undefined;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;
export type KillFn = (pid: number, signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SupervisorOptions {
  downloadPath: string;
  mountBindDownloadPath: string;
  uid: number;
  gid: number;
  debug: boolean;
  env: BackendEnvironment;
  /** Runtime directory the daemon writes its socket/pid/log files to */
  varDir?: string;
  /** How long to wait for the child to exit after it was signaled */
  stopTimeoutMs?: number;
}

export interface SupervisorDeps {
  binder: MountBinder;
  spawn?: SpawnFn;
  kill?: KillFn;
  signals?: SignalSource;
}

function defaultKill(pid: number, signal: NodeJS.Signals): void {
  process.kill(pid, signal);
}

/** Arguments the launcher binary is started with */
export function backendArgs(): string[] {
  return [
    `-launcher_listen=${LAUNCHER_SOCK}`,
    `-pid=${PID_FILE}`,
    `-logfile=${LAUNCH_LOG_FILE}`,
  ];
}

/**
 * Runs the backend daemon for the lifetime of the launcher:
 * bind mount → spawn → wait for a termination signal → signal the child → unmount.
 *
 * `run()` resolves once the mount has been released. It rejects on a startup failure
 * (mount, spawn) or when the child could be reached by neither SIGINT nor SIGTERM.
 */
export class BackendSupervisor {
  private _state: SupervisorState = 'starting';
  private handle: BackendProcessHandle | null = null;
  private readonly spawnFn: SpawnFn;
  private readonly killFn: KillFn;
  private readonly signals: SignalSource;

  constructor(
    private readonly options: SupervisorOptions,
    private readonly deps: SupervisorDeps,
  ) {
    this.spawnFn = deps.spawn ?? spawn;
    this.killFn = deps.kill ?? defaultKill;
    this.signals = deps.signals ?? process;
  }

  get state(): SupervisorState {
    return this._state;
  }

  get backend(): BackendProcessHandle | null {
    return this.handle ? { ...this.handle } : null;
  }

  async run(): Promise<void> {
    await this.prepareVarDir();
    await this.deps.binder.bind(this.options.downloadPath, this.options.mountBindDownloadPath);

    let received: NodeJS.Signals | null = null;
    let wake: (() => void) | null = null;
    const onSignal = (signal: NodeJS.Signals) => {
      if (!TERMINATION_SIGNALS.includes(signal)) {
        console.warn(`[backend] Received unhandled signal ${signal}, ignoring`);
        return;
      }
      if (received) {
        console.warn(`[backend] Received ${signal}, shutdown already in progress`);
        return;
      }
      received = signal;
      wake?.();
    };
    const observed = [...TERMINATION_SIGNALS, ...IGNORED_SIGNALS];
    for (const signal of observed) this.signals.on(signal, onSignal);

    try {
      const { exited } = await this.start();
      this._state = 'running';

      if (!received) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }

      this._state = 'stopping';
      console.log(`[backend] Received ${received}, stopping the backend`);
      this.terminate();
      await this.waitForExit(exited);
    } finally {
      for (const signal of observed) this.signals.off(signal, onSignal);
      await this.deps.binder.unbind(this.options.mountBindDownloadPath);
      this._state = 'stopped';
    }
  }

  private async prepareVarDir(): Promise<void> {
    const varDir = this.options.varDir ?? PKG_VAR;
    const exists = await stat(varDir).then(() => true, () => false);
    if (exists) return;
    await mkdir(varDir, { recursive: true, mode: 0o777 });
    await chown(varDir, this.options.uid, this.options.gid);
  }

  /** Spawn the daemon; resolves once it is running, `exited` settles when it exits */
  private async start(): Promise<{ exited: Promise<void> }> {
    console.log('[backend] Start Xunlei Backend Server');
    const child = this.spawnFn(LAUNCHER_EXE, backendArgs(), {
      cwd: PKG_DEST,
      env: toEnvRecord(this.options.env),
      uid: this.options.uid,
      gid: this.options.gid,
      stdio: this.options.debug ? 'inherit' : 'ignore',
    });

    const exited = new Promise<void>((resolve) => {
      child.once('exit', (code, signal) => {
        if (this.handle) this.handle.state = 'exited';
        const how = signal ? `signal ${signal}` : `code ${code}`;
        if (this._state === 'running') {
          console.warn(`[backend] Backend exited unexpectedly with ${how}`);
        } else {
          console.log(`[backend] Backend exited with ${how}`);
        }
        resolve();
      });
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', resolve);
      child.once('error', (err) => {
        reject(new SupervisorError(`Failed to start ${LAUNCHER_EXE}: ${err.message}`, { cause: err }));
      });
    });

    if (child.pid === undefined) {
      throw new SupervisorError(`Failed to start ${LAUNCHER_EXE}: no pid`);
    }
    this.handle = { pid: child.pid, state: 'running' };
    console.log(`[backend] Xunlei Backend Server PID: ${child.pid}`);
    return { exited };
  }

  /** SIGINT first; SIGTERM only if SIGINT could not be delivered */
  private terminate(): void {
    const handle = this.handle;
    if (!handle || handle.state === 'exited') {
      console.log('[backend] Backend already exited, nothing to signal');
      return;
    }

    try {
      this.killFn(handle.pid, 'SIGINT');
      handle.state = 'signaled-graceful';
      console.log('[backend] The backend service has been terminated');
      return;
    } catch (err) {
      console.error(`[backend] SIGINT to ${handle.pid} failed, escalating to SIGTERM:`, errorMessage(err));
    }

    try {
      this.killFn(handle.pid, 'SIGTERM');
      handle.state = 'signaled-forced';
    } catch (err) {
      throw new SupervisorError(
        `The backend kill error: ${errorMessage(err)}, SIGTERM could not reach PID ${handle.pid}`,
        { cause: err },
      );
    }
  }

  private async waitForExit(exited: Promise<void>): Promise<void> {
    if (!this.handle || this.handle.state === 'exited') return;
    const timeoutMs = this.options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), timeoutMs);
    });
    const didTimeOut = await Promise.race([exited.then(() => false), timedOut]);
    clearTimeout(timer);
    if (didTimeOut) {
      console.warn(`[backend] Backend still running ${timeoutMs}ms after the stop signal, unmounting anyway`);
    } else {
      debug('[backend] Backend exit confirmed');
    }
  }
}
