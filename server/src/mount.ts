import { execFile as execFileCb } from 'child_process';
import { mkdir } from 'fs/promises';
import { promisify } from 'util';
import { MountError, errorMessage } from './errors.js';
import { debug } from './log.js';

const _execFile = promisify(execFileCb);
const EXEC_TIMEOUT = 10_000;

export type ExecFn = (file: string, args: string[]) => Promise<unknown>;

export interface MountBinder {
  bind(source: string, target: string): Promise<void>;
  unbind(target: string): Promise<void>;
}

function defaultExec(file: string, args: string[]) {
  return _execFile(file, args, { timeout: EXEC_TIMEOUT });
}

/**
 * Bind mounts through mount(8)/umount(8). Node has no mount syscall binding,
 * so this needs the same privileges the binaries need.
 */
export class SystemMountBinder implements MountBinder {
  constructor(private readonly exec: ExecFn = defaultExec) {}

  async bind(source: string, target: string): Promise<void> {
    await mkdir(target, { recursive: true });

    // A mount left behind by an unclean exit would shadow the new one
    await this.exec('umount', [target]).catch((err) => {
      debug(`[mount] Nothing to unmount at ${target}:`, errorMessage(err));
    });

    try {
      await this.exec('mount', ['--bind', source, target]);
    } catch (err) {
      throw new MountError(`Mount ${source} to ${target} failed: ${errorMessage(err)}`, { cause: err });
    }
    console.log(`[mount] Mount ${source} to ${target} succeeded`);
  }

  async unbind(target: string): Promise<void> {
    try {
      await this.exec('umount', [target]);
      console.log(`[mount] Unmount ${target} succeeded`);
    } catch (err) {
      console.error(`[mount] Unmount ${target} failed:`, errorMessage(err));
    }
  }
}
