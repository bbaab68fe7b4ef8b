import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { DEFAULT_SYSTEMCTL_TIMEOUT_MS } from '@homelab/shared';
import type { ExecFn } from './types.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  timeoutMs?: number;
  maxBuffer?: number;
}

/** Exec function that shells out to real commands, without a shell */
export function createExec(options: ExecOptions = {}): ExecFn {
  const timeout = options.timeoutMs ?? DEFAULT_SYSTEMCTL_TIMEOUT_MS;
  const maxBuffer = options.maxBuffer ?? 4 * 1024 * 1024;

  return async (command, args) => {
    const { stdout } = await execFileAsync(command, args, { timeout, maxBuffer });
    return stdout;
  };
}
