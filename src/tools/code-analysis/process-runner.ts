/**
 * Spawns an external analysis program and captures its output verbatim.
 *
 * The caller awaits process exit; the event loop keeps serving other
 * requests in the meantime. No stdin, no timeout, no cwd override.
 */

import { spawn } from 'node:child_process';
import { logDebug } from '../../utils/logger.js';

export interface ProcessOutcome {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export class ExecutableNotFoundError extends Error {
  constructor(public readonly command: string) {
    super(`Executable not found: ${command}`);
    this.name = 'ExecutableNotFoundError';
  }
}

function isMissingExecutable(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

export function runProcess(command: string, args: string[]): Promise<ProcessOutcome> {
  return new Promise((resolve, reject) => {
    logDebug(`Spawning ${command} ${args.join(' ')}`, { component: 'ProcessRunner' });

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (err: Error) => {
      if (settled) return;
      settled = true;
      reject(isMissingExecutable(err) ? new ExecutableNotFoundError(command) : err);
    });

    child.on('close', (code: number | null) => {
      if (settled) return;
      settled = true;
      logDebug(`${command} exited with code ${String(code)}`, { component: 'ProcessRunner' });
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
}
