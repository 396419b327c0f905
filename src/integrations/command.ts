/**
 * Child-process runner shared by the Docker integrations.
 *
 * Commands run without a shell. Aborting the signal sends SIGTERM to the
 * child and rejects with `CommandAbortedError`.
 */

import { spawn } from 'child_process';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  /** Merged over the parent environment. */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Injectable so the integrations can be tested without Docker. */
export type CommandRunner = (spec: CommandSpec, signal: AbortSignal) => Promise<CommandResult>;

export class CommandAbortedError extends Error {
  constructor(public readonly command: string) {
    super(`Command aborted: ${command}`);
    this.name = 'CommandAbortedError';
  }
}

/** Keep only the tail of long outputs. */
const MAX_CAPTURE_CHARS = 64 * 1024;

function appendCapped(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > MAX_CAPTURE_CHARS ? next.slice(next.length - MAX_CAPTURE_CHARS) : next;
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

export const spawnCommand: CommandRunner = (spec, signal) =>
  new Promise<CommandResult>((resolve, reject) => {
    const display = formatCommand(spec);
    if (signal.aborted) {
      reject(new CommandAbortedError(display));
      return;
    }

    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd ?? process.cwd(),
      env: { ...process.env, ...spec.env },
    });

    let stdout = '';
    let stderr = '';
    let aborted = false;

    child.stdout?.on('data', (data: Buffer) => {
      stdout = appendCapped(stdout, data.toString());
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr = appendCapped(stderr, data.toString());
    });

    const onAbort = () => {
      aborted = true;
      child.kill('SIGTERM');
    };
    signal.addEventListener('abort', onAbort, { once: true });

    child.on('error', (err) => {
      signal.removeEventListener('abort', onAbort);
      reject(err);
    });

    child.on('close', (code) => {
      signal.removeEventListener('abort', onAbort);
      if (aborted) {
        reject(new CommandAbortedError(display));
        return;
      }
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });
  });
