import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';

export interface ExecOptions {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ExecResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the binary could not be started at all. */
  spawnError?: Error;
}

export type ExecFn = (file: string, args: readonly string[], options?: ExecOptions) => Promise<ExecResult>;

/**
 * Run a command to completion, collecting stdout/stderr.
 * Never rejects: spawn failures, timeouts and aborts are reported in the result.
 */
export const execCommand: ExecFn = (file, args, options = {}) => {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;
    let settled = false;

    const child = spawn(file, [...args], {
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const finish = (result: Omit<ExecResult, 'stdout' | 'stderr' | 'timedOut' | 'aborted'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      resolve({ ...result, stdout, stderr, timedOut, aborted });
    };

    const onAbort = () => {
      aborted = true;
      child.kill('SIGKILL');
    };

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, options.timeoutMs)
      : undefined;

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      finish({ code: null, signal: null, spawnError: error });
    });
    child.on('close', (code, signal) => {
      finish({ code, signal });
    });
  });
};

export type CommandExistsFn = (cmd: string) => Promise<boolean>;

/** `command -v` without a shell: an absolute path or a `PATH` entry that is executable. */
export function createCommandExists(envPath: string | undefined = process.env.PATH): CommandExistsFn {
  return async (cmd) => {
    if (!cmd) return false;
    const candidates = cmd.includes('/')
      ? [cmd]
      : (envPath ?? '')
          .split(path.delimiter)
          .filter(Boolean)
          .map((dir) => path.join(dir, cmd));

    for (const candidate of candidates) {
      try {
        await fs.promises.access(candidate, fs.constants.X_OK);
        return true;
      } catch {
        // not in this directory
      }
    }
    return false;
  };
}

export const commandExists: CommandExistsFn = createCommandExists();

/** Last `max` characters of a process output, for log lines. */
export function tail(text: string, max = 600): string {
  const trimmed = text.trim();
  return trimmed.length > max ? '…' + trimmed.slice(-max) : trimmed;
}
