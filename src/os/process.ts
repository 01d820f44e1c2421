import { spawn } from 'child_process';

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchOptions {
  env?: NodeJS.ProcessEnv;
  uid?: number;
  gid?: number;
}

/** A long-running child whose only interactions are signals and its exit. */
export interface LaunchedProcess {
  readonly pid: number | undefined;
  /** Resolves once the process has exited and been reaped. */
  readonly exited: Promise<ExitStatus>;
  kill(signal: NodeJS.Signals): void;
  /** Tail of stderr, for diagnostics. */
  output(): string;
}

export type LaunchResult = { process: LaunchedProcess } | { spawnError: Error };

export type ProcessLauncher = (command: string, args: readonly string[], options?: LaunchOptions) => Promise<LaunchResult>;

const MAX_STDERR_CHARS = 4000;

/**
 * Spawn `command` in its own process group and wait for the `spawn` or `error`
 * event, so a missing binary is reported to the caller instead of surfacing later.
 */
export const spawnProcess: ProcessLauncher = (command, args, options = {}) => {
  return new Promise((resolve) => {
    const child = spawn(command, [...args], {
      env: options.env ?? process.env,
      uid: options.uid,
      gid: options.gid,
      detached: true,
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    let stderr = '';
    child.stderr.on('data', (data: Buffer) => {
      stderr = (stderr + data.toString()).slice(-MAX_STDERR_CHARS);
    });

    const exited = new Promise<ExitStatus>((resolveExit) => {
      child.once('close', (code, signal) => resolveExit({ code, signal }));
    });

    const kill = (signal: NodeJS.Signals) => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      try {
        // whole group: reaches the capture binary behind sudo as well
        if (child.pid !== undefined) process.kill(-child.pid, signal);
      } catch {
        child.kill(signal);
      }
    };

    child.once('spawn', () => {
      resolve({ process: { pid: child.pid, exited, kill, output: () => stderr } });
    });
    child.on('error', (error) => {
      resolve({ spawnError: error });
    });
  });
};
