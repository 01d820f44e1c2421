import fs from 'fs';
import type { AppConfig } from '../config/loadConfig.js';
import { commandExists as defaultCommandExists, execCommand, tail, type CommandExistsFn, type ExecFn } from '../os/exec.js';
import { describeCause } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type Result } from '../shared/result.js';
import type { InjectorTarget } from '../types/index.js';

export const INJECTOR_BINARY = 'ydotool';

export interface Injector {
  inject(text: string, target: InjectorTarget): Promise<Result<void>>;
}

export type PathExistsFn = (p: string) => Promise<boolean>;

const pathExists: PathExistsFn = async (p) => {
  try {
    await fs.promises.access(p);
    return true;
  } catch {
    return false;
  }
};

export interface TextInjectorOptions {
  injector: AppConfig['injector'];
  env?: NodeJS.ProcessEnv;
  exec?: ExecFn;
  commandExists?: CommandExistsFn;
  pathExists?: PathExistsFn;
}

/** Types text into the focused window through ydotool and a running ydotoold. */
export class TextInjector implements Injector {
  private exec: ExecFn;
  private commandExists: CommandExistsFn;
  private pathExists: PathExistsFn;

  constructor(private options: TextInjectorOptions) {
    this.exec = options.exec ?? execCommand;
    this.commandExists = options.commandExists ?? defaultCommandExists;
    this.pathExists = options.pathExists ?? pathExists;
  }

  /** ydotool arguments for one segment; a single trailing space separates consecutive segments. */
  buildArgs(text: string): string[] {
    return ['type', '--key-delay', this.options.injector.keyDelayMs.toString(), '--', `${text} `];
  }

  async inject(text: string, target: InjectorTarget): Promise<Result<void>> {
    if (!(await this.commandExists(INJECTOR_BINARY))) {
      return err({
        code: APP_ERROR.INJECTOR_MISSING,
        message: `${INJECTOR_BINARY} not found on PATH; install ydotool`,
      });
    }

    if (!(await this.pathExists(target.socketPath))) {
      return err({
        code: APP_ERROR.INJECTOR_SOCKET_MISSING,
        message: `ydotool socket ${target.socketPath} does not exist; start the ydotoold service for the desktop user`,
        details: { socketPath: target.socketPath },
      });
    }

    const result = await this.exec(INJECTOR_BINARY, this.buildArgs(text), {
      env: { ...(this.options.env ?? process.env), YDOTOOL_SOCKET: target.socketPath },
      timeoutMs: this.options.injector.timeoutMs,
    });

    if (result.spawnError) {
      return err({
        code: APP_ERROR.INJECTION_FAILED,
        message: `Cannot launch ${INJECTOR_BINARY}`,
        cause: describeCause(result.spawnError),
      });
    }
    if (result.timedOut) {
      return err({
        code: APP_ERROR.INJECTION_FAILED,
        message: `${INJECTOR_BINARY} did not finish within ${this.options.injector.timeoutMs} ms`,
      });
    }
    if (result.code !== 0) {
      return err({
        code: APP_ERROR.INJECTION_FAILED,
        message: `${INJECTOR_BINARY} exited with code ${result.code}`,
        cause: tail(result.stderr) || undefined,
        details: { socketPath: target.socketPath },
      });
    }
    return ok(undefined);
  }
}
