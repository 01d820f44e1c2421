import type { AppConfig } from '../config/loadConfig.js';
import type { Logger } from '../log/logger.js';
import { commandExists as defaultCommandExists, execCommand, tail, type CommandExistsFn, type ExecFn } from '../os/exec.js';
import { AppError } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import type { ComputeDevice } from '../types/index.js';
import type { RecognitionBackend } from './RecognitionBackend.js';

/** Non-speech annotations such as `[BLANK_AUDIO]` or `[MUSIC]`. */
const MARKER_LINE = /^\[[A-Z_ ]+\]$/;

export interface WhisperCommandServiceOptions {
  transcription: AppConfig['transcription'];
  log: Logger;
  exec?: ExecFn;
  commandExists?: CommandExistsFn;
}

/**
 * Runs an external Whisper binary (whisper.cpp's `whisper-cli` by default) once
 * per utterance and reads the transcript from stdout.
 *
 * Argument placeholders: `{audio}`, `{model}`, `{device}`, `{computeType}`, `{language}`.
 */
export class WhisperCommandService implements RecognitionBackend {
  readonly name = 'command';
  private device: ComputeDevice = 'cpu';
  private exec: ExecFn;
  private commandExists: CommandExistsFn;

  constructor(private options: WhisperCommandServiceOptions) {
    this.exec = options.exec ?? execCommand;
    this.commandExists = options.commandExists ?? defaultCommandExists;
  }

  async load(device: ComputeDevice): Promise<void> {
    const { binary } = this.options.transcription.command;
    if (!(await this.commandExists(binary))) {
      throw new AppError({
        code: APP_ERROR.BINARY_MISSING,
        message: `Transcription binary ${binary} not found`,
        details: { binary },
      });
    }
    this.device = device;
    this.options.log.info('using transcription command', { binary, device });
  }

  buildArgs(audioPath: string): string[] {
    const { modelId, modelSize, computeType, language } = this.options.transcription;
    const values: Record<string, string> = {
      audio: audioPath,
      model: modelId ?? modelSize,
      device: this.device,
      computeType,
      language: language ?? 'auto',
    };
    return this.options.transcription.command.args.map((arg) =>
      arg.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match),
    );
  }

  async recognize(audioPath: string, signal: AbortSignal): Promise<string[]> {
    const { binary } = this.options.transcription.command;
    const result = await this.exec(binary, this.buildArgs(audioPath), { signal });

    if (result.spawnError) throw result.spawnError;
    if (result.aborted) throw new Error(`${binary} was cancelled`);
    if (result.code !== 0) {
      throw new Error(`${binary} exited with code ${result.code}: ${tail(result.stderr)}`);
    }

    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => !MARKER_LINE.test(line));
  }
}
