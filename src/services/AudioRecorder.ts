import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../config/loadConfig.js';
import type { Logger } from '../log/logger.js';
import { tail } from '../os/exec.js';
import { spawnProcess, type ExitStatus, type LaunchedProcess, type ProcessLauncher } from '../os/process.js';
import { describeCause } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type AppErrorDto, type Result } from '../shared/result.js';
import { CAPTURE_FORMAT, type AudioArtifact, type TargetUser } from '../types/index.js';

export interface RecordingHandle {
  readonly id: string;
  readonly outputPath: string;
  readonly startedAt: Date;
  readonly pid: number | undefined;
}

export type StopOutcome =
  | { kind: 'already-stopped' }
  | { kind: 'stopped'; artifact: AudioArtifact; abnormalExit?: AppErrorDto };

/** Capture lifecycle as the dictation manager sees it. */
export interface Recorder {
  startRecording(user: TargetUser, outputPath: string): Promise<Result<RecordingHandle>>;
  stopRecording(handle: RecordingHandle): Promise<Result<StopOutcome>>;
  /** Terminate without producing an artifact; the output file is removed. */
  abortRecording(handle: RecordingHandle): Promise<void>;
  discardArtifact(filePath: string): Promise<Result<void>>;
}

export interface CaptureCommand {
  command: string;
  args: string[];
  uid?: number;
  gid?: number;
}

/** Exit codes the capture binaries use after honouring a stop signal. */
const SIGNALLED_EXIT_CODES: Record<AppConfig['recorder']['backend'], number[]> = {
  arecord: [1],
  ffmpeg: [255],
};

function captureArgs(backend: AppConfig['recorder']['backend'], outputPath: string): string[] {
  const { sampleRate, channels } = CAPTURE_FORMAT;
  if (backend === 'ffmpeg') {
    return [
      '-hide_banner',
      '-loglevel', 'error',
      '-f', 'pulse',
      '-i', 'default',
      '-ar', sampleRate.toString(),
      '-ac', channels.toString(),
      '-c:a', 'pcm_s16le',
      '-y', // overwrite the previous session's file
      outputPath,
    ];
  }
  return ['-q', '-f', 'S16_LE', '-r', sampleRate.toString(), '-c', channels.toString(), '-t', 'wav', outputPath];
}

/**
 * Capture command for one session. As root the binary is run as the desktop
 * user, either through `sudo -u <user> -E` or by spawning with the user's uid/gid.
 */
export function buildCaptureCommand(
  recorder: Pick<AppConfig['recorder'], 'backend' | 'privilegeDrop'>,
  user: TargetUser,
  outputPath: string,
  runningAsRoot: boolean,
): CaptureCommand {
  const args = captureArgs(recorder.backend, outputPath);
  if (!runningAsRoot) return { command: recorder.backend, args };
  if (recorder.privilegeDrop === 'setuid') {
    return { command: recorder.backend, args, uid: user.uid, gid: user.gid };
  }
  return { command: 'sudo', args: ['-u', user.name, '-E', recorder.backend, ...args] };
}

export interface AudioRecorderOptions {
  recorder: AppConfig['recorder'];
  /** Environment of the user's desktop session. */
  env: NodeJS.ProcessEnv;
  runningAsRoot: boolean;
  log: Logger;
  launch?: ProcessLauncher;
  /** Grace period after SIGKILL before giving up on reaping. */
  killTimeoutMs?: number;
}

interface ActiveRecording {
  handle: RecordingHandle;
  user: TargetUser;
  process: LaunchedProcess;
  exitStatus: ExitStatus | null;
}

interface Termination {
  status: ExitStatus;
  /** We delivered the stop signal (the process was still running). */
  signalled: boolean;
  /** The stop signal was ignored and SIGKILL was needed. */
  forced: boolean;
}

export class AudioRecorder implements Recorder {
  private active = new Map<string, ActiveRecording>();
  private launch: ProcessLauncher;

  constructor(private options: AudioRecorderOptions) {
    this.launch = options.launch ?? spawnProcess;
  }

  private generateSessionId(): string {
    return `session_${Date.now()}_${Math.random().toString(36).substring(2, 10)}`;
  }

  /**
   * The capture runs as the desktop user, so a directory we create for it
   * has to be handed over to that user.
   */
  private async ensureOutputDir(outputPath: string, user: TargetUser): Promise<void> {
    const created = await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    if (created && this.options.runningAsRoot) {
      await fs.promises.chown(path.dirname(outputPath), user.uid, user.gid);
    }
  }

  /**
   * Start capturing into `outputPath`. Any file left there by an earlier
   * session is removed first, so a failed capture can never hand stale audio on.
   */
  async startRecording(user: TargetUser, outputPath: string): Promise<Result<RecordingHandle>> {
    try {
      await this.ensureOutputDir(outputPath, user);
      await fs.promises.rm(outputPath, { force: true });
    } catch (error) {
      return err({
        code: APP_ERROR.RECORDER_SPAWN_FAILED,
        message: `Cannot prepare audio output ${outputPath}`,
        cause: describeCause(error),
      });
    }

    const capture = buildCaptureCommand(this.options.recorder, user, outputPath, this.options.runningAsRoot);
    const launched = await this.launch(capture.command, capture.args, {
      env: this.options.env,
      uid: capture.uid,
      gid: capture.gid,
    });

    if ('spawnError' in launched) {
      return err({
        code: APP_ERROR.RECORDER_SPAWN_FAILED,
        message: `Cannot launch ${capture.command}`,
        cause: describeCause(launched.spawnError),
        details: { command: capture.command },
      });
    }

    const handle: RecordingHandle = {
      id: this.generateSessionId(),
      outputPath,
      startedAt: new Date(),
      pid: launched.process.pid,
    };
    const recording: ActiveRecording = { handle, user, process: launched.process, exitStatus: null };
    void launched.process.exited.then((status) => {
      recording.exitStatus = status;
    });
    this.active.set(handle.id, recording);

    this.options.log.info('capture started', { sessionId: handle.id, pid: handle.pid, command: capture.command });
    return ok(handle);
  }

  /**
   * Stop gracefully and collect the artifact. A second stop, or a stop of a
   * handle this recorder never started, is a no-op.
   */
  async stopRecording(handle: RecordingHandle): Promise<Result<StopOutcome>> {
    const recording = this.active.get(handle.id);
    if (!recording) return ok({ kind: 'already-stopped' });
    this.active.delete(handle.id);

    const termination = await this.terminate(recording);
    return await this.collect(recording, termination);
  }

  async abortRecording(handle: RecordingHandle): Promise<void> {
    const recording = this.active.get(handle.id);
    if (recording) {
      this.active.delete(handle.id);
      await this.terminate(recording);
    }
    await fs.promises.rm(handle.outputPath, { force: true });
  }

  async discardArtifact(filePath: string): Promise<Result<void>> {
    try {
      await fs.promises.rm(filePath, { force: true });
      return ok(undefined);
    } catch (error) {
      return err({ code: APP_ERROR.INTERNAL, message: `Cannot remove ${filePath}`, cause: describeCause(error) });
    }
  }

  isRecording(): boolean {
    return this.active.size > 0;
  }

  private async terminate(recording: ActiveRecording): Promise<Termination> {
    if (recording.exitStatus) {
      return { status: recording.exitStatus, signalled: false, forced: false };
    }

    const { stopSignal, stopTimeoutMs } = this.options.recorder;
    recording.process.kill(stopSignal);

    const graceful = await waitFor(recording.process.exited, stopTimeoutMs);
    if (graceful) return { status: graceful, signalled: true, forced: false };

    this.options.log.warn('capture ignored stop signal, killing', {
      sessionId: recording.handle.id,
      pid: recording.handle.pid,
      signal: stopSignal,
      timeoutMs: stopTimeoutMs,
    });
    recording.process.kill('SIGKILL');
    const killed = await waitFor(recording.process.exited, this.options.killTimeoutMs ?? 2000);
    // SIGKILL cannot be ignored; keep waiting so the process is always reaped.
    return { status: killed ?? (await recording.process.exited), signalled: true, forced: true };
  }

  private isCleanExit(termination: Termination): boolean {
    const { status, signalled, forced } = termination;
    if (forced) return false;
    if (status.code === 0) return true;
    if (!signalled) return false;
    if (status.signal === this.options.recorder.stopSignal) return true;
    return status.code !== null && SIGNALLED_EXIT_CODES[this.options.recorder.backend].includes(status.code);
  }

  private async collect(recording: ActiveRecording, termination: Termination): Promise<Result<StopOutcome>> {
    const { handle } = recording;
    const clean = this.isCleanExit(termination);
    const abnormal: AppErrorDto | undefined = clean
      ? undefined
      : {
          code: APP_ERROR.RECORDER_EXITED_ABNORMALLY,
          message: `Recorder exited abnormally (code ${termination.status.code}, signal ${termination.status.signal})`,
          cause: tail(recording.process.output()) || undefined,
          details: { sessionId: handle.id, forced: termination.forced },
        };

    const sizeBytes = await fileSize(handle.outputPath);
    if (sizeBytes > 0) {
      return ok({
        kind: 'stopped',
        artifact: { path: handle.outputPath, sizeBytes, format: CAPTURE_FORMAT },
        abnormalExit: abnormal,
      });
    }

    if (abnormal) return err(abnormal);
    return err({
      code: APP_ERROR.RECORDER_NO_AUDIO,
      message: `Recorder produced no audio at ${handle.outputPath}`,
      cause: tail(recording.process.output()) || undefined,
      details: { sessionId: handle.id },
    });
  }
}

async function fileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
}

/** Resolve with the promise's value, or null if it takes longer than `ms`. */
async function waitFor<T>(promise: Promise<T>, ms: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
