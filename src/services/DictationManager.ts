import fs from 'fs';
import type { Logger } from '../log/logger.js';
import { describeCause, toAppErrorDto } from '../shared/appError.js';
import { APP_ERROR, faultCategory } from '../shared/appErrorCodes.js';
import { err, ok, type AppErrorDto, type Result } from '../shared/result.js';
import {
  CAPTURE_FORMAT,
  type DictationState,
  type GestureRecord,
  type InjectorTarget,
  type KeyEvent,
  type TargetUser,
  type TranscriptSegment,
} from '../types/index.js';
import type { Recorder, RecordingHandle } from './AudioRecorder.js';
import type { Injector } from './TextInjector.js';
import type { Transcriber } from './TranscriptionService.js';

const DEFAULT_HISTORY_SIZE = 50;

export interface DictationManagerOptions {
  recorder: Recorder;
  transcriber: Transcriber;
  injector: Injector;
  user: TargetUser;
  target: InjectorTarget;
  audioFile: string;
  keyCode: number;
  log: Logger;
  historySize?: number;
}

export interface DictationStatus {
  state: DictationState;
  keyHeld: boolean;
  sessionsStarted: number;
  currentSession: GestureRecord | null;
}

export interface TranscribeFileOptions {
  /** Type the segments into the focused window as well. */
  inject?: boolean;
}

interface ActiveGesture {
  handle: RecordingHandle;
  record: GestureRecord;
  log: Logger;
}

function copyRecord(record: GestureRecord): GestureRecord {
  return { ...record, segments: [...record.segments] };
}

/**
 * Hold-to-talk state machine: idle → recording → transcribing → injecting → idle.
 *
 * Key events are fed in one at a time by the listener. The release edge hands the
 * session to a detached pipeline (stop, transcribe, inject) so that events keep
 * being consumed, and ignored, while it runs.
 */
export class DictationManager {
  private state: DictationState = 'idle';
  private keyHeld = false;
  private sessionsStarted = 0;
  private history: GestureRecord[] = [];
  private active: ActiveGesture | null = null;
  private starting: Promise<void> | null = null;
  private pipeline: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private abort = new AbortController();

  constructor(private options: DictationManagerOptions) {}

  async handleKeyEvent(event: KeyEvent): Promise<void> {
    if (event.code !== this.options.keyCode || this.shutdownPromise) return;

    if (event.type === 'press') {
      if (this.keyHeld) return;
      this.keyHeld = true;
      if (this.state !== 'idle') {
        this.options.log.info('key pressed while busy, ignored', { state: this.state });
        return;
      }
      this.starting = this.beginGesture();
      try {
        await this.starting;
      } finally {
        this.starting = null;
      }
      return;
    }

    if (!this.keyHeld) return;
    this.keyHeld = false;
    const gesture = this.active;
    if (this.state !== 'recording' || !gesture) return;

    this.active = null;
    this.state = 'transcribing';
    this.pipeline = this.finishGesture(gesture).finally(() => {
      this.pipeline = null;
    });
  }

  /** Resolves once the detached stop/transcribe/inject pipeline (if any) has finished. */
  async whenIdle(): Promise<void> {
    if (this.pipeline) await this.pipeline;
  }

  getStatus(): DictationStatus {
    const latest = this.history[0];
    const inFlight = latest && (latest.status === 'recording' || latest.status === 'processing');
    return {
      state: this.state,
      keyHeld: this.keyHeld,
      sessionsStarted: this.sessionsStarted,
      currentSession: inFlight ? copyRecord(latest) : null,
    };
  }

  /** Recent gestures, newest first. */
  getHistory(): GestureRecord[] {
    return this.history.map(copyRecord);
  }

  getGesture(id: string): GestureRecord | null {
    const record = this.history.find((g) => g.id === id);
    return record ? copyRecord(record) : null;
  }

  /**
   * Transcribe an existing audio file through the same exclusivity gate as a
   * gesture: `E_BUSY` unless idle. The file is left in place.
   */
  async transcribeFile(filePath: string, options: TranscribeFileOptions = {}): Promise<Result<TranscriptSegment[]>> {
    if (this.state !== 'idle' || this.shutdownPromise) {
      return err({ code: APP_ERROR.BUSY, message: `Dictation is busy (${this.state})` });
    }
    this.state = 'transcribing';
    const log = this.options.log.scoped('file', { path: filePath });

    try {
      let sizeBytes: number;
      try {
        sizeBytes = (await fs.promises.stat(filePath)).size;
      } catch (error) {
        return err({ code: APP_ERROR.TRANSCRIPTION_FAILED, message: `Cannot read ${filePath}`, cause: describeCause(error) });
      }

      const transcribed = await this.options.transcriber.transcribe(
        { path: filePath, sizeBytes, format: CAPTURE_FORMAT },
        this.abort.signal,
      );
      if (!transcribed.ok) return transcribed;

      if (options.inject && transcribed.value.length > 0) {
        this.state = 'injecting';
        await this.injectSegments(transcribed.value, log);
      }
      return ok(transcribed.value);
    } finally {
      this.state = 'idle';
    }
  }

  /**
   * Stop everything: a live recording is terminated and reaped without being
   * transcribed, a running transcription is aborted and pending injections are skipped.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.shutdownOnce();
    return this.shutdownPromise;
  }

  /**
   * The input device went away, and with it the release of a held key. A live
   * recording is torn down without being transcribed; a running pipeline is left
   * to finish.
   */
  async deviceLost(): Promise<void> {
    this.keyHeld = false;
    if (this.starting) await this.starting;

    const gesture = this.active;
    if (!gesture) return;
    this.active = null;

    const lost: AppErrorDto = { code: APP_ERROR.DEVICE_LOST, message: 'Input device lost during recording' };
    this.fault(gesture.log, 'record', lost, { sessionId: gesture.handle.id });
    try {
      await this.options.recorder.abortRecording(gesture.handle);
    } catch (error) {
      gesture.log.error('cannot tear down capture', { cause: describeCause(error) });
    }
    this.close(gesture.record, 'error', lost);
    this.state = 'idle';
  }

  private async shutdownOnce(): Promise<void> {
    this.abort.abort();
    if (this.starting) await this.starting;

    const gesture = this.active;
    this.active = null;
    if (gesture) {
      gesture.log.info('shutdown during recording, discarding capture');
      try {
        await this.options.recorder.abortRecording(gesture.handle);
      } catch (error) {
        gesture.log.error('cannot tear down capture', { cause: describeCause(error) });
      }
      this.close(gesture.record, 'cancelled');
    }

    await this.whenIdle();
    this.state = 'idle';
  }

  private nextGestureId(): string {
    return `gesture_${Date.now()}_${this.sessionsStarted}`;
  }

  private remember(record: GestureRecord): void {
    this.history.unshift(record);
    this.history.length = Math.min(this.history.length, this.options.historySize ?? DEFAULT_HISTORY_SIZE);
  }

  private async beginGesture(): Promise<void> {
    this.state = 'recording';
    this.sessionsStarted += 1;
    const record: GestureRecord = { id: this.nextGestureId(), startedAt: new Date(), status: 'recording', segments: [] };
    this.remember(record);
    const log = this.options.log.scoped('gesture', { gestureId: record.id });

    let started: Result<RecordingHandle>;
    try {
      started = await this.options.recorder.startRecording(this.options.user, this.options.audioFile);
    } catch (error) {
      started = err(toAppErrorDto(error, { code: APP_ERROR.INTERNAL, message: 'Unexpected failure starting capture' }));
    }
    if (!started.ok) {
      this.fault(log, 'record', started.error);
      this.close(record, 'error', started.error);
      this.state = 'idle';
      return;
    }

    if (this.abort.signal.aborted) {
      await this.options.recorder.abortRecording(started.value);
      this.close(record, 'cancelled');
      this.state = 'idle';
      return;
    }

    this.active = { handle: started.value, record, log };
    log.info('recording', { sessionId: started.value.id });
  }

  private async finishGesture(gesture: ActiveGesture): Promise<void> {
    const { handle, record, log } = gesture;
    record.status = 'processing';
    let artifactPath: string | null = null;

    try {
      const stopped = await this.options.recorder.stopRecording(handle);
      if (!stopped.ok) {
        this.fault(log, 'stop', stopped.error);
        this.close(record, 'error', stopped.error);
        return;
      }
      if (stopped.value.kind === 'already-stopped') {
        log.warn('recording was already stopped, nothing to transcribe', { sessionId: handle.id });
        this.close(record, 'completed');
        return;
      }

      const { artifact, abnormalExit } = stopped.value;
      artifactPath = artifact.path;
      if (abnormalExit) {
        log.warn(`${abnormalExit.message}, transcribing the captured audio anyway`, {
          code: abnormalExit.code,
          cause: abnormalExit.cause,
          sizeBytes: artifact.sizeBytes,
        });
      }

      if (this.abort.signal.aborted) {
        log.info('shutdown before transcription, skipping');
        this.close(record, 'cancelled');
        return;
      }

      const transcribed = await this.options.transcriber.transcribe(artifact, this.abort.signal);
      if (!transcribed.ok) {
        if (this.abort.signal.aborted) {
          log.info('transcription cancelled by shutdown');
          this.close(record, 'cancelled');
          return;
        }
        this.fault(log, 'transcribe', transcribed.error);
        this.close(record, 'error', transcribed.error);
        return;
      }

      const segments = transcribed.value;
      record.segments = segments.map((s) => s.text);
      if (segments.length === 0) {
        log.info('no speech recognised');
        this.close(record, 'completed');
        return;
      }

      this.state = 'injecting';
      const failure = await this.injectSegments(segments, log);
      if (this.abort.signal.aborted) {
        this.close(record, 'cancelled');
      } else if (failure) {
        this.close(record, 'error', failure);
      } else {
        this.close(record, 'completed');
      }
    } catch (error) {
      const dto = toAppErrorDto(error, { code: APP_ERROR.INTERNAL, message: 'Unexpected failure in dictation session' });
      this.fault(log, 'session', dto);
      this.close(record, 'error', dto);
      try {
        await this.options.recorder.abortRecording(handle);
      } catch (teardownError) {
        log.error('cannot tear down capture', { cause: describeCause(teardownError) });
      }
    } finally {
      if (artifactPath) {
        const discarded = await this.options.recorder.discardArtifact(artifactPath);
        if (!discarded.ok) this.fault(log, 'cleanup', discarded.error);
      }
      this.state = 'idle';
    }
  }

  /**
   * One injection per segment, in order. A failed segment is logged and the
   * rest are still attempted. Returns the first failure, if any.
   */
  private async injectSegments(segments: readonly TranscriptSegment[], log: Logger): Promise<AppErrorDto | null> {
    let firstFailure: AppErrorDto | null = null;
    for (const [index, segment] of segments.entries()) {
      if (this.abort.signal.aborted) {
        log.info('shutdown, skipping remaining segments', { skipped: segments.length - index });
        break;
      }
      const injected = await this.options.injector.inject(segment.text, this.options.target);
      if (!injected.ok) {
        this.fault(log, 'inject', injected.error, { segment: index + 1, of: segments.length });
        firstFailure ??= injected.error;
      }
    }
    if (!firstFailure) log.info('typed', { segments: segments.length });
    return firstFailure;
  }

  private fault(log: Logger, stage: string, error: AppErrorDto, extra: Record<string, unknown> = {}): void {
    log.error(`${stage} failed: ${error.message}`, {
      code: error.code,
      category: faultCategory(error.code),
      cause: error.cause,
      ...error.details,
      ...extra,
    });
  }

  private close(record: GestureRecord, status: GestureRecord['status'], error?: AppErrorDto): void {
    record.status = status;
    record.endedAt = new Date();
    if (error) record.errorCode = error.code;
  }
}
