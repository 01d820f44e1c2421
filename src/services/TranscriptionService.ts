import type { AppConfig } from '../config/loadConfig.js';
import type { Logger } from '../log/logger.js';
import { describeCause, toAppErrorDto } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type AppErrorDto, type Result } from '../shared/result.js';
import type { AudioArtifact, ComputeDevice, TranscriptSegment } from '../types/index.js';
import { chooseComputeDevice, type AcceleratorProbe } from './AcceleratorProbe.js';
import type { RecognitionBackend } from './RecognitionBackend.js';

export interface Transcriber {
  load(): Promise<Result<ComputeDevice>>;
  transcribe(artifact: AudioArtifact, signal?: AbortSignal): Promise<Result<TranscriptSegment[]>>;
}

/** Trim every piece and drop the empty ones. */
export function toSegments(pieces: readonly string[]): TranscriptSegment[] {
  return pieces.map((p) => p.trim()).filter((text) => text.length > 0).map((text) => ({ text }));
}

export interface TranscriptionServiceOptions {
  transcription: AppConfig['transcription'];
  backend: RecognitionBackend;
  probe: AcceleratorProbe;
  log: Logger;
}

export class TranscriptionService implements Transcriber {
  private loading: Promise<Result<ComputeDevice>> | null = null;
  private device: ComputeDevice | null = null;

  constructor(private options: TranscriptionServiceOptions) {}

  /** Load the model once; later calls share the first result. */
  load(): Promise<Result<ComputeDevice>> {
    if (!this.loading) this.loading = this.loadOnce();
    return this.loading;
  }

  private async loadOnce(): Promise<Result<ComputeDevice>> {
    const { backend, log, transcription } = this.options;
    const choice = await chooseComputeDevice(transcription.device, this.options.probe);
    if (!choice.ok) return choice;

    const { device, cpuFallback } = choice.value;
    try {
      await backend.load(device);
      this.device = device;
      return ok(device);
    } catch (error) {
      if (!cpuFallback) return err(this.loadFault(error, device));
      log.info('accelerated model load failed, falling back to cpu', { backend: backend.name, cause: describeCause(error) });
    }

    try {
      await backend.load('cpu');
      this.device = 'cpu';
      return ok('cpu');
    } catch (error) {
      return err(this.loadFault(error, 'cpu'));
    }
  }

  private loadFault(error: unknown, device: ComputeDevice): AppErrorDto {
    return toAppErrorDto(error, {
      code: APP_ERROR.MODEL_LOAD,
      message: `Cannot load ${this.options.backend.name} recognizer on ${device}`,
      details: { device },
    });
  }

  /**
   * Recognise one artifact, bounded by `transcription.timeoutMs`. On timeout the
   * backend's signal is aborted; the subprocess backend kills its child.
   */
  async transcribe(artifact: AudioArtifact, signal?: AbortSignal): Promise<Result<TranscriptSegment[]>> {
    if (!this.device) {
      return err({ code: APP_ERROR.TRANSCRIPTION_FAILED, message: 'Recognizer is not loaded' });
    }

    const { timeoutMs } = this.options.transcription;
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) controller.abort();

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true;
        resolve('timeout');
        controller.abort();
      }, timeoutMs);
    });
    const aborted = new Promise<'aborted'>((resolve) => {
      if (controller.signal.aborted) resolve('aborted');
      controller.signal.addEventListener('abort', () => resolve('aborted'), { once: true });
    });

    const started = Date.now();
    // the in-process run cannot be cancelled: on timeout only the wait is abandoned
    const recognition = this.options.backend.recognize(artifact.path, controller.signal);

    try {
      const outcome = await Promise.race([recognition, deadline, aborted]);
      if (outcome === 'timeout' || outcome === 'aborted') this.reportLateFailure(recognition, artifact.path);
      if (outcome === 'timeout' || timedOut) {
        return err({
          code: APP_ERROR.TIMEOUT,
          message: `Transcription did not finish within ${timeoutMs} ms`,
          details: { path: artifact.path },
        });
      }
      if (outcome === 'aborted') {
        return err({ code: APP_ERROR.TRANSCRIPTION_FAILED, message: 'Transcription cancelled', details: { path: artifact.path } });
      }
      const segments = toSegments(outcome);
      this.options.log.info('transcribed', { segments: segments.length, ms: Date.now() - started });
      return ok(segments);
    } catch (error) {
      if (timedOut) {
        return err({
          code: APP_ERROR.TIMEOUT,
          message: `Transcription did not finish within ${timeoutMs} ms`,
          details: { path: artifact.path },
        });
      }
      return err({
        code: APP_ERROR.TRANSCRIPTION_FAILED,
        message: `Cannot transcribe ${artifact.path}`,
        cause: describeCause(error),
        details: { path: artifact.path, sizeBytes: artifact.sizeBytes },
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** An abandoned recognition still settles later; its failure only gets a log line. */
  private reportLateFailure(recognition: Promise<string[]>, path: string): void {
    void recognition.catch((error: unknown) => {
      this.options.log.warn('abandoned transcription failed', { path, cause: describeCause(error) });
    });
  }
}
