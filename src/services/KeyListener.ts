import { setTimeout as delay } from 'timers/promises';
import type { AppConfig } from '../config/loadConfig.js';
import { keyName } from '../config/keyCodes.js';
import type { Logger } from '../log/logger.js';
import { describeCause, toAppErrorDto } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type AppErrorDto, type Result } from '../shared/result.js';
import type { DeviceHandle, KeySource } from './DeviceReader.js';
import type { DictationManager } from './DictationManager.js';
import type { DeviceResolver } from './DeviceResolver.js';

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

const abortableSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
};

export interface KeyListenerOptions {
  source: KeySource;
  resolver: Pick<DeviceResolver, 'resolve'>;
  manager: Pick<DictationManager, 'handleKeyEvent' | 'deviceLost' | 'shutdown'>;
  device: AppConfig['device'];
  log: Logger;
  sleep?: SleepFn;
}

/**
 * The event loop: reads key transitions and feeds them to the dictation manager
 * one at a time. A device that disappears is re-resolved and reopened with
 * exponential backoff, after the manager has dropped any gesture in progress.
 * Running out of retries ends the loop with an error.
 */
export class KeyListener {
  private devicePath: string;
  private needsResolve = false;
  private sleep: SleepFn;

  constructor(private options: KeyListenerOptions) {
    this.devicePath = options.device.path;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get currentDevice(): string {
    return this.devicePath;
  }

  /**
   * Run until `signal` aborts (ok) or the device cannot be recovered (err).
   * The manager is shut down before this resolves either way.
   */
  async run(signal: AbortSignal): Promise<Result<void>> {
    try {
      while (!signal.aborted) {
        const opened = await this.openWithRetry(signal);
        if (opened === null) break;
        if (!opened.ok) return opened;

        const lost = await this.consume(opened.value, signal);
        if (!lost) break;

        this.options.log.warn(lost.message, { code: lost.code, cause: lost.cause, device: this.devicePath });
        this.needsResolve = true;
        // the release of a held key went with the device
        await this.options.manager.deviceLost();
        try {
          await this.options.source.close(opened.value);
        } catch (error) {
          this.options.log.warn('cannot close lost device', { cause: describeCause(error) });
        }
      }
      return ok(undefined);
    } finally {
      await this.options.manager.shutdown();
    }
  }

  /** Feed events until abort (null) or a device fault. */
  private async consume(handle: DeviceHandle, signal: AbortSignal): Promise<AppErrorDto | null> {
    try {
      for await (const event of this.options.source.events(handle, signal)) {
        try {
          await this.options.manager.handleKeyEvent(event);
        } catch (error) {
          this.options.log.error('unexpected failure handling key event', {
            code: APP_ERROR.INTERNAL,
            type: event.type,
            cause: describeCause(error),
          });
        }
      }
    } catch (error) {
      return toAppErrorDto(error, { code: APP_ERROR.DEVICE_LOST, message: `Lost input device ${handle.path}` });
    }
    if (signal.aborted) return null;
    return { code: APP_ERROR.DEVICE_LOST, message: `Input device ${handle.path} stopped delivering events` };
  }

  /**
   * Open the current device path. After a failure the path is re-resolved from
   * the kernel's device list before every attempt. Null when aborted.
   */
  async openWithRetry(signal: AbortSignal): Promise<Result<DeviceHandle> | null> {
    const { retryBaseMs, retryMaxMs, maxRetries, keyCode } = this.options.device;
    const log = this.options.log;

    for (let attempt = 0; ; attempt++) {
      if (this.needsResolve) await this.resolveDevice(keyCode);

      const opened = await this.options.source.open(this.devicePath);
      if (opened.ok) {
        this.needsResolve = false;
        log.info('listening', { device: this.devicePath, key: keyName(keyCode) });
        return opened;
      }
      this.needsResolve = true;

      if (attempt >= maxRetries) {
        return err({
          ...opened.error,
          message: `${opened.error.message}; giving up after ${attempt} retries`,
        });
      }

      const waitMs = Math.min(retryBaseMs * 2 ** attempt, retryMaxMs);
      log.warn(`${opened.error.message}, retrying`, { attempt: attempt + 1, of: maxRetries, inMs: waitMs });
      await this.sleep(waitMs, signal);
      if (signal.aborted) return null;
    }
  }

  private async resolveDevice(keyCode: number): Promise<void> {
    try {
      const resolved = await this.options.resolver.resolve(keyCode);
      if (resolved && resolved !== this.devicePath) {
        this.options.log.info('input device resolved', { from: this.devicePath, to: resolved });
        this.devicePath = resolved;
      }
    } catch (error) {
      this.options.log.warn('cannot list input devices', { cause: describeCause(error) });
    }
  }
}
