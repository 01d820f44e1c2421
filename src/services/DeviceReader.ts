import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { AppError, describeCause, errnoCode } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type Result } from '../shared/result.js';
import type { KeyEvent } from '../types/index.js';

/** `EV_KEY` from linux/input-event-codes.h. */
export const EV_KEY = 1;

const KEY_RELEASE = 0;
const KEY_PRESS = 1;
// value 2 is autorepeat and is dropped here

export interface DeviceHandle {
  path: string;
  file: FileHandle;
}

/** Source of key transitions for one trigger key. */
export interface KeySource {
  open(devicePath: string): Promise<Result<DeviceHandle>>;
  /**
   * Infinite, non-restartable sequence of press/release transitions.
   * Ends quietly when `signal` aborts; throws `AppError(E_DEVICE_LOST)` on a read error.
   */
  events(handle: DeviceHandle, signal: AbortSignal): AsyncIterable<KeyEvent>;
  close(handle: DeviceHandle): Promise<void>;
}

export interface RawInputEvent {
  timestamp: number;
  type: number;
  code: number;
  value: number;
}

/**
 * Decode one `struct input_event`.
 * 24-byte layout: tv_sec i64, tv_usec i64, type u16, code u16, value i32 (little-endian).
 * 16-byte layout uses 32-bit tv_sec/tv_usec.
 */
export function decodeInputEvent(buf: Buffer, offset: number, eventSize: 16 | 24): RawInputEvent {
  if (eventSize === 24) {
    const sec = Number(buf.readBigInt64LE(offset));
    const usec = Number(buf.readBigInt64LE(offset + 8));
    return {
      timestamp: sec * 1000 + Math.floor(usec / 1000),
      type: buf.readUInt16LE(offset + 16),
      code: buf.readUInt16LE(offset + 18),
      value: buf.readInt32LE(offset + 20),
    };
  }
  const sec = buf.readInt32LE(offset);
  const usec = buf.readInt32LE(offset + 4);
  return {
    timestamp: sec * 1000 + Math.floor(usec / 1000),
    type: buf.readUInt16LE(offset + 8),
    code: buf.readUInt16LE(offset + 10),
    value: buf.readInt32LE(offset + 12),
  };
}

export interface DeviceReaderOptions {
  keyCode: number;
  eventSize: 16 | 24;
  /** Bytes requested per read; a multiple of the event size is not required. */
  readChunkSize?: number;
}

export class DeviceReader implements KeySource {
  constructor(private options: DeviceReaderOptions) {}

  async open(devicePath: string): Promise<Result<DeviceHandle>> {
    try {
      const file = await fs.promises.open(devicePath, 'r');
      return ok({ path: devicePath, file });
    } catch (error) {
      const code = errnoCode(error);
      const reason =
        code === 'ENOENT'
          ? 'does not exist'
          : code === 'EACCES' || code === 'EPERM'
            ? 'permission denied (run as root or adjust the device ACL)'
            : 'cannot be opened';
      return err({
        code: APP_ERROR.DEVICE_UNAVAILABLE,
        message: `Input device ${devicePath} ${reason}`,
        cause: describeCause(error),
        details: { devicePath },
      });
    }
  }

  async *events(handle: DeviceHandle, signal: AbortSignal): AsyncGenerator<KeyEvent> {
    if (signal.aborted) return;

    const { keyCode, eventSize } = this.options;
    const stream = handle.file.createReadStream({
      autoClose: false,
      highWaterMark: this.options.readChunkSize ?? eventSize * 64,
    });
    const onAbort = () => stream.destroy();
    signal.addEventListener('abort', onAbort, { once: true });

    let pending = Buffer.alloc(0);
    try {
      for await (const chunk of stream) {
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        pending = pending.length > 0 ? Buffer.concat([pending, data]) : data;

        let offset = 0;
        while (pending.length - offset >= eventSize) {
          const raw = decodeInputEvent(pending, offset, eventSize);
          offset += eventSize;

          if (raw.type !== EV_KEY || raw.code !== keyCode) continue;
          if (raw.value === KEY_PRESS) {
            yield { type: 'press', code: raw.code, timestamp: raw.timestamp };
          } else if (raw.value === KEY_RELEASE) {
            yield { type: 'release', code: raw.code, timestamp: raw.timestamp };
          }
        }
        pending = pending.subarray(offset);
      }
    } catch (error) {
      if (signal.aborted) return;
      throw new AppError({
        code: APP_ERROR.DEVICE_LOST,
        message: `Lost input device ${handle.path}`,
        cause: describeCause(error),
        details: { devicePath: handle.path },
      });
    } finally {
      signal.removeEventListener('abort', onAbort);
      stream.destroy();
    }
  }

  async close(handle: DeviceHandle): Promise<void> {
    await handle.file.close();
  }
}
