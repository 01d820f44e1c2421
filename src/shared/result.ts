import type { AppErrorCode } from './appErrorCodes.js';

export type Result<T> = { ok: true; value: T } | { ok: false; error: AppErrorDto };

/**
 * A fault as reported by a component.
 *
 * - `message`: one line, safe for the log headline
 * - `cause`: the underlying error (stderr tail, errno message, stack)
 */
export type AppErrorDto = {
  code: AppErrorCode;
  message: string;
  cause?: string;
  details?: Record<string, unknown>;
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: AppErrorDto): Result<T> {
  return { ok: false, error };
}

export function isOk<T>(r: Result<T>): r is { ok: true; value: T } {
  return r.ok;
}

export function isErr<T>(r: Result<T>): r is { ok: false; error: AppErrorDto } {
  return !r.ok;
}
