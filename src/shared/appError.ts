import { APP_ERROR, type AppErrorCode } from './appErrorCodes.js';
import type { AppErrorDto } from './result.js';

const CODES = new Set<string>(Object.values(APP_ERROR));

/**
 * Typed throwable for the few places that still `throw`
 * (the device iterator, startup checks). Carries the same DTO a `Result` would.
 */
export class AppError extends Error {
  readonly dto: AppErrorDto;

  constructor(dto: AppErrorDto) {
    super(dto.message);
    this.name = 'AppError';
    this.dto = dto;
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError;
}

function isAppErrorCode(value: unknown): value is AppErrorCode {
  return typeof value === 'string' && CODES.has(value);
}

/** Human readable description of any thrown value, for `AppErrorDto.cause`. */
export function describeCause(e: unknown): string {
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'string' ? ` (${e.code})` : '';
    return `${e.message}${code}`;
  }
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e) ?? String(e);
  } catch {
    return String(e);
  }
}

export function toAppErrorDto(
  e: unknown,
  fallback: { code: AppErrorCode; message: string; details?: Record<string, unknown> },
): AppErrorDto {
  if (isAppError(e)) return e.dto;
  if (typeof e === 'object' && e !== null && 'dto' in e) {
    const dto: unknown = e.dto;
    if (
      typeof dto === 'object' &&
      dto !== null &&
      'code' in dto &&
      'message' in dto &&
      isAppErrorCode(dto.code) &&
      typeof dto.message === 'string'
    ) {
      return { code: dto.code, message: dto.message };
    }
  }
  return { code: fallback.code, message: fallback.message, cause: describeCause(e), details: fallback.details };
}

/** errno code of a Node system error, if any. */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}
