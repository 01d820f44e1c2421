/**
 * Error codes carried by every fault (`AppErrorDto.code`).
 *
 * Grouped by how the listener reacts to them; see `faultCategory`.
 */
export const APP_ERROR = {
  // startup: the process exits non-zero
  CONFIG: 'E_CONFIG',
  USER_NOT_FOUND: 'E_USER_NOT_FOUND',
  NOT_PRIVILEGED: 'E_NOT_PRIVILEGED',
  BINARY_MISSING: 'E_BINARY_MISSING',
  MODEL_LOAD: 'E_MODEL_LOAD',

  // device: re-resolve and reopen with backoff
  DEVICE_UNAVAILABLE: 'E_DEVICE_UNAVAILABLE',
  DEVICE_LOST: 'E_DEVICE_LOST',

  // session: log and return to idle
  RECORDER_SPAWN_FAILED: 'E_RECORDER_SPAWN_FAILED',
  RECORDER_EXITED_ABNORMALLY: 'E_RECORDER_EXITED_ABNORMALLY',
  RECORDER_NO_AUDIO: 'E_RECORDER_NO_AUDIO',
  TRANSCRIPTION_FAILED: 'E_TRANSCRIPTION_FAILED',
  TIMEOUT: 'E_TIMEOUT',
  INJECTOR_MISSING: 'E_INJECTOR_MISSING',
  INJECTOR_SOCKET_MISSING: 'E_INJECTOR_SOCKET_MISSING',
  INJECTION_FAILED: 'E_INJECTION_FAILED',
  BUSY: 'E_BUSY',
  INTERNAL: 'E_INTERNAL',

  // configuration: fatal only when the accelerator is forced
  ACCELERATOR_UNAVAILABLE: 'E_ACCELERATOR_UNAVAILABLE',
} as const;

export type AppErrorCode = (typeof APP_ERROR)[keyof typeof APP_ERROR];

export type FaultCategory = 'startup' | 'device' | 'session' | 'configuration';

export function faultCategory(code: AppErrorCode): FaultCategory {
  switch (code) {
    case APP_ERROR.CONFIG:
    case APP_ERROR.USER_NOT_FOUND:
    case APP_ERROR.NOT_PRIVILEGED:
    case APP_ERROR.BINARY_MISSING:
    case APP_ERROR.MODEL_LOAD:
      return 'startup';
    case APP_ERROR.DEVICE_UNAVAILABLE:
    case APP_ERROR.DEVICE_LOST:
      return 'device';
    case APP_ERROR.ACCELERATOR_UNAVAILABLE:
      return 'configuration';
    default:
      return 'session';
  }
}
