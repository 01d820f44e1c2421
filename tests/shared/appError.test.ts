import { describe, expect, it } from 'vitest';
import { AppError, describeCause, errnoCode, isAppError, toAppErrorDto } from '../../src/shared/appError.js';
import { APP_ERROR, faultCategory } from '../../src/shared/appErrorCodes.js';
import { err, isErr, isOk, ok } from '../../src/shared/result.js';

describe('Result', () => {
  it('ok and err are told apart by the guards', () => {
    const good = ok(3);
    const bad = err({ code: APP_ERROR.INTERNAL, message: 'boom' });
    expect(isOk(good)).toBe(true);
    expect(isErr(good)).toBe(false);
    expect(isErr(bad)).toBe(true);
    if (isOk(good)) expect(good.value).toBe(3);
  });
});

describe('faultCategory', () => {
  it('groups codes by how the listener reacts', () => {
    expect(faultCategory(APP_ERROR.CONFIG)).toBe('startup');
    expect(faultCategory(APP_ERROR.MODEL_LOAD)).toBe('startup');
    expect(faultCategory(APP_ERROR.DEVICE_LOST)).toBe('device');
    expect(faultCategory(APP_ERROR.DEVICE_UNAVAILABLE)).toBe('device');
    expect(faultCategory(APP_ERROR.INJECTOR_SOCKET_MISSING)).toBe('session');
    expect(faultCategory(APP_ERROR.TIMEOUT)).toBe('session');
    expect(faultCategory(APP_ERROR.ACCELERATOR_UNAVAILABLE)).toBe('configuration');
  });
});

describe('AppError', () => {
  it('carries its dto and is recognised', () => {
    const e = new AppError({ code: APP_ERROR.DEVICE_LOST, message: 'Lost input device /dev/input/event3' });
    expect(isAppError(e)).toBe(true);
    expect(e.message).toBe('Lost input device /dev/input/event3');
    expect(toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: 'x' })).toEqual(e.dto);
  });

  it('wraps foreign errors with the fallback code and the cause', () => {
    const dto = toAppErrorDto(new Error('disk full'), { code: APP_ERROR.INTERNAL, message: 'Unexpected' });
    expect(dto).toEqual({ code: APP_ERROR.INTERNAL, message: 'Unexpected', cause: 'disk full', details: undefined });
  });

  it('describes errno errors with their code', () => {
    const e = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(describeCause(e)).toBe('no such file (ENOENT)');
    expect(errnoCode(e)).toBe('ENOENT');
    expect(describeCause('plain')).toBe('plain');
    expect(describeCause({ a: 1 })).toBe('{"a":1}');
    expect(errnoCode('nope')).toBeUndefined();
  });
});
