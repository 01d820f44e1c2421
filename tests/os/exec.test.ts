import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createCommandExists, execCommand, tail } from '../../src/os/exec.js';
import { errnoCode } from '../../src/shared/appError.js';

describe('createCommandExists', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'holdtalk-path-'));
    await fs.promises.writeFile(path.join(dir, 'ydotool'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.promises.writeFile(path.join(dir, 'notes.txt'), 'x', { mode: 0o644 });
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('finds executables on PATH', async () => {
    const exists = createCommandExists(['/nonexistent', dir].join(path.delimiter));
    expect(await exists('ydotool')).toBe(true);
    expect(await exists('arecord-missing')).toBe(false);
  });

  it('ignores files without the execute bit', async () => {
    const exists = createCommandExists(dir);
    expect(await exists('notes.txt')).toBe(false);
  });

  it('checks paths directly', async () => {
    const exists = createCommandExists('');
    expect(await exists(path.join(dir, 'ydotool'))).toBe(true);
    expect(await exists('ydotool')).toBe(false);
    expect(await exists('')).toBe(false);
  });
});

describe('tail', () => {
  it('keeps the end of long output', () => {
    expect(tail('  short \n')).toBe('short');
    expect(tail('abcdefghij', 4)).toBe('…ghij');
  });
});

describe('execCommand', () => {
  it('collects output and the exit code', async () => {
    const result = await execCommand('sh', ['-c', 'echo typed; echo warning >&2; exit 2']);

    expect(result).toEqual({ code: 2, signal: null, stdout: 'typed\n', stderr: 'warning\n', timedOut: false, aborted: false });
  });

  it('uses the given environment', async () => {
    const result = await execCommand('sh', ['-c', 'printf %s "$YDOTOOL_SOCKET"'], {
      env: { PATH: process.env.PATH, YDOTOOL_SOCKET: '/run/user/1000/.ydotool_socket' },
    });
    expect(result.stdout).toBe('/run/user/1000/.ydotool_socket');
  });

  it('kills a command that runs past its timeout', async () => {
    const result = await execCommand('sleep', ['30'], { timeoutMs: 50 });

    expect(result.timedOut).toBe(true);
    expect(result.aborted).toBe(false);
    expect(result.code).toBeNull();
    expect(result.signal).toBe('SIGKILL');
  });

  it('kills a command when the signal aborts', async () => {
    const controller = new AbortController();
    const running = execCommand('sleep', ['30'], { signal: controller.signal });
    setTimeout(() => controller.abort(), 20);

    const result = await running;

    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(result.signal).toBe('SIGKILL');
  });

  it('does not leave a command running for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await execCommand('sleep', ['30'], { signal: controller.signal });

    expect(result.aborted).toBe(true);
    expect(result.signal).toBe('SIGKILL');
  });

  it('reports a missing binary without rejecting', async () => {
    const result = await execCommand('/nonexistent/whisper-cli', ['-f', 'note.wav']);

    expect(result.code).toBeNull();
    expect(result.spawnError).toBeInstanceOf(Error);
    expect(errnoCode(result.spawnError)).toBe('ENOENT');
  });
});
