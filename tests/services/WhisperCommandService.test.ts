import { describe, expect, it } from 'vitest';
import { parseConfig, type AppConfig } from '../../src/config/loadConfig.js';
import { WhisperCommandService } from '../../src/services/WhisperCommandService.js';
import { execResult, fakeExec, MemoryLogger } from '../support/fakes.js';

function transcriptionConfig(overrides: Record<string, unknown> = {}): AppConfig['transcription'] {
  const result = parseConfig({ targetUser: 'alice', transcription: { backend: 'command', ...overrides } });
  if (!result.ok) throw new Error(result.error.message);
  return result.value.transcription;
}

describe('WhisperCommandService', () => {
  it('fills the argument template', async () => {
    const whisper = new WhisperCommandService({
      transcription: transcriptionConfig({
        modelSize: 'base.en',
        computeType: 'fp16',
        command: {
          binary: 'whisper-ctranslate2',
          args: ['{audio}', '--model', '{model}', '--device', '{device}', '--compute_type', '{computeType}', '--language', '{language}', '{unknown}'],
        },
      }),
      log: new MemoryLogger(),
      exec: fakeExec(),
      commandExists: async () => true,
    });
    await whisper.load('cuda');
    expect(whisper.buildArgs('/tmp/a.wav')).toEqual([
      '/tmp/a.wav', '--model', 'base.en', '--device', 'cuda', '--compute_type', 'fp16', '--language', 'auto', '{unknown}',
    ]);
  });

  it('uses whisper-cli by default and returns one piece per line without markers', async () => {
    const exec = fakeExec(() => execResult({ stdout: '[BLANK_AUDIO]\n turn on the lights\n\nin the kitchen\n[MUSIC]\n' }));
    const whisper = new WhisperCommandService({
      transcription: transcriptionConfig(),
      log: new MemoryLogger(),
      exec,
      commandExists: async () => true,
    });
    await whisper.load('cpu');

    const signal = new AbortController().signal;
    expect(await whisper.recognize('/tmp/a.wav', signal)).toEqual(['turn on the lights', '', 'in the kitchen', '']);
    expect(exec.calls[0].file).toBe('whisper-cli');
    expect(exec.calls[0].args).toEqual(['-m', 'small', '-f', '/tmp/a.wav', '-nt', '-np']);
    expect(exec.calls[0].options.signal).toBe(signal);
  });

  it('fails to load without the binary', async () => {
    const whisper = new WhisperCommandService({
      transcription: transcriptionConfig(),
      log: new MemoryLogger(),
      exec: fakeExec(),
      commandExists: async () => false,
    });
    await expect(whisper.load('cpu')).rejects.toMatchObject({
      dto: { code: 'E_BINARY_MISSING', message: 'Transcription binary whisper-cli not found' },
    });
  });

  it('throws on a non-zero exit with the stderr tail', async () => {
    const whisper = new WhisperCommandService({
      transcription: transcriptionConfig(),
      log: new MemoryLogger(),
      exec: fakeExec(() => execResult({ code: 3, stderr: 'error: failed to read WAV file\n' })),
      commandExists: async () => true,
    });
    await whisper.load('cpu');
    await expect(whisper.recognize('/tmp/a.wav', new AbortController().signal)).rejects.toThrow(
      'whisper-cli exited with code 3: error: failed to read WAV file',
    );
  });

  it('throws when cancelled', async () => {
    const whisper = new WhisperCommandService({
      transcription: transcriptionConfig(),
      log: new MemoryLogger(),
      exec: fakeExec(() => execResult({ code: null, signal: 'SIGKILL', aborted: true })),
      commandExists: async () => true,
    });
    await whisper.load('cpu');
    await expect(whisper.recognize('/tmp/a.wav', new AbortController().signal)).rejects.toThrow('whisper-cli was cancelled');
  });
});
