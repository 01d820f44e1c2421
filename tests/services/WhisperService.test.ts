import fs from 'fs';
import os from 'os';
import path from 'path';
import pkg from 'wavefile';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseConfig, type AppConfig } from '../../src/config/loadConfig.js';
import {
  decodeWav,
  WhisperService,
  type PipelineFactory,
  type RecognizeOptions,
} from '../../src/services/WhisperService.js';
import { MemoryLogger } from '../support/fakes.js';

const { WaveFile } = pkg;

function wavBuffer(channels: number[][]): Buffer {
  const wav = new WaveFile();
  wav.fromScratch(channels.length, 16000, '16', channels.length === 1 ? channels[0] : channels);
  return Buffer.from(wav.toBuffer());
}

function transcriptionConfig(overrides: Record<string, unknown> = {}): AppConfig['transcription'] {
  const result = parseConfig({ targetUser: 'alice', transcription: overrides });
  if (!result.ok) throw new Error(result.error.message);
  return result.value.transcription;
}

describe('decodeWav', () => {
  it('decodes 16-bit mono to floats', () => {
    const samples = decodeWav(wavBuffer([new Array<number>(1600).fill(16384)]));
    expect(samples).toBeInstanceOf(Float32Array);
    expect(samples.length).toBe(1600);
    expect(samples[800]).toBeCloseTo(0.5, 2);
  });

  it('averages stereo to mono', () => {
    const left = new Array<number>(1600).fill(16384);
    const right = new Array<number>(1600).fill(0);
    const samples = decodeWav(wavBuffer([left, right]));
    expect(samples.length).toBe(1600);
    expect(samples[800]).toBeCloseTo(0.25, 2);
  });

  it('rejects data that is not a WAV file', () => {
    expect(() => decodeWav(Buffer.from('definitely not audio'))).toThrow();
  });
});

describe('WhisperService', () => {
  let dir: string;
  let audioPath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'holdtalk-whisper-'));
    audioPath = path.join(dir, 'clip.wav');
    await fs.promises.writeFile(audioPath, wavBuffer([new Array<number>(1600).fill(1000)]));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function fakePipeline(text: string | string[]) {
    const created: Array<{ modelId: string; device: string; dtype: string }> = [];
    const calls: Array<{ length: number; options: RecognizeOptions }> = [];
    const factory: PipelineFactory = async (modelId, { device, dtype }) => {
      created.push({ modelId, device, dtype });
      return async (audio, options) => {
        calls.push({ length: audio.length, options });
        return Array.isArray(text) ? text.map((t) => ({ text: t })) : { text };
      };
    };
    return { factory, created, calls };
  }

  it('loads the model derived from the size tier', async () => {
    const fake = fakePipeline('');
    const whisper = new WhisperService({
      transcription: transcriptionConfig({ modelSize: 'base', computeType: 'fp16' }),
      log: new MemoryLogger(),
      createPipeline: fake.factory,
    });
    await whisper.load('cuda');
    expect(fake.created).toEqual([{ modelId: 'Xenova/whisper-base', device: 'cuda', dtype: 'fp16' }]);
  });

  it('honours an explicit model id', () => {
    const whisper = new WhisperService({
      transcription: transcriptionConfig({ modelId: 'onnx-community/whisper-large-v3-turbo' }),
      log: new MemoryLogger(),
    });
    expect(whisper.modelId).toBe('onnx-community/whisper-large-v3-turbo');
  });

  it('recognises a file with task and language', async () => {
    const fake = fakePipeline(' turn on the lights');
    const whisper = new WhisperService({
      transcription: transcriptionConfig({ language: 'en' }),
      log: new MemoryLogger(),
      createPipeline: fake.factory,
    });
    await whisper.load('cpu');

    expect(await whisper.recognize(audioPath)).toEqual([' turn on the lights']);
    expect(fake.calls).toEqual([{ length: 1600, options: { task: 'transcribe', language: 'en' } }]);
  });

  it('passes no task to English-only checkpoints', async () => {
    const fake = fakePipeline(['one', 'two']);
    const whisper = new WhisperService({
      transcription: transcriptionConfig({ modelSize: 'tiny.en', language: 'en' }),
      log: new MemoryLogger(),
      createPipeline: fake.factory,
    });
    await whisper.load('cpu');

    expect(await whisper.recognize(audioPath)).toEqual(['one', 'two']);
    expect(fake.calls[0].options).toEqual({});
  });

  it('fails before load', async () => {
    const whisper = new WhisperService({ transcription: transcriptionConfig(), log: new MemoryLogger() });
    await expect(whisper.recognize(audioPath)).rejects.toThrow('Whisper model not loaded');
  });
});
