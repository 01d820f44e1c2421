import fs from 'fs';
import pkg from 'wavefile';
const { WaveFile } = pkg;
import type { AppConfig } from '../config/loadConfig.js';
import type { Logger } from '../log/logger.js';
import { CAPTURE_FORMAT, type ComputeDevice } from '../types/index.js';
import type { RecognitionBackend } from './RecognitionBackend.js';

type ComputeType = AppConfig['transcription']['computeType'];

export interface RecognizeOptions {
  language?: string;
  task?: 'transcribe';
  chunk_length_s?: number;
  stride_length_s?: number;
}

export interface RecognizerOutput {
  text: string;
}

export type SpeechRecognizer = (audio: Float32Array, options: RecognizeOptions) => Promise<RecognizerOutput | RecognizerOutput[]>;

export type PipelineFactory = (
  modelId: string,
  options: { device: ComputeDevice; dtype: ComputeType },
) => Promise<SpeechRecognizer>;

/** Loaded lazily so nothing pulls in the ONNX runtime until a model is needed. */
const transformersPipeline: PipelineFactory = async (modelId, { device, dtype }) => {
  const { pipeline } = await import('@huggingface/transformers');
  const transcriber = await pipeline('automatic-speech-recognition', modelId, { device, dtype });
  return (audio, options) => transcriber(audio, options);
};

/**
 * Decode a WAV file to mono 32-bit float samples at the capture rate.
 * Multi-channel input is averaged.
 */
export function decodeWav(buffer: Buffer): Float32Array {
  const wav = new WaveFile(buffer);
  wav.toBitDepth('32f');
  wav.toSampleRate(CAPTURE_FORMAT.sampleRate);

  const samples: unknown = wav.getSamples(false, Float32Array);
  if (samples instanceof Float32Array) return samples;
  if (samples instanceof Float64Array) return Float32Array.from(samples);
  if (Array.isArray(samples)) {
    const channels = samples.filter(
      (c): c is Float32Array | Float64Array => c instanceof Float32Array || c instanceof Float64Array,
    );
    if (channels.length === 0) throw new Error('WAV file has no audio channels');
    const mono = new Float32Array(channels[0].length);
    for (const channel of channels) {
      for (let i = 0; i < mono.length; i++) mono[i] += (channel[i] ?? 0) / channels.length;
    }
    return mono;
  }
  throw new Error('Unsupported WAV sample layout');
}

export interface WhisperServiceOptions {
  transcription: AppConfig['transcription'];
  log: Logger;
  createPipeline?: PipelineFactory;
}

/** In-process Whisper through the transformers.js ASR pipeline. */
export class WhisperService implements RecognitionBackend {
  readonly name = 'transformers';
  private transcriber: SpeechRecognizer | null = null;
  private createPipeline: PipelineFactory;

  constructor(private options: WhisperServiceOptions) {
    this.createPipeline = options.createPipeline ?? transformersPipeline;
  }

  get modelId(): string {
    const { modelId, modelSize } = this.options.transcription;
    return modelId ?? `Xenova/whisper-${modelSize}`;
  }

  /**
   * Load the model onto `device`. Slow (seconds, plus a download on first use);
   * done once at startup.
   */
  async load(device: ComputeDevice): Promise<void> {
    const started = Date.now();
    this.options.log.info('loading model', { model: this.modelId, device, dtype: this.options.transcription.computeType });
    this.transcriber = await this.createPipeline(this.modelId, { device, dtype: this.options.transcription.computeType });
    this.options.log.info('model loaded', { model: this.modelId, device, ms: Date.now() - started });
  }

  async recognize(audioPath: string): Promise<string[]> {
    if (!this.transcriber) throw new Error('Whisper model not loaded');

    const audio = decodeWav(await fs.promises.readFile(audioPath));
    const durationSeconds = audio.length / CAPTURE_FORMAT.sampleRate;

    const result = await this.transcriber(audio, this.recognizeOptions(durationSeconds));
    const outputs = Array.isArray(result) ? result : [result];
    return outputs.map((o) => o.text);
  }

  private recognizeOptions(durationSeconds: number): RecognizeOptions {
    const options: RecognizeOptions = {};
    // English-only checkpoints reject task/language
    if (!this.options.transcription.modelSize.endsWith('.en') || this.options.transcription.modelId) {
      options.task = 'transcribe';
      if (this.options.transcription.language) options.language = this.options.transcription.language;
    }
    // Whisper sees 30 s windows; longer holds need chunking
    if (durationSeconds > 30) {
      options.chunk_length_s = 30;
      options.stride_length_s = 5;
    }
    return options;
  }
}
