import type { ComputeDevice } from '../types/index.js';

/**
 * An offline recognizer: loaded once, then called per utterance.
 * Both methods throw on failure; `TranscriptionService` turns that into results.
 */
export interface RecognitionBackend {
  readonly name: string;
  load(device: ComputeDevice): Promise<void>;
  /** Recognised text pieces, untrimmed, in order. */
  recognize(audioPath: string, signal: AbortSignal): Promise<string[]>;
}
