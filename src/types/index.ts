import type { AppErrorDto } from '../shared/result.js';

export type KeyEventType = 'press' | 'release';

export interface KeyEvent {
  readonly type: KeyEventType;
  readonly code: number;
  /** Kernel timestamp in milliseconds. */
  readonly timestamp: number;
}

export interface AudioFormat {
  sampleRate: 16000;
  channels: 1;
  encoding: 's16le';
}

export const CAPTURE_FORMAT: AudioFormat = {
  sampleRate: 16000,
  channels: 1,
  encoding: 's16le',
};

export interface AudioArtifact {
  path: string;
  sizeBytes: number;
  format: AudioFormat;
}

export interface TranscriptSegment {
  text: string;
}

export interface InjectorTarget {
  socketPath: string;
}

/** Account the capture subprocess runs as. */
export interface TargetUser {
  name: string;
  uid: number;
  gid: number;
  home: string;
}

export type DictationState = 'idle' | 'recording' | 'transcribing' | 'injecting';

export type GestureStatus = 'recording' | 'processing' | 'completed' | 'error' | 'cancelled';

export interface GestureRecord {
  id: string;
  startedAt: Date;
  endedAt?: Date;
  status: GestureStatus;
  segments: string[];
  errorCode?: AppErrorDto['code'];
}

export type DevicePolicy = 'auto' | 'cpu' | 'accelerated';

export type ComputeDevice = 'cpu' | 'cuda';
