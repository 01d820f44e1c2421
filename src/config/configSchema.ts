import { z } from 'zod';

/**
 * Runtime validation of the JSON configuration file.
 *
 * Every section is optional except `targetUser`; missing keys take the defaults
 * below. Unknown keys are rejected so typos do not silently fall back to defaults.
 */

const DeviceSchema = z
  .object({
    path: z.string().min(1).default('/dev/input/event0'),
    triggerKey: z.union([z.string().min(1), z.number().int().nonnegative()]).default('KEY_RIGHTCTRL'),
    /** Size of one kernel input_event record; derived from the architecture when omitted. */
    eventSize: z.union([z.literal(16), z.literal(24)]).optional(),
    retryBaseMs: z.number().int().positive().default(500),
    retryMaxMs: z.number().int().positive().default(8000),
    maxRetries: z.number().int().nonnegative().default(10),
  })
  .strict();

const RecorderSchema = z
  .object({
    backend: z.enum(['arecord', 'ffmpeg']).default('arecord'),
    audioFile: z.string().min(1).default('/tmp/holdtalk-recording.wav'),
    privilegeDrop: z.enum(['sudo', 'setuid']).default('sudo'),
    stopSignal: z.enum(['SIGTERM', 'SIGINT']).default('SIGTERM'),
    stopTimeoutMs: z.number().int().positive().default(5000),
    display: z.string().min(1).default(':0'),
    waylandDisplay: z.string().min(1).optional(),
  })
  .strict();

const CommandBackendSchema = z
  .object({
    binary: z.string().min(1).default('whisper-cli'),
    args: z.array(z.string()).default(['-m', '{model}', '-f', '{audio}', '-nt', '-np']),
  })
  .strict();

const TranscriptionSchema = z
  .object({
    backend: z.enum(['transformers', 'command']).default('transformers'),
    modelSize: z
      .enum(['tiny', 'tiny.en', 'base', 'base.en', 'small', 'small.en', 'medium', 'medium.en', 'large-v2', 'large-v3'])
      .default('small'),
    /** Overrides the model id derived from `modelSize`. */
    modelId: z.string().min(1).optional(),
    computeType: z.enum(['fp32', 'fp16', 'q8', 'q4']).default('q8'),
    device: z.enum(['auto', 'cpu', 'accelerated']).default('auto'),
    language: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().default(120_000),
    command: CommandBackendSchema.default({}),
  })
  .strict();

const InjectorSchema = z
  .object({
    socketPath: z.string().min(1).optional(),
    keyDelayMs: z.number().int().nonnegative().default(12),
    timeoutMs: z.number().int().positive().default(30_000),
  })
  .strict();

const LogSchema = z
  .object({
    file: z.string().min(1).optional(),
  })
  .strict();

const StatusServerSchema = z
  .object({
    enabled: z.boolean().default(false),
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(3001),
  })
  .strict();

export const ConfigSchema = z
  .object({
    targetUser: z.string().min(1),
    device: DeviceSchema.default({}),
    recorder: RecorderSchema.default({}),
    transcription: TranscriptionSchema.default({}),
    injector: InjectorSchema.default({}),
    log: LogSchema.default({}),
    statusServer: StatusServerSchema.default({}),
  })
  .strict();

export type RawConfig = z.input<typeof ConfigSchema>;
export type ParsedConfig = z.output<typeof ConfigSchema>;
