#!/usr/bin/env node

import type { Server } from 'http';
import { createStatusApp, startStatusServer, stopStatusServer } from './api/server.js';
import { parseArgs, USAGE, type CliCommand } from './cli.js';
import { keyName, resolveKeyCode } from './config/keyCodes.js';
import { defaultEventSize, loadConfig, type AppConfig } from './config/loadConfig.js';
import { consoleSink, createLogger, FileSink, type Logger, type LogSink } from './log/logger.js';
import { commandExists } from './os/exec.js';
import { buildUserEnvironment, lookupUser, resolveInjectorTarget } from './os/userSession.js';
import { createCudaProbe } from './services/AcceleratorProbe.js';
import { AudioRecorder } from './services/AudioRecorder.js';
import { DeviceReader } from './services/DeviceReader.js';
import { DeviceResolver, keyWordBits, looksLikeKeyboard, supportsKey } from './services/DeviceResolver.js';
import { DictationManager } from './services/DictationManager.js';
import { KeyListener } from './services/KeyListener.js';
import type { RecognitionBackend } from './services/RecognitionBackend.js';
import { TextInjector } from './services/TextInjector.js';
import { TranscriptionService } from './services/TranscriptionService.js';
import { WhisperCommandService } from './services/WhisperCommandService.js';
import { WhisperService } from './services/WhisperService.js';
import { APP_ERROR, faultCategory } from './shared/appErrorCodes.js';
import { err, ok, type AppErrorDto, type Result } from './shared/result.js';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;

interface Runtime {
  log: Logger;
  fileSink: FileSink | null;
}

function createRuntime(config: AppConfig | null): Runtime {
  const sinks: LogSink[] = [consoleSink];
  let fileSink: FileSink | null = null;
  if (config?.log.file) {
    fileSink = new FileSink(config.log.file);
    sinks.push(fileSink);
  }
  return { log: createLogger(sinks), fileSink };
}

function reportFault(log: Logger, stage: string, error: AppErrorDto): void {
  log.error(`${stage} failed: ${error.message}`, {
    code: error.code,
    category: faultCategory(error.code),
    cause: error.cause,
    ...error.details,
  });
}

function createBackend(config: AppConfig, log: Logger): RecognitionBackend {
  if (config.transcription.backend === 'command') {
    return new WhisperCommandService({ transcription: config.transcription, log });
  }
  return new WhisperService({ transcription: config.transcription, log });
}

function currentUid(): number | null {
  return process.getuid ? process.getuid() : null;
}

/** Binaries the listener cannot work without. */
async function checkBinaries(config: AppConfig, runningAsRoot: boolean): Promise<Result<void>> {
  const required: string[] = [config.recorder.backend];
  if (runningAsRoot && config.recorder.privilegeDrop === 'sudo') required.push('sudo');

  for (const binary of required) {
    if (!(await commandExists(binary))) {
      return err({ code: APP_ERROR.BINARY_MISSING, message: `Required binary ${binary} not found on PATH`, details: { binary } });
    }
  }
  return ok(undefined);
}

/**
 * Wire the components. `capture` adds the checks only recording needs
 * (privileges and the capture binaries).
 */
async function buildManager(
  config: AppConfig,
  log: Logger,
  capture: boolean,
): Promise<Result<{ manager: DictationManager; transcriber: TranscriptionService }>> {
  const user = await lookupUser(config.targetUser);
  if (!user.ok) return user;

  const uid = currentUid();
  const runningAsRoot = uid === 0;
  if (capture) {
    if (!runningAsRoot && uid !== user.value.uid) {
      return err({
        code: APP_ERROR.NOT_PRIVILEGED,
        message: `Must run as root to record for ${user.value.name} (running as uid ${uid})`,
      });
    }
    const binaries = await checkBinaries(config, runningAsRoot);
    if (!binaries.ok) return binaries;
  }

  const recorder = new AudioRecorder({
    recorder: config.recorder,
    env: buildUserEnvironment(user.value, config.recorder),
    runningAsRoot,
    log: log.scoped('recorder'),
  });
  const transcriber = new TranscriptionService({
    transcription: config.transcription,
    backend: createBackend(config, log.scoped('whisper')),
    probe: createCudaProbe(),
    log: log.scoped('transcription'),
  });
  const injector = new TextInjector({ injector: config.injector });
  const manager = new DictationManager({
    recorder,
    transcriber,
    injector,
    user: user.value,
    target: resolveInjectorTarget(user.value, config.injector),
    audioFile: config.recorder.audioFile,
    keyCode: config.device.keyCode,
    log: log.scoped('dictation'),
  });
  return ok({ manager, transcriber });
}

async function runListener(config: AppConfig, log: Logger): Promise<number> {
  const built = await buildManager(config, log, true);
  if (!built.ok) {
    reportFault(log, 'startup', built.error);
    return EXIT_FAILURE;
  }
  const { manager, transcriber } = built.value;

  const loaded = await transcriber.load();
  if (!loaded.ok) {
    reportFault(log, 'model load', loaded.error);
    return EXIT_FAILURE;
  }

  if (!(await commandExists('ydotool'))) {
    log.warn('ydotool not found on PATH; recognised text cannot be typed until it is installed');
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    log.info(`received ${signal}, shutting down`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  let server: Server | null = null;
  if (config.statusServer.enabled) {
    try {
      server = await startStatusServer(createStatusApp({ manager, log: log.scoped('api') }), config.statusServer, log);
    } catch (error) {
      reportFault(log, 'status server', {
        code: APP_ERROR.CONFIG,
        message: `Cannot listen on ${config.statusServer.host}:${config.statusServer.port}`,
        cause: error instanceof Error ? error.message : String(error),
      });
      return EXIT_FAILURE;
    }
  }

  const listener = new KeyListener({
    source: new DeviceReader({ keyCode: config.device.keyCode, eventSize: config.device.eventSize }),
    resolver: new DeviceResolver({ bitsPerWord: keyWordBits(config.device.eventSize) }),
    manager,
    device: config.device,
    log: log.scoped('input'),
  });

  log.info('holdtalk ready', {
    user: config.targetUser,
    key: keyName(config.device.keyCode),
    recorder: config.recorder.backend,
    backend: config.transcription.backend,
    device: loaded.value,
  });
  const result = await listener.run(controller.signal);
  if (server) await stopStatusServer(server);

  if (!result.ok) {
    reportFault(log, 'input device', result.error);
    return EXIT_FAILURE;
  }
  log.info('stopped');
  return EXIT_OK;
}

async function transcribeOnce(config: AppConfig, log: Logger, file: string, type: boolean): Promise<number> {
  const built = await buildManager(config, log, false);
  if (!built.ok) {
    reportFault(log, 'startup', built.error);
    return EXIT_FAILURE;
  }
  const { manager, transcriber } = built.value;

  const loaded = await transcriber.load();
  if (!loaded.ok) {
    reportFault(log, 'model load', loaded.error);
    return EXIT_FAILURE;
  }

  const result = await manager.transcribeFile(file, { inject: type });
  if (!result.ok) {
    reportFault(log, 'transcription', result.error);
    return EXIT_FAILURE;
  }
  for (const segment of result.value) console.log(segment.text);
  return EXIT_OK;
}

async function listDevices(config: AppConfig | null, key: string | undefined): Promise<number> {
  const keyCode = resolveKeyCode(key ?? config?.device.triggerKey ?? 'KEY_RIGHTCTRL');
  if (!keyCode.ok) {
    console.error(keyCode.error.message);
    return EXIT_FAILURE;
  }

  const bitsPerWord = keyWordBits(config?.device.eventSize ?? defaultEventSize());
  const devices = await new DeviceResolver({ bitsPerWord }).list();
  console.log(`Input devices (trigger ${keyName(keyCode.value)}):`);
  for (const device of devices) {
    if (!device.eventPath) continue;
    const marks = [
      supportsKey(device, keyCode.value, bitsPerWord) ? 'has-key' : '',
      looksLikeKeyboard(device) ? 'keyboard' : '',
    ].filter(Boolean);
    console.log(`  ${device.eventPath.padEnd(20)} ${device.name}${marks.length ? `  [${marks.join(', ')}]` : ''}`);
  }
  return EXIT_OK;
}

async function main(command: CliCommand): Promise<number> {
  if (command.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }

  const config = loadConfig(command.configPath);
  if (command.kind === 'devices') {
    return await listDevices(config.ok ? config.value : null, command.key);
  }

  if (!config.ok) {
    reportFault(createRuntime(null).log, 'configuration', config.error);
    return EXIT_FAILURE;
  }

  const { log, fileSink } = createRuntime(config.value);
  try {
    if (command.kind === 'transcribe') {
      return await transcribeOnce(config.value, log, command.file, command.type);
    }
    return await runListener(config.value, log);
  } finally {
    await fileSink?.flush();
  }
}

const parsed = parseArgs(process.argv.slice(2), process.env);
if (!parsed.ok) {
  console.error(parsed.error.message);
  console.error(USAGE);
  process.exit(EXIT_FAILURE);
}

// exit explicitly: a blocked read on the input device would keep the process alive
void main(parsed.value).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(EXIT_FAILURE);
  },
);
