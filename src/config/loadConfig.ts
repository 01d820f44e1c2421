import fs from 'fs';
import os from 'os';
import { ConfigSchema, type ParsedConfig } from './configSchema.js';
import { resolveKeyCode } from './keyCodes.js';
import { describeCause, errnoCode } from '../shared/appError.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type Result } from '../shared/result.js';

export const DEFAULT_CONFIG_PATH = '/etc/holdtalk/config.json';

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

type ResolvedConfig = Omit<ParsedConfig, 'device'> & {
  device: ParsedConfig['device'] & { keyCode: number; eventSize: 16 | 24 };
};

/** Configuration as every component sees it: built once at startup, frozen. */
export type AppConfig = DeepReadonly<ResolvedConfig>;

export type Env = Record<string, string | undefined>;

export function resolveConfigPath(argv: readonly string[], env: Env): string {
  const idx = argv.indexOf('--config');
  if (idx !== -1 && argv[idx + 1]) return argv[idx + 1];
  return env.HOLDTALK_CONFIG || DEFAULT_CONFIG_PATH;
}

export function loadConfig(configPath: string, env: Env = process.env): Result<AppConfig> {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    const missing = errnoCode(error) === 'ENOENT';
    return err({
      code: APP_ERROR.CONFIG,
      message: missing
        ? `Missing configuration file ${configPath}. Copy config.example.json there, adjust it, and try again.`
        : `Cannot read configuration file ${configPath}`,
      cause: describeCause(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err({ code: APP_ERROR.CONFIG, message: `Configuration file ${configPath} is not valid JSON`, cause: describeCause(error) });
  }

  return parseConfig(raw, env);
}

/** Validate an already-parsed configuration object (env overrides applied first). */
export function parseConfig(raw: unknown, env: Env = {}): Result<AppConfig> {
  const parsed = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return err({ code: APP_ERROR.CONFIG, message: 'Invalid configuration', cause: issues.join('; ') });
  }

  const keyCode = resolveKeyCode(parsed.data.device.triggerKey);
  if (!keyCode.ok) return keyCode;

  const config: ResolvedConfig = {
    ...parsed.data,
    device: {
      ...parsed.data.device,
      keyCode: keyCode.value,
      eventSize: parsed.data.device.eventSize ?? defaultEventSize(),
    },
  };
  return ok(freezeConfig(config));
}

/** `struct input_event` is 24 bytes where `long` is 64-bit, 16 bytes otherwise. */
export function defaultEventSize(arch: string = os.arch()): 16 | 24 {
  return arch.endsWith('64') ? 24 : 16;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function override(raw: Record<string, unknown>, section: string, key: string, value: unknown): Record<string, unknown> {
  const current = raw[section] === undefined ? {} : raw[section];
  if (!isRecord(current)) return raw;
  return { ...raw, [section]: { ...current, [key]: value } };
}

function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (!isRecord(raw)) return raw;
  let out: Record<string, unknown> = raw;

  if (env.HOLDTALK_TARGET_USER) out = { ...out, targetUser: env.HOLDTALK_TARGET_USER };
  if (env.HOLDTALK_DEVICE) out = override(out, 'device', 'path', env.HOLDTALK_DEVICE);
  if (env.HOLDTALK_LOG_FILE) out = override(out, 'log', 'file', env.HOLDTALK_LOG_FILE);
  if (env.PORT && /^\d+$/.test(env.PORT)) out = override(out, 'statusServer', 'port', Number(env.PORT));

  return out;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

function freezeConfig(config: ResolvedConfig): AppConfig {
  deepFreeze(config);
  return config;
}
