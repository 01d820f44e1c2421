import { resolveConfigPath, type Env } from './config/loadConfig.js';
import { APP_ERROR } from './shared/appErrorCodes.js';
import { err, ok, type Result } from './shared/result.js';

export type CliCommand =
  | { kind: 'run'; configPath: string }
  | { kind: 'transcribe'; configPath: string; file: string; type: boolean }
  | { kind: 'devices'; configPath: string; key?: string }
  | { kind: 'help' };

export const USAGE = `Usage:
  holdtalk [--config <path>]                     - Listen for the hold-to-talk key
  holdtalk transcribe <file> [--type] [--config] - Transcribe a WAV file (--type: type the text)
  holdtalk devices [KEY_NAME] [--config]         - List input devices carrying the key
  holdtalk --help                                - Show this help

Configuration: --config, else $HOLDTALK_CONFIG, else /etc/holdtalk/config.json`;

/** Positional arguments with `--config <path>` and flags removed. */
function positionals(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--config') {
      i++;
      continue;
    }
    if (args[i].startsWith('--')) continue;
    out.push(args[i]);
  }
  return out;
}

export function parseArgs(args: readonly string[], env: Env): Result<CliCommand> {
  if (args.includes('--help') || args.includes('-h')) return ok({ kind: 'help' });

  const configIdx = args.indexOf('--config');
  if (configIdx !== -1 && !args[configIdx + 1]) {
    return err({ code: APP_ERROR.CONFIG, message: '--config needs a path' });
  }
  const configPath = resolveConfigPath(args, env);

  const unknownFlag = args.find((a, i) => a.startsWith('--') && a !== '--config' && a !== '--type' && args[i - 1] !== '--config');
  if (unknownFlag) return err({ code: APP_ERROR.CONFIG, message: `Unknown option ${unknownFlag}` });

  const [command, ...rest] = positionals(args);
  switch (command) {
    case undefined:
    case 'run':
      return ok({ kind: 'run', configPath });
    case 'transcribe':
      if (!rest[0]) return err({ code: APP_ERROR.CONFIG, message: 'transcribe needs an audio file' });
      return ok({ kind: 'transcribe', configPath, file: rest[0], type: args.includes('--type') });
    case 'devices':
      return ok({ kind: 'devices', configPath, key: rest[0] });
    default:
      return err({ code: APP_ERROR.CONFIG, message: `Unknown command ${command}` });
  }
}
