import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../config/loadConfig.js';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type Result } from '../shared/result.js';
import type { InjectorTarget, TargetUser } from '../types/index.js';
import { execCommand, tail, type ExecFn } from './exec.js';

export function runtimeDirFor(user: TargetUser): string {
  return `/run/user/${user.uid}`;
}

/** Parse one `getent passwd` / `/etc/passwd` line. */
export function parsePasswdLine(line: string): TargetUser | null {
  const fields = line.trim().split(':');
  if (fields.length < 7) return null;
  const [name, , uid, gid, , home] = fields;
  if (!/^\d+$/.test(uid) || !/^\d+$/.test(gid)) return null;
  return { name, uid: Number(uid), gid: Number(gid), home };
}

/** Look the desktop user up through NSS, so LDAP/systemd-homed accounts resolve too. */
export async function lookupUser(name: string, exec: ExecFn = execCommand): Promise<Result<TargetUser>> {
  const result = await exec('getent', ['passwd', name], { timeoutMs: 5000 });
  const user = result.code === 0 ? parsePasswdLine(result.stdout.split('\n')[0] ?? '') : null;
  if (!user) {
    return err({
      code: APP_ERROR.USER_NOT_FOUND,
      message: `Configured user ${name} does not exist`,
      cause: result.spawnError ? result.spawnError.message : tail(result.stderr) || `getent exited with ${result.code}`,
    });
  }
  return ok(user);
}

/** First `wayland-N` socket in the runtime dir, else `wayland-0`. */
export function discoverWaylandDisplay(runtimeDir: string, listDir: (dir: string) => string[] = safeReadDir): string {
  const candidates = listDir(runtimeDir)
    .filter((entry) => /^wayland-\d+$/.test(entry))
    .sort();
  return candidates[0] ?? 'wayland-0';
}

function safeReadDir(dir: string): string[] {
  try {
    return fs.readdirSync(dir);
  } catch {
    return [];
  }
}

/**
 * Environment for processes that must join the user's desktop session
 * (audio routing goes through the user's PipeWire/PulseAudio instance).
 */
export function buildUserEnvironment(
  user: TargetUser,
  recorder: AppConfig['recorder'],
  base: NodeJS.ProcessEnv = process.env,
  listDir?: (dir: string) => string[],
): NodeJS.ProcessEnv {
  const runtimeDir = runtimeDirFor(user);
  return {
    ...base,
    HOME: user.home,
    USER: user.name,
    LOGNAME: user.name,
    XDG_CACHE_HOME: path.join(user.home, '.cache'),
    XDG_RUNTIME_DIR: runtimeDir,
    DISPLAY: recorder.display,
    WAYLAND_DISPLAY: recorder.waylandDisplay ?? discoverWaylandDisplay(runtimeDir, listDir),
    PULSE_SERVER: `unix:${runtimeDir}/pulse/native`,
    DBUS_SESSION_BUS_ADDRESS: `unix:path=${runtimeDir}/bus`,
  };
}

export function resolveInjectorTarget(user: TargetUser, injector: AppConfig['injector']): InjectorTarget {
  return { socketPath: injector.socketPath ?? path.join(runtimeDirFor(user), '.ydotool_socket') };
}
