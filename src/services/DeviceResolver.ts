import fs from 'fs';

export const PROC_INPUT_DEVICES = '/proc/bus/input/devices';

const KEYBOARD_NAME_HINTS = ['keyboard', 'key', 'kbd'];

export interface InputDeviceInfo {
  name: string;
  handlers: string[];
  /** `/dev/input/eventN`, or null when the device has no event handler. */
  eventPath: string | null;
  eventNumber: number;
  /** `KEY=` capability words, least significant first. */
  keyBits: bigint[];
}

/** Parse the kernel's `/proc/bus/input/devices` listing. */
export function parseInputDevices(text: string): InputDeviceInfo[] {
  const devices: InputDeviceInfo[] = [];

  for (const block of text.split(/\n\s*\n/)) {
    let name = '';
    let handlers: string[] = [];
    let keyBits: bigint[] = [];

    for (const line of block.split('\n')) {
      const nameMatch = /^N:\s*Name="(.*)"\s*$/.exec(line);
      if (nameMatch) {
        name = nameMatch[1];
        continue;
      }
      const handlerMatch = /^H:\s*Handlers=(.*)$/.exec(line);
      if (handlerMatch) {
        handlers = handlerMatch[1].trim().split(/\s+/).filter(Boolean);
        continue;
      }
      const keyMatch = /^B:\s*KEY=(.*)$/.exec(line);
      if (keyMatch) {
        keyBits = keyMatch[1]
          .trim()
          .split(/\s+/)
          .filter((w) => /^[0-9a-fA-F]+$/.test(w))
          .reverse()
          .map((w) => BigInt('0x' + w));
      }
    }

    if (!name && handlers.length === 0) continue;
    const eventHandler = handlers.find((h) => /^event\d+$/.test(h));
    devices.push({
      name,
      handlers,
      eventPath: eventHandler ? `/dev/input/${eventHandler}` : null,
      eventNumber: eventHandler ? Number(eventHandler.slice('event'.length)) : Number.POSITIVE_INFINITY,
      keyBits,
    });
  }

  return devices.sort((a, b) => a.eventNumber - b.eventNumber);
}

/** Whether the device's KEY capability bitmap has `code` set. Words are `long`-sized. */
export function supportsKey(device: InputDeviceInfo, code: number, bitsPerWord = 64): boolean {
  const word = device.keyBits[Math.floor(code / bitsPerWord)];
  if (word === undefined) return false;
  return ((word >> BigInt(code % bitsPerWord)) & 1n) === 1n;
}

/** Bits per `KEY=` word: the kernel prints `long`s, the same width as in `input_event`. */
export function keyWordBits(eventSize: 16 | 24): 32 | 64 {
  return eventSize === 16 ? 32 : 64;
}

export function looksLikeKeyboard(device: InputDeviceInfo): boolean {
  const lower = device.name.toLowerCase();
  return KEYBOARD_NAME_HINTS.some((hint) => lower.includes(hint));
}

export interface DeviceResolverOptions {
  readDevices?: () => Promise<string>;
  bitsPerWord?: number;
}

/**
 * Finds a currently valid event device for the trigger key, for when the
 * configured path went stale (devices get renumbered across reboots and replugs).
 */
export class DeviceResolver {
  private readDevices: () => Promise<string>;
  private bitsPerWord: number;

  constructor(options: DeviceResolverOptions = {}) {
    this.readDevices = options.readDevices ?? (() => fs.promises.readFile(PROC_INPUT_DEVICES, 'utf8'));
    this.bitsPerWord = options.bitsPerWord ?? 64;
  }

  async list(): Promise<InputDeviceInfo[]> {
    return parseInputDevices(await this.readDevices());
  }

  /**
   * Lowest-numbered event device reporting `keyCode`; failing that, the first
   * device with a keyboard-like name; otherwise null.
   */
  async resolve(keyCode: number): Promise<string | null> {
    const devices = (await this.list()).filter((d) => d.eventPath !== null);

    const byCapability = devices.find((d) => supportsKey(d, keyCode, this.bitsPerWord));
    if (byCapability) return byCapability.eventPath;

    const byName = devices.find(looksLikeKeyboard);
    return byName ? byName.eventPath : null;
  }
}
