import fs from 'fs';
import { z } from 'zod';
import { APP_ERROR } from '../shared/appErrorCodes.js';
import { err, ok, type Result } from '../shared/result.js';

const KeyCodeTableSchema = z.record(z.string().regex(/^KEY_[A-Z0-9_]+$/), z.number().int().nonnegative());

const KEYCODES_URL = new URL('../../data/keycodes.json', import.meta.url);

let table: Map<string, number> | null = null;

/** `KEY_*` names from linux/input-event-codes.h, loaded once. */
export function keyCodeTable(): ReadonlyMap<string, number> {
  if (!table) {
    const raw: unknown = JSON.parse(fs.readFileSync(KEYCODES_URL, 'utf8'));
    table = new Map(Object.entries(KeyCodeTableSchema.parse(raw)));
  }
  return table;
}

/**
 * Resolve a configured trigger key. Accepts a `KEY_*` name (case-insensitive,
 * the `KEY_` prefix may be omitted) or a raw numeric code.
 */
export function resolveKeyCode(key: string | number): Result<number> {
  if (typeof key === 'number') {
    if (Number.isInteger(key) && key >= 0) return ok(key);
    return err({ code: APP_ERROR.CONFIG, message: `Invalid key code: ${key}` });
  }

  const trimmed = key.trim();
  if (/^\d+$/.test(trimmed)) return ok(Number(trimmed));

  const upper = trimmed.toUpperCase();
  const name = upper.startsWith('KEY_') ? upper : `KEY_${upper}`;
  const code = keyCodeTable().get(name);
  if (code === undefined) {
    return err({ code: APP_ERROR.CONFIG, message: `Unknown trigger key: ${key}` });
  }
  return ok(code);
}

export function keyName(code: number): string {
  for (const [name, value] of keyCodeTable()) {
    if (value === code) return name;
  }
  return `KEY_${code}`;
}
