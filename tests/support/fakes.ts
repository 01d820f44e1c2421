import type { LogData, Logger, LogLevel } from '../../src/log/logger.js';
import type { ExecFn, ExecOptions, ExecResult } from '../../src/os/exec.js';

export interface LogEntry {
  level: LogLevel;
  message: string;
  data: LogData;
}

/** Logger that keeps every line in memory; scoped children share the list. */
export class MemoryLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private prefix = '',
    private fixed: LogData = {},
  ) {}

  info(message: string, data?: LogData): void {
    this.push('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.push('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.push('error', message, data);
  }

  scoped(scope: string, fixed?: LogData): Logger {
    const prefix = this.prefix ? `${this.prefix}: ${scope}` : scope;
    return new MemoryLogger(this.entries, prefix, { ...this.fixed, ...fixed });
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  private push(level: LogLevel, message: string, data?: LogData): void {
    this.entries.push({ level, message: this.prefix ? `${this.prefix}: ${message}` : message, data: { ...this.fixed, ...data } });
  }
}

export interface ExecCall {
  file: string;
  args: readonly string[];
  options: ExecOptions;
}

export function execResult(overrides: Partial<ExecResult> = {}): ExecResult {
  return { code: 0, signal: null, stdout: '', stderr: '', timedOut: false, aborted: false, ...overrides };
}

/** ExecFn that records its calls and answers with `respond`. */
export function fakeExec(respond: (call: ExecCall) => ExecResult | Promise<ExecResult> = () => execResult()): ExecFn & {
  calls: ExecCall[];
} {
  const calls: ExecCall[] = [];
  const exec = async (file: string, args: readonly string[], options: ExecOptions = {}) => {
    const call = { file, args, options };
    calls.push(call);
    return respond(call);
  };
  return Object.assign(exec, { calls });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve: (value) => resolve(value) };
}
