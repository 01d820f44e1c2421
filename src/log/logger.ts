import fs from 'fs';
import path from 'path';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /**
   * Child logger whose messages are prefixed with `scope` and carry `fixed` data.
   *
   *   const log = base.scoped('recorder', { sessionId });
   *   log.info('started', { pid });
   */
  scoped(scope: string, fixed?: LogData): Logger;
}

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

const MAX_STRING_CHARS = 2000;

export const consoleSink: LogSink = {
  write(level, line) {
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  },
};

/**
 * Appends lines to a file. Writes are chained so lines keep their order;
 * a failing write is reported once on stderr and the sink disables itself.
 */
export class FileSink implements LogSink {
  private chain: Promise<void> = Promise.resolve();
  private broken = false;

  constructor(private filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  write(_level: LogLevel, line: string): void {
    if (this.broken) return;
    this.chain = this.chain
      .then(() => fs.promises.appendFile(this.filePath, line + '\n', 'utf8'))
      .catch((error: unknown) => {
        this.broken = true;
        console.error(`Log file ${this.filePath} disabled:`, error);
      });
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.chain;
  }
}

export function formatLine(level: LogLevel, message: string, data?: LogData, now: Date = new Date()): string {
  const head = `${now.toISOString()} ${level.toUpperCase()}: ${truncate(message)}`;
  if (!data || Object.keys(data).length === 0) return head;
  return `${head} ${JSON.stringify(sanitize(data, 0))}`;
}

function truncate(s: string): string {
  return s.length > MAX_STRING_CHARS ? s.slice(0, MAX_STRING_CHARS) + '...[truncated]' : s;
}

function sanitize(v: unknown, depth: number): unknown {
  if (depth > 5) return '[truncated]';
  if (v === null || v === undefined) return v;
  if (typeof v === 'string') return truncate(v);
  if (typeof v === 'number' || typeof v === 'boolean') return v;
  if (typeof v === 'bigint') return v.toString();
  if (v instanceof Error) {
    return { name: v.name, message: truncate(v.message), stack: v.stack ? truncate(v.stack) : undefined };
  }
  if (Array.isArray(v)) return v.map((x) => sanitize(x, depth + 1));
  if (typeof v === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, val] of Object.entries(v)) out[k] = sanitize(val, depth + 1);
    return out;
  }
  return String(v);
}

class SinkLogger implements Logger {
  constructor(
    private sinks: LogSink[],
    private prefix = '',
    private fixed?: LogData,
  ) {}

  info(message: string, data?: LogData): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.emit('error', message, data);
  }

  scoped(scope: string, fixed?: LogData): Logger {
    const prefix = this.prefix ? `${this.prefix}: ${scope}` : scope;
    return new SinkLogger(this.sinks, prefix, this.merge(fixed));
  }

  private merge(data?: LogData): LogData | undefined {
    if (!this.fixed && !data) return undefined;
    return { ...(this.fixed ?? {}), ...(data ?? {}) };
  }

  private emit(level: LogLevel, message: string, data?: LogData): void {
    const line = formatLine(level, this.prefix ? `${this.prefix}: ${message}` : message, this.merge(data));
    for (const sink of this.sinks) sink.write(level, line);
  }
}

export function createLogger(sinks: LogSink[] = [consoleSink]): Logger {
  return new SinkLogger(sinks);
}
