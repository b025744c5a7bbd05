import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { dirname } from 'node:path';
import { inspect } from 'node:util';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(scope: string): Logger;
  close(): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Mirror every line into this file (directories are created). */
  filePath?: string;
}

interface Sink {
  level: LogLevel;
  file: WriteStream | null;
}

function ts(): string {
  return new Date().toISOString();
}

export function createLogger(options: LoggerOptions = {}): Logger {
  let file: WriteStream | null = null;
  if (options.filePath) {
    mkdirSync(dirname(options.filePath), { recursive: true });
    file = createWriteStream(options.filePath, { flags: 'a', encoding: 'utf8' });
  }
  return new ConsoleLogger({ level: options.level ?? 'info', file }, options.scope ?? null);
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly sink: Sink,
    private readonly scope: string | null,
  ) {}

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  close(): Promise<void> {
    const file = this.sink.file;
    if (!file) {
      return Promise.resolve();
    }
    this.sink.file = null;
    return new Promise((resolve) => {
      file.end(() => resolve());
    });
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.sink.level]) {
      return;
    }

    const line = `[${ts()}] ${level.toUpperCase()} ${this.scope ? `[${this.scope}] ` : ''}${message}`;
    const print = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (meta !== undefined) {
      print(line, meta);
    } else {
      print(line);
    }

    if (this.sink.file) {
      const suffix = meta !== undefined ? ` ${inspect(meta, { depth: 4, colors: false, breakLength: Infinity })}` : '';
      this.sink.file.write(`${line}${suffix}\n`);
    }
  }
}
