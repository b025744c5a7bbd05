import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../src/logger.js';
import type { ChatTransport, SendOptions, SentMessage } from '../src/types.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta: unknown;
}

export interface RecordingLogger extends Logger {
  entries: LogEntry[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const logger: RecordingLogger = {
    entries,
    debug: (message, meta) => entries.push({ level: 'debug', message, meta }),
    info: (message, meta) => entries.push({ level: 'info', message, meta }),
    warn: (message, meta) => entries.push({ level: 'warn', message, meta }),
    error: (message, meta) => entries.push({ level: 'error', message, meta }),
    child: () => logger,
    close: () => Promise.resolve(),
  };
  return logger;
}

export interface SentText {
  chatId: string;
  text: string;
  options: SendOptions | undefined;
}

/** In-process chat service: hands out increasing message ids and records every call. */
export class FakeTransport implements ChatTransport {
  readonly sent: SentText[] = [];
  readonly edits: Array<{ chatId: string; messageId: number; text: string }> = [];
  readonly deletes: Array<{ chatId: string; messageId: number }> = [];
  private nextMessageId: number;

  readonly sendMessage = vi.fn(async (chatId: string, text: string, options?: SendOptions): Promise<SentMessage> => {
    this.sent.push({ chatId, text, options });
    const messageId = this.nextMessageId;
    this.nextMessageId += 1;
    return { chatId, messageId };
  });

  readonly editMessageText = vi.fn(async (chatId: string, messageId: number, text: string): Promise<void> => {
    this.edits.push({ chatId, messageId, text });
  });

  readonly deleteMessage = vi.fn(async (chatId: string, messageId: number): Promise<void> => {
    this.deletes.push({ chatId, messageId });
  });

  constructor(firstMessageId = 100) {
    this.nextMessageId = firstMessageId;
  }
}

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `cmd-notify-${prefix}-`));
}

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = '2024-05-01T10:00:00.000Z'): () => Date {
  let current = Date.parse(start);
  return () => {
    const value = new Date(current);
    current += 1_000;
    return value;
  };
}
