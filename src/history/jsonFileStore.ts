import { randomUUID } from 'node:crypto';
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { PersistenceError, type PersistenceOperation } from '../errors.js';
import { KeyedMutex } from '../retraction/keyedMutex.js';
import { ensureDirForFile } from '../utils.js';
import {
  NOTIFICATION_STATUSES,
  compareRecency,
  validateLimit,
  validateNewNotification,
  type HistoryStatistics,
  type HistoryStore,
  type NewNotification,
  type NotificationRecord,
} from './types.js';

const recordSchema = z.object({
  id: z.number().int(),
  chatId: z.string(),
  messageId: z.number().int(),
  timestamp: z.string(),
  command: z.string(),
  deviceName: z.string().nullable(),
  osName: z.string().nullable(),
  status: z.enum(NOTIFICATION_STATUSES),
});

const documentSchema = z.object({
  version: z.literal(1),
  nextId: z.number().int().positive(),
  chats: z.record(z.array(recordSchema)),
});

// Pre-database history files: { "<chat id>": [{ message_id, timestamp, command }] }
const legacyDocumentSchema = z.record(
  z.array(
    z.object({
      message_id: z.union([z.number(), z.string()]).optional(),
      timestamp: z.string().optional(),
      command: z.string().optional(),
    }),
  ),
);

type HistoryDocument = z.infer<typeof documentSchema>;

// Shared by every handle in the process, keyed by absolute file path.
const fileLocks = new KeyedMutex();

export interface JsonFileHistoryStoreOptions {
  now?: () => Date;
}

/**
 * History kept in a single JSON file. Every write rewrites the file through a
 * uniquely named temp file and a rename. Operations on the same file are
 * serialised across all handles in the process.
 */
export class JsonFileHistoryStore implements HistoryStore {
  private readonly now: () => Date;
  private readonly lockKey: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    options: JsonFileHistoryStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.lockKey = resolve(filePath);
  }

  async add(input: NewNotification): Promise<NotificationRecord> {
    const record = validateNewNotification(input);
    return this.mutate('add', (doc) => {
      const stored: NotificationRecord = {
        id: doc.nextId,
        chatId: record.chatId,
        messageId: record.messageId,
        timestamp: this.now().toISOString(),
        command: record.command,
        deviceName: record.deviceName,
        osName: record.osName,
        status: record.status,
      };
      doc.nextId += 1;
      const list = doc.chats[record.chatId] ?? [];
      list.push(stored);
      doc.chats[record.chatId] = list;
      return { ...stored };
    });
  }

  async listForChat(chatId: string, limit?: number): Promise<NotificationRecord[]> {
    const bounded = validateLimit(limit);
    return this.read('listForChat', (doc) => {
      const sorted = (doc.chats[chatId] ?? []).map((record) => ({ ...record })).sort(compareRecency);
      return bounded === undefined ? sorted : sorted.slice(0, bounded);
    });
  }

  async deleteForChat(chatId: string): Promise<number> {
    return this.mutate('deleteForChat', (doc) => {
      const removed = doc.chats[chatId]?.length ?? 0;
      delete doc.chats[chatId];
      return removed;
    });
  }

  async statistics(): Promise<HistoryStatistics> {
    return this.read('statistics', (doc) => {
      const records = Object.values(doc.chats).flat();
      const chats = new Set(records.map((record) => record.chatId));
      const devices = new Set(records.flatMap((record) => (record.deviceName === null ? [] : [record.deviceName])));
      const systems = new Set(records.flatMap((record) => (record.osName === null ? [] : [record.osName])));
      return {
        totalNotifications: records.length,
        uniqueChats: chats.size,
        uniqueDevices: devices.size,
        uniqueOperatingSystems: systems.size,
      };
    });
  }

  async close(): Promise<void> {
    await this.queue;
  }

  private read<T>(operation: PersistenceOperation, work: (doc: HistoryDocument) => T): Promise<T> {
    return this.enqueue(operation, async () => work(await this.load()));
  }

  private mutate<T>(operation: PersistenceOperation, work: (doc: HistoryDocument) => T): Promise<T> {
    return this.enqueue(operation, async () => {
      const doc = await this.load();
      const result = work(doc);
      await this.save(doc);
      return result;
    });
  }

  private enqueue<T>(operation: PersistenceOperation, task: () => Promise<T>): Promise<T> {
    const run = fileLocks.runExclusive(this.lockKey, task).catch((error: unknown) => {
      throw new PersistenceError(operation, `JSON history ${operation} failed (${this.filePath})`, error);
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<HistoryDocument> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { version: 1, nextId: 1, chats: {} };
      }
      throw error;
    }

    const json: unknown = raw.trim().length === 0 ? {} : JSON.parse(raw);
    const current = documentSchema.safeParse(json);
    if (current.success) {
      return current.data;
    }
    const legacy = legacyDocumentSchema.safeParse(json);
    if (legacy.success) {
      return upgradeLegacyDocument(legacy.data);
    }
    throw new Error(`Unrecognised history file format: ${current.error.message}`);
  }

  private async save(doc: HistoryDocument): Promise<void> {
    ensureDirForFile(this.filePath);
    const tmpPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmpPath, `${JSON.stringify(doc, null, 2)}\n`, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }
}

function upgradeLegacyDocument(legacy: z.infer<typeof legacyDocumentSchema>): HistoryDocument {
  const doc: HistoryDocument = { version: 1, nextId: 1, chats: {} };
  for (const [chatId, entries] of Object.entries(legacy)) {
    doc.chats[chatId] = entries.map((entry) => {
      const record: NotificationRecord = {
        id: doc.nextId,
        chatId,
        // Unparseable ids become 0; retraction reports them as invalid records.
        messageId: Number.parseInt(String(entry.message_id ?? 0), 10) || 0,
        timestamp: entry.timestamp ?? new Date(0).toISOString(),
        command: entry.command ?? '',
        deviceName: null,
        osName: null,
        status: 'completed',
      };
      doc.nextId += 1;
      return record;
    });
  }
  return doc;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
