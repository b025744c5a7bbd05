import Database from 'better-sqlite3';
import { PersistenceError, type PersistenceOperation } from '../errors.js';
import { ensureDirForFile } from '../utils.js';
import {
  NOTIFICATION_COLUMNS,
  STATISTICS_SQL,
  parseNotificationRow,
  parseStatisticsRow,
  type NotificationRow,
  type StatisticsRow,
} from './rows.js';
import {
  validateLimit,
  validateNewNotification,
  type HistoryStatistics,
  type HistoryStore,
  type NewNotification,
  type NotificationRecord,
} from './types.js';

export interface SqliteHistoryStoreOptions {
  now?: () => Date;
}

export class SqliteHistoryStore implements HistoryStore {
  static readonly DEFAULT_PATH = 'notifications.db';

  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string = SqliteHistoryStore.DEFAULT_PATH, options: SqliteHistoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    try {
      if (dbPath !== ':memory:') {
        ensureDirForFile(dbPath);
      }
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.createSchema();
    } catch (error) {
      throw new PersistenceError('init', `Failed to open SQLite history at ${dbPath}`, error);
    }
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS notifications (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id TEXT NOT NULL,
        message_id INTEGER NOT NULL,
        timestamp TEXT NOT NULL,
        command TEXT NOT NULL,
        device_name TEXT,
        os_name TEXT,
        status TEXT DEFAULT 'completed',
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_chat_id ON notifications(chat_id);
      CREATE INDEX IF NOT EXISTS idx_timestamp ON notifications(timestamp DESC);
    `);
  }

  async add(input: NewNotification): Promise<NotificationRecord> {
    const record = validateNewNotification(input);
    const timestamp = this.now().toISOString();

    return this.inTransaction('add', () => {
      const result = this.db
        .prepare(
          `INSERT INTO notifications (chat_id, message_id, timestamp, command, device_name, os_name, status)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(record.chatId, record.messageId, timestamp, record.command, record.deviceName, record.osName, record.status);

      return {
        id: Number(result.lastInsertRowid),
        chatId: record.chatId,
        messageId: record.messageId,
        timestamp,
        command: record.command,
        deviceName: record.deviceName,
        osName: record.osName,
        status: record.status,
      };
    });
  }

  async listForChat(chatId: string, limit?: number): Promise<NotificationRecord[]> {
    const bounded = validateLimit(limit);

    return this.inTransaction('listForChat', () => {
      const sql = `SELECT ${NOTIFICATION_COLUMNS}
                   FROM notifications
                   WHERE chat_id = ?
                   ORDER BY timestamp DESC, id DESC${bounded === undefined ? '' : ' LIMIT ?'}`;
      const args: Array<string | number> = bounded === undefined ? [chatId] : [chatId, bounded];
      const rows = this.db.prepare<Array<string | number>, NotificationRow>(sql).all(...args);
      return rows.map(parseNotificationRow);
    });
  }

  async deleteForChat(chatId: string): Promise<number> {
    return this.inTransaction('deleteForChat', () => {
      const result = this.db.prepare('DELETE FROM notifications WHERE chat_id = ?').run(chatId);
      return result.changes;
    });
  }

  async statistics(): Promise<HistoryStatistics> {
    return this.inTransaction('statistics', () => {
      const row = this.db.prepare<[], StatisticsRow>(STATISTICS_SQL).get();
      return parseStatisticsRow(row);
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private inTransaction<T>(operation: PersistenceOperation, work: () => T): T {
    try {
      return this.db.transaction(work)();
    } catch (error) {
      throw new PersistenceError(operation, `SQLite ${operation} failed`, error);
    }
  }
}
