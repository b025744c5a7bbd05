import pg from 'pg';
import { PersistenceError, type PersistenceOperation } from '../errors.js';
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

export interface PostgresConnectionConfig {
  user?: string;
  password?: string;
  host?: string;
  port: number;
  database?: string;
  sslMode: 'require' | 'disable';
  connectTimeoutMs: number;
}

export interface SqlResult<Row> {
  rows: Row[];
  rowCount: number | null;
}

/** The slice of a pg client the store relies on. */
export interface SqlClient {
  query<Row>(text: string, values?: unknown[]): Promise<SqlResult<Row>>;
  release(error?: Error): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export function createPgPool(config: PostgresConnectionConfig): SqlPool {
  const pool = new pg.Pool({
    user: config.user,
    password: config.password,
    host: config.host,
    port: config.port,
    database: config.database,
    ssl: config.sslMode === 'require' ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: config.connectTimeoutMs,
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        async query<Row>(text: string, values?: unknown[]): Promise<SqlResult<Row>> {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release(error?: Error) {
          client.release(error);
        },
      };
    },
    end: () => pool.end(),
  };
}

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS notifications (
     id SERIAL PRIMARY KEY,
     chat_id TEXT NOT NULL,
     message_id INTEGER NOT NULL,
     timestamp TEXT NOT NULL,
     command TEXT NOT NULL,
     device_name TEXT,
     os_name TEXT,
     status TEXT DEFAULT 'completed',
     created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
   )`,
  'CREATE INDEX IF NOT EXISTS idx_chat_id ON notifications(chat_id)',
  'CREATE INDEX IF NOT EXISTS idx_timestamp ON notifications(timestamp DESC)',
];

export interface PostgresHistoryStoreOptions {
  now?: () => Date;
}

export class PostgresHistoryStore implements HistoryStore {
  private readonly now: () => Date;
  private schemaReady: Promise<void> | null = null;

  constructor(
    private readonly pool: SqlPool,
    options: PostgresHistoryStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async add(input: NewNotification): Promise<NotificationRecord> {
    const record = validateNewNotification(input);
    const timestamp = this.now().toISOString();

    return this.inTransaction('add', async (client) => {
      const result = await client.query<{ id: number | string }>(
        `INSERT INTO notifications (chat_id, message_id, timestamp, command, device_name, os_name, status)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING id`,
        [record.chatId, record.messageId, timestamp, record.command, record.deviceName, record.osName, record.status],
      );
      const inserted = result.rows[0];
      if (!inserted) {
        throw new Error('INSERT returned no id');
      }

      return {
        id: Number(inserted.id),
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

    return this.inTransaction('listForChat', async (client) => {
      const sql = `SELECT ${NOTIFICATION_COLUMNS}
                   FROM notifications
                   WHERE chat_id = $1
                   ORDER BY timestamp DESC, id DESC${bounded === undefined ? '' : ' LIMIT $2'}`;
      const values: unknown[] = bounded === undefined ? [chatId] : [chatId, bounded];
      const result = await client.query<NotificationRow>(sql, values);
      return result.rows.map(parseNotificationRow);
    });
  }

  async deleteForChat(chatId: string): Promise<number> {
    return this.inTransaction('deleteForChat', async (client) => {
      const result = await client.query('DELETE FROM notifications WHERE chat_id = $1', [chatId]);
      return result.rowCount ?? 0;
    });
  }

  async statistics(): Promise<HistoryStatistics> {
    return this.inTransaction('statistics', async (client) => {
      const result = await client.query<StatisticsRow>(STATISTICS_SQL);
      return parseStatisticsRow(result.rows[0]);
    });
  }

  async close(): Promise<void> {
    try {
      await this.pool.end();
    } catch (error) {
      throw new PersistenceError('close', 'Failed to close Postgres pool', error);
    }
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.runTransaction(async (client) => {
        for (const statement of SCHEMA_STATEMENTS) {
          await client.query(statement);
        }
      }).catch((error: unknown) => {
        this.schemaReady = null;
        throw new PersistenceError('init', 'Failed to create Postgres schema', error);
      });
    }
    return this.schemaReady;
  }

  private async inTransaction<T>(operation: PersistenceOperation, work: (client: SqlClient) => Promise<T>): Promise<T> {
    await this.ensureSchema();
    try {
      return await this.runTransaction(work);
    } catch (error) {
      throw new PersistenceError(operation, `Postgres ${operation} failed`, error);
    }
  }

  private async runTransaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // A client that cannot roll back is not returned to the pool.
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw error;
    } finally {
      client.release(releaseError);
    }
  }
}
