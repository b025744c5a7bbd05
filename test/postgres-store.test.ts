import { describe, expect, it } from 'vitest';
import { PersistenceError } from '../src/errors.js';
import { PostgresHistoryStore, type SqlClient, type SqlPool, type SqlResult } from '../src/history/postgresStore.js';

interface Handler {
  match: RegExp;
  reply: (values: unknown[] | undefined) => { rows?: unknown[]; rowCount?: number | null } | Error;
}

/** Records every statement per checked-out client and answers from canned handlers. */
class FakePool implements SqlPool {
  readonly statements: string[] = [];
  readonly releases: Array<Error | undefined> = [];
  ended = false;

  constructor(private readonly handlers: Handler[] = []) {}

  async connect(): Promise<SqlClient> {
    const pool = this;
    return {
      async query<Row>(text: string, values?: unknown[]): Promise<SqlResult<Row>> {
        const sql = text.replace(/\s+/g, ' ').trim();
        pool.statements.push(sql);
        const handler = pool.handlers.find((candidate) => candidate.match.test(sql));
        const reply = handler ? handler.reply(values) : {};
        if (reply instanceof Error) {
          throw reply;
        }
        const rows: Row[] = [];
        for (const row of reply.rows ?? []) {
          rows.push(toRow<Row>(row));
        }
        return { rows, rowCount: reply.rowCount ?? rows.length };
      },
      release(error?: Error) {
        pool.releases.push(error);
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function toRow<Row>(value: unknown): Row {
  // Canned rows stand in for whatever shape the query asked for.
  return value as Row;
}

const fixedNow = (): Date => new Date('2024-05-01T10:00:00.000Z');

describe('PostgresHistoryStore', () => {
  it('creates the schema once, then runs each operation in its own transaction', async () => {
    const pool = new FakePool([{ match: /^INSERT/, reply: () => ({ rows: [{ id: '17' }] }) }]);
    const store = new PostgresHistoryStore(pool, { now: fixedNow });

    const record = await store.add({ chatId: '42', messageId: 5, command: 'train.py', deviceName: 'node-3', osName: 'Linux', status: 'started' });
    await store.add({ chatId: '42', messageId: 6, command: 'train.py' });

    expect(record).toEqual({
      id: 17,
      chatId: '42',
      messageId: 5,
      timestamp: '2024-05-01T10:00:00.000Z',
      command: 'train.py',
      deviceName: 'node-3',
      osName: 'Linux',
      status: 'started',
    });
    expect(pool.statements.filter((sql) => sql.startsWith('CREATE TABLE'))).toHaveLength(1);
    expect(pool.statements.map((sql) => sql.split(' ')[0])).toEqual([
      'BEGIN',
      'CREATE',
      'CREATE',
      'CREATE',
      'COMMIT',
      'BEGIN',
      'INSERT',
      'COMMIT',
      'BEGIN',
      'INSERT',
      'COMMIT',
    ]);
    expect(pool.releases).toEqual([undefined, undefined, undefined]);
  });

  it('passes insert values positionally', async () => {
    const inserts: unknown[][] = [];
    const pool = new FakePool([
      {
        match: /^INSERT/,
        reply: (values) => {
          inserts.push(values ?? []);
          return { rows: [{ id: 1 }] };
        },
      },
    ]);
    const store = new PostgresHistoryStore(pool, { now: fixedNow });

    await store.add({ chatId: '42', messageId: 5, command: 'ls -la' });

    expect(inserts).toEqual([['42', 5, '2024-05-01T10:00:00.000Z', 'ls -la', null, null, 'completed']]);
  });

  it('maps rows and applies the limit as a parameter', async () => {
    const selects: unknown[][] = [];
    const pool = new FakePool([
      {
        match: /^SELECT id, chat_id/,
        reply: (values) => {
          selects.push(values ?? []);
          return {
            rows: [
              {
                id: '2',
                chat_id: '42',
                message_id: '31',
                timestamp: '2024-05-01T10:00:01.000Z',
                command: 'b',
                device_name: 'node-3',
                os_name: null,
                status: 'bogus',
              },
            ],
          };
        },
      },
    ]);
    const store = new PostgresHistoryStore(pool);

    const records = await store.listForChat('42', 5);

    expect(selects).toEqual([['42', 5]]);
    expect(pool.statements.some((sql) => sql.endsWith('ORDER BY timestamp DESC, id DESC LIMIT $2'))).toBe(true);
    expect(records).toEqual([
      {
        id: 2,
        chatId: '42',
        messageId: 31,
        timestamp: '2024-05-01T10:00:01.000Z',
        command: 'b',
        deviceName: 'node-3',
        osName: null,
        status: 'completed',
      },
    ]);
  });

  it('returns the deleted row count and parses string counts', async () => {
    const pool = new FakePool([
      { match: /^DELETE/, reply: () => ({ rowCount: 4 }) },
      {
        match: /^SELECT COUNT/,
        reply: () => ({ rows: [{ total_notifications: '9', unique_chats: '2', unique_devices: '3', unique_os: '1' }] }),
      },
    ]);
    const store = new PostgresHistoryStore(pool);

    expect(await store.deleteForChat('42')).toBe(4);
    expect(await store.statistics()).toEqual({
      totalNotifications: 9,
      uniqueChats: 2,
      uniqueDevices: 3,
      uniqueOperatingSystems: 1,
    });
  });

  it('rolls back and releases the client when a statement fails', async () => {
    const pool = new FakePool([{ match: /^DELETE/, reply: () => new Error('relation is locked') }]);
    const store = new PostgresHistoryStore(pool);

    const failure = store.deleteForChat('42');

    await expect(failure).rejects.toBeInstanceOf(PersistenceError);
    await expect(failure).rejects.toMatchObject({ operation: 'deleteForChat', message: 'Postgres deleteForChat failed' });
    expect(pool.statements.slice(-2)).toEqual(['DELETE FROM notifications WHERE chat_id = $1', 'ROLLBACK']);
    expect(pool.releases).toEqual([undefined, undefined]);
  });

  it('discards a client whose rollback fails', async () => {
    const rollbackFailure = new Error('connection reset');
    const pool = new FakePool([
      { match: /^SELECT COUNT/, reply: () => new Error('boom') },
      { match: /^ROLLBACK/, reply: () => rollbackFailure },
    ]);
    const store = new PostgresHistoryStore(pool);

    await expect(store.statistics()).rejects.toMatchObject({ operation: 'statistics' });
    expect(pool.releases.at(-1)).toBe(rollbackFailure);
  });

  it('retries schema creation after a failed first attempt', async () => {
    let failSchema = true;
    const pool = new FakePool([
      {
        match: /^CREATE TABLE/,
        reply: () => (failSchema ? new Error('database is starting up') : {}),
      },
      { match: /^DELETE/, reply: () => ({ rowCount: 0 }) },
    ]);
    const store = new PostgresHistoryStore(pool);

    await expect(store.deleteForChat('42')).rejects.toMatchObject({ operation: 'init' });
    failSchema = false;
    expect(await store.deleteForChat('42')).toBe(0);
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool();
    const store = new PostgresHistoryStore(pool);

    await store.close();

    expect(pool.ended).toBe(true);
  });
});
