import { JsonFileHistoryStore } from './jsonFileStore.js';
import { PostgresHistoryStore, createPgPool, type PostgresConnectionConfig, type SqlPool } from './postgresStore.js';
import { SqliteHistoryStore } from './sqliteStore.js';
import type { HistoryStore } from './types.js';

export type HistoryBackend =
  | { kind: 'sqlite'; path: string }
  | { kind: 'postgres'; connection: PostgresConnectionConfig }
  | { kind: 'json'; path: string };

export interface HistoryStoreFactoryDeps {
  now?: () => Date;
  createPool?: (connection: PostgresConnectionConfig) => SqlPool;
}

export function createHistoryStore(backend: HistoryBackend, deps: HistoryStoreFactoryDeps = {}): HistoryStore {
  switch (backend.kind) {
    case 'sqlite':
      return new SqliteHistoryStore(backend.path, { now: deps.now });
    case 'postgres': {
      const createPool = deps.createPool ?? createPgPool;
      return new PostgresHistoryStore(createPool(backend.connection), { now: deps.now });
    }
    case 'json':
      return new JsonFileHistoryStore(backend.path, { now: deps.now });
  }
}

export function describeBackend(backend: HistoryBackend): string {
  switch (backend.kind) {
    case 'sqlite':
      return `SQLite (${backend.path})`;
    case 'postgres':
      return `PostgreSQL (${backend.connection.host ?? 'localhost'}:${backend.connection.port}/${backend.connection.database ?? ''})`;
    case 'json':
      return `JSON file (${backend.path})`;
  }
}
