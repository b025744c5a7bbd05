import type { HistoryBackend } from './history/factory.js';
import type { PostgresConnectionConfig } from './history/postgresStore.js';
import { SqliteHistoryStore } from './history/sqliteStore.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliOptions =
  | { help: true }
  | {
      help: false;
      command: string[];
      usePostgres: boolean;
      dbPath: string | null;
      jsonHistory: boolean;
      configPath: string | null;
    };

export const USAGE = [
  'Usage: cmd-notify [--use-postgres] [--db-path FILE] [--json-history] [--config FILE] --cmd COMMAND [ARGS...]',
  '',
  'Runs COMMAND, reports its start and completion to Telegram, and serves',
  '/start, /help, /clearchat and /stats while it runs.',
  '',
  'Options:',
  '  --cmd COMMAND...   command to run; every following token belongs to it',
  '  --use-postgres     record notifications in PostgreSQL (PG* variables)',
  '  --db-path FILE     SQLite database file (default notifications.db)',
  '  --json-history     record notifications in the STORAGE_PATH JSON file',
  '  --config FILE      JSON config file (default conf.json)',
  '  --help             print this message',
].join('\n');

const FLAG_ALIASES: Record<string, string> = {
  '--use_postgres': '--use-postgres',
  '--db_path': '--db-path',
  '--json_history': '--json-history',
};

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let usePostgres = false;
  let dbPath: string | null = null;
  let jsonHistory = false;
  let configPath: string | null = null;
  let command: string[] | null = null;

  for (let i = 0; i < argv.length; i += 1) {
    const raw = argv[i] ?? '';
    const { flag, inlineValue } = splitFlag(raw);
    const name = FLAG_ALIASES[flag] ?? flag;

    if (name === '--cmd') {
      if (inlineValue === '') {
        throw new UsageError('--cmd= needs a command after the equals sign');
      }
      command = inlineValue === undefined ? argv.slice(i + 1) : [inlineValue, ...argv.slice(i + 1)];
      break;
    }

    switch (name) {
      case '--help':
      case '-h':
        return { help: true };
      case '--use-postgres':
        usePostgres = true;
        continue;
      case '--json-history':
        jsonHistory = true;
        continue;
      case '--db-path':
      case '--config': {
        const value = inlineValue ?? argv[i + 1];
        if (!value || (inlineValue === undefined && value.startsWith('--'))) {
          throw new UsageError(`${name} requires a value`);
        }
        if (inlineValue === undefined) {
          i += 1;
        }
        if (name === '--db-path') {
          dbPath = value;
        } else {
          configPath = value;
        }
        continue;
      }
      default:
        throw new UsageError(`Unknown argument: ${raw}`);
    }
  }

  if (!command || command.length === 0) {
    throw new UsageError('--cmd is required and must be followed by the command to run');
  }

  return { help: false, command, usePostgres, dbPath, jsonHistory, configPath };
}

export interface BackendChoice {
  backend: HistoryBackend;
  warnings: string[];
}

export interface BackendSources {
  postgres: PostgresConnectionConfig;
  storagePath: string | null;
}

/** Picks the history backend: postgres, then an explicit db file, then JSON history, then the default db file. */
export function chooseBackend(
  options: { usePostgres: boolean; dbPath: string | null; jsonHistory: boolean },
  sources: BackendSources,
): BackendChoice {
  const warnings: string[] = [];

  if (options.usePostgres) {
    if (options.dbPath) {
      warnings.push(`--db-path ${options.dbPath} is ignored because --use-postgres is set`);
    }
    return { backend: { kind: 'postgres', connection: sources.postgres }, warnings };
  }

  if (options.dbPath) {
    return { backend: { kind: 'sqlite', path: options.dbPath }, warnings };
  }

  if (options.jsonHistory) {
    if (!sources.storagePath) {
      throw new UsageError('--json-history needs STORAGE_PATH in the config file');
    }
    return { backend: { kind: 'json', path: sources.storagePath }, warnings };
  }

  return { backend: { kind: 'sqlite', path: SqliteHistoryStore.DEFAULT_PATH }, warnings };
}

/** `--db-path=x` → `{ flag: '--db-path', inlineValue: 'x' }`. */
function splitFlag(raw: string): { flag: string; inlineValue: string | undefined } {
  const index = raw.indexOf('=');
  if (!raw.startsWith('--') || index < 0) {
    return { flag: raw, inlineValue: undefined };
  }
  return { flag: raw.slice(0, index), inlineValue: raw.slice(index + 1) };
}
