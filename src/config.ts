import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import type { PostgresConnectionConfig } from './history/postgresStore.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface FileConfig {
  logPath: string;
  alivePeriodSeconds: number;
  storagePath: string | null;
}

export interface AppConfig {
  telegram: {
    botToken: string;
    chatId: string;
    apiBase: string;
    pollTimeoutSeconds: number;
  };
  postgres: PostgresConnectionConfig;
  logLevel: LogLevel;
  logPath: string;
  alivePeriodSeconds: number;
  storagePath: string | null;
}

export const DEFAULT_CONFIG_FILE = 'conf.json';
const POSTGRES_CONNECT_TIMEOUT_MS = 10_000;

const optionalEnv = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : undefined;
  });

const envSchema = z.object({
  BOT_TOKEN: z.string().trim().min(1, 'BOT_TOKEN is required'),
  CHAT_ID: z.string().trim().min(1, 'CHAT_ID is required'),
  TELEGRAM_API_BASE: z.string().url().default('https://api.telegram.org'),
  POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(50).default(30),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  user: optionalEnv,
  PGUSER: optionalEnv,
  password: optionalEnv,
  PGPASSWORD: optionalEnv,
  host: optionalEnv,
  PGHOST: optionalEnv,
  port: optionalEnv,
  PGPORT: optionalEnv,
  dbname: optionalEnv,
  PGDATABASE: optionalEnv,
  PGSSLMODE: z.enum(['require', 'disable']).default('require'),
});

const portSchema = z.coerce.number().int().min(1).max(65535);

const fileSchema = z.object({
  LOG_PATH: z.string().trim().min(1).default('logs'),
  ALIVE_PERIOD: z.coerce.number().int().min(0).default(60),
  STORAGE_PATH: z.string().trim().min(1).optional(),
});

/**
 * Reads the JSON config file. Relative paths inside it resolve against the
 * file's directory. A missing file yields the defaults.
 */
export function loadFileConfig(filePath: string = DEFAULT_CONFIG_FILE): FileConfig {
  const absolute = resolve(filePath);
  let raw: unknown = {};
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf8'));
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new Error(`Cannot read config file ${absolute}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config file ${absolute}: ${parsed.error.message}`);
  }

  const baseDir = dirname(absolute);
  return {
    logPath: resolve(baseDir, parsed.data.LOG_PATH),
    alivePeriodSeconds: parsed.data.ALIVE_PERIOD,
    storagePath: parsed.data.STORAGE_PATH ? resolve(baseDir, parsed.data.STORAGE_PATH) : null,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, file: FileConfig = loadFileConfig()): AppConfig {
  const parsed = envSchema.parse(env);

  const portRaw = parsed.port ?? parsed.PGPORT ?? '5432';
  const port = portSchema.safeParse(portRaw);
  if (!port.success) {
    throw new Error(`Postgres port must be an integer between 1 and 65535, got "${portRaw}"`);
  }

  return {
    telegram: {
      botToken: parsed.BOT_TOKEN,
      chatId: parsed.CHAT_ID,
      apiBase: parsed.TELEGRAM_API_BASE,
      pollTimeoutSeconds: parsed.POLL_TIMEOUT_SECONDS,
    },
    postgres: {
      user: parsed.user ?? parsed.PGUSER,
      password: parsed.password ?? parsed.PGPASSWORD,
      host: parsed.host ?? parsed.PGHOST,
      port: port.data,
      database: parsed.dbname ?? parsed.PGDATABASE,
      sslMode: parsed.PGSSLMODE,
      connectTimeoutMs: POSTGRES_CONNECT_TIMEOUT_MS,
    },
    logLevel: parsed.LOG_LEVEL,
    logPath: file.logPath,
    alivePeriodSeconds: file.alivePeriodSeconds,
    storagePath: file.storagePath,
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
