#!/usr/bin/env node
import { hostname, type as osType } from 'node:os';
import { join } from 'node:path';
import { config as loadEnv } from 'dotenv';
import { BotService } from './bot.js';
import { USAGE, UsageError, chooseBackend, parseCliArgs } from './cli.js';
import { DEFAULT_CONFIG_FILE, loadConfig, loadFileConfig } from './config.js';
import { describeError } from './errors.js';
import { createHistoryStore, describeBackend } from './history/factory.js';
import { createLogger } from './logger.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { RetractionProtocol } from './retraction/protocol.js';
import { CommandRunner } from './runner/commandRunner.js';
import { spawnLauncher } from './runner/launcher.js';
import { runSession } from './session.js';
import { TelegramClient } from './telegram/client.js';
import { runDirectoryKeys } from './utils.js';

const BOT_SETTLE_MS = 2_000;

async function main(): Promise<void> {
  loadEnv();

  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const fileConfig = loadFileConfig(options.configPath ?? DEFAULT_CONFIG_FILE);
  const config = loadConfig(process.env, fileConfig);

  const startedAt = new Date();
  const { day, clock } = runDirectoryKeys(startedAt);
  const logger = createLogger({
    level: config.logLevel,
    filePath: join(config.logPath, day, clock, 'app.log'),
  });

  const { backend, warnings } = chooseBackend(options, {
    postgres: config.postgres,
    storagePath: config.storagePath,
  });
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const store = createHistoryStore(backend);
  const telegram = new TelegramClient({
    apiBase: config.telegram.apiBase,
    token: config.telegram.botToken,
    pollTimeoutSeconds: config.telegram.pollTimeoutSeconds,
  });

  const deviceName = hostname();
  const dispatcher = new NotificationDispatcher({
    transport: telegram,
    store,
    logger: logger.child('dispatch'),
    defaultChatId: config.telegram.chatId,
    deviceName,
    osName: osType(),
  });

  const retraction = new RetractionProtocol({
    transport: telegram,
    store,
    logger: logger.child('clearchat'),
  });

  const bot = new BotService({
    updates: telegram,
    transport: telegram,
    store,
    retraction,
    logger: logger.child('bot'),
  });

  const runner = new CommandRunner({
    dispatcher,
    launcher: spawnLauncher,
    logger: logger.child('runner'),
    deviceName,
    logRoot: config.logPath,
    now: () => startedAt,
  });

  const shutdownSignal = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (shutdownSignal.signal.aborted) {
      return;
    }
    logger.info(`Received ${signal}, shutting down...`);
    shutdownSignal.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  logger.info(`History store: ${describeBackend(backend)}`);
  logger.info(`Device: ${deviceName}`);
  logger.info(`Alive period after command: ${config.alivePeriodSeconds}s`);

  try {
    await runSession(options.command, {
      bot,
      runner,
      logger,
      settleMs: BOT_SETTLE_MS,
      alivePeriodSeconds: config.alivePeriodSeconds,
      write: (chunk) => {
        process.stdout.write(chunk);
      },
      signal: shutdownSignal.signal,
    });
  } finally {
    try {
      await bot.stop();
      await store.close();
    } catch (error) {
      logger.error('Shutdown error', describeError(error));
    }
    logger.info('Finished');
    await logger.close();
  }
}

void main()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exit(2);
    }
    console.error(`[${new Date().toISOString()}] ERROR Fatal startup error`, error);
    process.exit(1);
  });
