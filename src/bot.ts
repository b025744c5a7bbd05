import { describeError } from './errors.js';
import { recentCommandsForChat, type RecentCommand } from './history/queries.js';
import type { HistoryStatistics, HistoryStore } from './history/types.js';
import type { Logger } from './logger.js';
import type { RetractionProtocol } from './retraction/protocol.js';
import { helpText, parseSlashCommand, type CommandName } from './router/commands.js';
import type { ChatTransport, InboundMessage, UpdateSource } from './types.js';
import { escapeHtml, sleep as defaultSleep, type Sleep } from './utils.js';

interface BotDeps {
  updates: UpdateSource;
  transport: ChatTransport;
  store: HistoryStore;
  retraction: Pick<RetractionProtocol, 'retract'>;
  logger: Logger;
  /** Pause after a failed poll before polling again. */
  pollErrorDelayMs?: number;
  sleep?: Sleep;
}

export class BotService {
  private static readonly POLL_ERROR_SUPPRESSION_WINDOW_MS = 60_000;
  private static readonly DEFAULT_POLL_ERROR_DELAY_MS = 3_000;

  private running = false;
  private offset: number | null = null;
  private readonly abort = new AbortController();
  private readonly background = new Set<Promise<void>>();
  private loop: Promise<void> | null = null;
  private lastPollErrorSignature: string | null = null;
  private lastPollErrorAtMs = 0;
  private suppressedPollErrorCount = 0;

  constructor(private readonly deps: BotDeps) {}

  /** Starts the long-poll loop in the background and returns immediately. */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.pollLoop();
    this.deps.logger.info('Bot polling started');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.abort.abort();
    await this.loop;
    await Promise.all([...this.background]);
    this.flushSuppressedPollErrors();
    this.deps.logger.info('Bot polling stopped');
  }

  private async pollLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        if (!this.running) {
          break;
        }
        this.logPollLoopError(error);
        await (this.deps.sleep ?? defaultSleep)(
          this.deps.pollErrorDelayMs ?? BotService.DEFAULT_POLL_ERROR_DELAY_MS,
          this.abort.signal,
        );
      }
    }
  }

  private async pollOnce(): Promise<void> {
    const batch = await this.deps.updates.getUpdates(this.offset, this.abort.signal);
    if (batch.nextOffset !== null) {
      this.offset = batch.nextOffset;
    }
    for (const message of batch.messages) {
      await this.handleMessage(message);
    }
  }

  async handleMessage(message: InboundMessage): Promise<void> {
    const command = parseSlashCommand(message.text);
    if (!command) {
      return;
    }

    const sender = message.fromUsername === null ? 'unknown sender' : `@${message.fromUsername}`;
    this.deps.logger.info(`Command /${command.name} from ${sender} in chat ${message.chatId} (update ${message.updateId})`);
    try {
      await this.executeCommand(command.name, message.chatId);
    } catch (error) {
      await this.reportCommandFailure(command.name, message.chatId, error);
    }
  }

  private async executeCommand(name: CommandName, chatId: string): Promise<void> {
    switch (name) {
      case 'start':
      case 'help':
        await this.deps.transport.sendMessage(chatId, helpText());
        return;
      case 'stats': {
        const [stats, recent] = await Promise.all([
          this.deps.store.statistics(),
          recentCommandsForChat(this.deps.store, chatId),
        ]);
        await this.deps.transport.sendMessage(chatId, renderStats(stats, recent), { parseMode: 'HTML' });
        return;
      }
      case 'clearchat':
        // The countdown and disclaimer take ~15 s; keep polling meanwhile.
        this.track(
          this.deps.retraction
            .retract(chatId, { signal: this.abort.signal })
            .then(() => undefined)
            .catch((error: unknown) => this.reportCommandFailure(name, chatId, error)),
        );
        return;
    }
  }

  private track(task: Promise<void>): void {
    this.background.add(task);
    void task.finally(() => this.background.delete(task));
  }

  private async reportCommandFailure(name: CommandName, chatId: string, error: unknown): Promise<void> {
    this.deps.logger.error(`/${name} failed for chat ${chatId}`, error);
    try {
      await this.deps.transport.sendMessage(chatId, `/${name} failed.`);
    } catch (replyError) {
      this.deps.logger.warn(`Failed to report /${name} failure to chat ${chatId}`, describeError(replyError));
    }
  }

  private logPollLoopError(error: unknown): void {
    const now = Date.now();
    const signature = describeError(error);
    const withinSuppressionWindow =
      this.lastPollErrorSignature === signature &&
      now - this.lastPollErrorAtMs < BotService.POLL_ERROR_SUPPRESSION_WINDOW_MS;

    if (withinSuppressionWindow) {
      this.suppressedPollErrorCount += 1;
      return;
    }

    this.flushSuppressedPollErrors();
    this.deps.logger.error('Poll loop error', signature);
    this.lastPollErrorSignature = signature;
    this.lastPollErrorAtMs = now;
  }

  private flushSuppressedPollErrors(): void {
    if (this.suppressedPollErrorCount < 1 || !this.lastPollErrorSignature) {
      this.suppressedPollErrorCount = 0;
      return;
    }

    this.deps.logger.warn(`Poll loop error repeated ${this.suppressedPollErrorCount} additional time(s)`, {
      error: this.lastPollErrorSignature,
      windowMs: BotService.POLL_ERROR_SUPPRESSION_WINDOW_MS,
    });
    this.suppressedPollErrorCount = 0;
  }
}

export function renderStats(stats: HistoryStatistics, recent: RecentCommand[]): string {
  const lines = [
    '📊 <b>Database Statistics</b> 📊',
    '',
    `Total notifications: ${stats.totalNotifications}`,
    `Unique chats: ${stats.uniqueChats}`,
    `Unique devices: ${stats.uniqueDevices}`,
    `Unique operating systems: ${stats.uniqueOperatingSystems}`,
    '',
    'Recent commands in this chat:',
  ];
  if (recent.length === 0) {
    lines.push('  (none)');
  }
  for (const entry of recent) {
    lines.push(`  • <code>${escapeHtml(entry.command)}</code> (${escapeHtml(entry.deviceName)})`);
  }
  return lines.join('\n');
}
