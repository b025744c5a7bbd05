import { ValidationError, describeError } from '../errors.js';
import type { HistoryStore } from '../history/types.js';
import type { Logger } from '../logger.js';
import type { ChatTransport } from '../types.js';
import { sleep as defaultSleep, type Sleep } from '../utils.js';
import { countdownText, runCountdown, type CountdownState } from './countdown.js';
import { KeyedMutex } from './keyedMutex.js';

export const DISCLAIMER_TEXT =
  "⚠️ <b>Telegram does not allow bots to delete your own messages.</b> ⚠️\n\n" +
  "To clear full history, long-press the chat > tap 'Delete' > tap 'Clear Chat History'.";

export interface RetractionDeps {
  transport: ChatTransport;
  store: HistoryStore;
  logger: Logger;
  sleep?: Sleep;
  locks?: KeyedMutex;
  countdownSeconds?: number;
  tickMs?: number;
  disclaimerDwellMs?: number;
}

export interface SweepFailure {
  messageId: number;
  reason: string;
}

export interface RetractionReport {
  chatId: string;
  attempted: number;
  deleted: number;
  failures: SweepFailure[];
  purged: number;
  /** Null when the countdown message itself could not be sent. */
  countdown: CountdownState | null;
}

export interface RetractOptions {
  signal?: AbortSignal;
}

/**
 * Bulk retraction of a chat's notification history.
 *
 * load → sweep → purge runs under a per-chat lock and only store failures
 * escape it. Every remote call (deletes, countdown edits, teardown) is
 * isolated: a failure is logged and the protocol moves on.
 */
export class RetractionProtocol {
  static readonly DEFAULT_COUNTDOWN_SECONDS = 5;
  static readonly DEFAULT_TICK_MS = 1_000;
  static readonly DEFAULT_DISCLAIMER_DWELL_MS = 10_000;

  private readonly sleep: Sleep;
  private readonly locks: KeyedMutex;
  private readonly countdownSeconds: number;
  private readonly tickMs: number;
  private readonly disclaimerDwellMs: number;

  constructor(private readonly deps: RetractionDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.locks = deps.locks ?? new KeyedMutex();
    this.countdownSeconds = deps.countdownSeconds ?? RetractionProtocol.DEFAULT_COUNTDOWN_SECONDS;
    this.tickMs = deps.tickMs ?? RetractionProtocol.DEFAULT_TICK_MS;
    this.disclaimerDwellMs = deps.disclaimerDwellMs ?? RetractionProtocol.DEFAULT_DISCLAIMER_DWELL_MS;
  }

  async retract(chatId: string, options: RetractOptions = {}): Promise<RetractionReport> {
    const { attempted, deleted, failures, purged } = await this.locks.runExclusive(chatId, () => this.sweepAndPurge(chatId));
    this.deps.logger.info(
      `Retraction swept chat ${chatId}: ${deleted}/${attempted} deleted, ${failures.length} failed, ${purged} record(s) purged`,
    );

    const countdown = await this.confirm(chatId, deleted, options.signal);
    await this.showDisclaimer(chatId, options.signal);

    return { chatId, attempted, deleted, failures, purged, countdown };
  }

  private async sweepAndPurge(
    chatId: string,
  ): Promise<{ attempted: number; deleted: number; failures: SweepFailure[]; purged: number }> {
    const records = await this.deps.store.listForChat(chatId);

    let deleted = 0;
    const failures: SweepFailure[] = [];
    for (const record of records) {
      try {
        if (!record.messageId) {
          throw new ValidationError('messageId', 'message_id is missing or invalid.');
        }
        await this.deps.transport.deleteMessage(chatId, record.messageId);
        deleted += 1;
      } catch (error) {
        this.deps.logger.error(`❌ Failed to delete message ${record.messageId} in chat ${chatId}`, describeError(error));
        failures.push({ messageId: record.messageId, reason: describeError(error) });
      }
    }

    const purged = await this.deps.store.deleteForChat(chatId);
    return { attempted: records.length, deleted, failures, purged };
  }

  private async confirm(chatId: string, deleted: number, signal?: AbortSignal): Promise<CountdownState | null> {
    let messageId: number;
    try {
      const sent = await this.deps.transport.sendMessage(chatId, countdownText(deleted, this.countdownSeconds));
      messageId = sent.messageId;
    } catch (error) {
      this.deps.logger.error(`Failed to send countdown message to chat ${chatId}`, describeError(error));
      return null;
    }

    const state = await runCountdown({
      seconds: this.countdownSeconds,
      tickMs: this.tickMs,
      sleep: this.sleep,
      signal,
      logger: this.deps.logger,
      render: (remaining) => this.deps.transport.editMessageText(chatId, messageId, countdownText(deleted, remaining)),
    });

    await this.deleteQuietly(chatId, messageId, 'countdown');
    return state;
  }

  private async showDisclaimer(chatId: string, signal?: AbortSignal): Promise<void> {
    let messageId: number;
    try {
      const sent = await this.deps.transport.sendMessage(chatId, DISCLAIMER_TEXT, { parseMode: 'HTML' });
      messageId = sent.messageId;
    } catch (error) {
      this.deps.logger.error(`Failed to send disclaimer to chat ${chatId}`, describeError(error));
      return;
    }

    await this.sleep(this.disclaimerDwellMs, signal);
    await this.deleteQuietly(chatId, messageId, 'disclaimer');
  }

  private async deleteQuietly(chatId: string, messageId: number, label: string): Promise<void> {
    try {
      await this.deps.transport.deleteMessage(chatId, messageId);
    } catch (error) {
      this.deps.logger.warn(`❗ Failed to delete ${label} message ${messageId} in chat ${chatId}`, describeError(error));
    }
  }
}
