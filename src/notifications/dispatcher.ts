import type { HistoryStore, NotificationRecord, NotificationStatus } from '../history/types.js';
import type { Logger } from '../logger.js';
import type { ChatTransport, ParseMode } from '../types.js';

export interface DispatcherDeps {
  transport: ChatTransport;
  store: HistoryStore;
  logger: Logger;
  defaultChatId: string;
  deviceName: string | null;
  osName: string | null;
  parseMode?: ParseMode;
}

export interface DispatchRequest {
  chatId?: string;
  text: string;
  /** Command tokens; stored whitespace-joined. */
  command: readonly string[];
  status?: NotificationStatus;
}

/**
 * Sends a message and records it. The record is written only after the chat
 * service returned a message id; a failed send throws and writes nothing.
 */
export class NotificationDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async send(request: DispatchRequest): Promise<NotificationRecord> {
    const chatId = request.chatId ?? this.deps.defaultChatId;
    const sent = await this.deps.transport.sendMessage(chatId, request.text, {
      parseMode: this.deps.parseMode ?? 'HTML',
    });
    this.deps.logger.info(`Telegram message sent (chat=${chatId}, message=${sent.messageId})`);

    return this.deps.store.add({
      chatId,
      messageId: sent.messageId,
      command: request.command.join(' '),
      deviceName: this.deps.deviceName,
      osName: this.deps.osName,
      status: request.status ?? 'completed',
    });
  }
}
