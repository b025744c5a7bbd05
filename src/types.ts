export type ParseMode = 'HTML' | 'MarkdownV2';

export interface SendOptions {
  parseMode?: ParseMode;
}

export interface SentMessage {
  chatId: string;
  messageId: number;
}

/** Outbound half of the chat service: everything notification and retraction code needs. */
export interface ChatTransport {
  sendMessage(chatId: string, text: string, options?: SendOptions): Promise<SentMessage>;
  editMessageText(chatId: string, messageId: number, text: string, options?: SendOptions): Promise<void>;
  deleteMessage(chatId: string, messageId: number): Promise<void>;
}

export interface InboundMessage {
  updateId: number;
  chatId: string;
  messageId: number;
  text: string;
  fromUsername: string | null;
}

/** Inbound half: long-polled updates. */
export interface UpdateSource {
  getUpdates(offset: number | null, signal?: AbortSignal): Promise<UpdateBatch>;
}

export interface UpdateBatch {
  /** Offset to pass next time; null when nothing arrived. */
  nextOffset: number | null;
  messages: InboundMessage[];
}
