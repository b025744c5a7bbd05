import { z } from 'zod';
import { TransportError } from '../errors.js';
import type { ChatTransport, InboundMessage, SendOptions, SentMessage, UpdateBatch, UpdateSource } from '../types.js';
import { sleep } from '../utils.js';

interface TelegramClientConfig {
  apiBase: string;
  token: string;
  requestTimeoutMs?: number;
  pollTimeoutSeconds?: number;
  pollMaxAttempts?: number;
  pollInitialBackoffMs?: number;
  pollMaxBackoffMs?: number;
}

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const messageResultSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.union([z.number(), z.string()]) }),
});

const updateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      message_id: z.number().int(),
      chat: z.object({ id: z.union([z.number(), z.string()]) }),
      text: z.string().optional(),
      from: z.object({ username: z.string().optional() }).optional(),
    })
    .optional(),
});

const updatesSchema = z.array(updateSchema);

export class TelegramClient implements ChatTransport, UpdateSource {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
  private static readonly DEFAULT_POLL_TIMEOUT_SECONDS = 30;
  private static readonly DEFAULT_POLL_MAX_ATTEMPTS = 3;
  private static readonly DEFAULT_POLL_INITIAL_BACKOFF_MS = 500;
  private static readonly DEFAULT_POLL_MAX_BACKOFF_MS = 4_000;
  private static readonly RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);

  private readonly apiBase: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;
  private readonly pollTimeoutSeconds: number;
  private readonly pollMaxAttempts: number;
  private readonly pollInitialBackoffMs: number;
  private readonly pollMaxBackoffMs: number;

  constructor(config: TelegramClientConfig) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.token = config.token;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? TelegramClient.DEFAULT_REQUEST_TIMEOUT_MS);
    this.pollTimeoutSeconds = Math.max(0, config.pollTimeoutSeconds ?? TelegramClient.DEFAULT_POLL_TIMEOUT_SECONDS);
    this.pollMaxAttempts = Math.max(1, config.pollMaxAttempts ?? TelegramClient.DEFAULT_POLL_MAX_ATTEMPTS);
    this.pollInitialBackoffMs = Math.max(0, config.pollInitialBackoffMs ?? TelegramClient.DEFAULT_POLL_INITIAL_BACKOFF_MS);
    this.pollMaxBackoffMs = Math.max(this.pollInitialBackoffMs, config.pollMaxBackoffMs ?? TelegramClient.DEFAULT_POLL_MAX_BACKOFF_MS);
  }

  async sendMessage(chatId: string, text: string, options: SendOptions = {}): Promise<SentMessage> {
    const result = await this.call('sendMessage', {
      chat_id: chatId,
      text,
      ...(options.parseMode ? { parse_mode: options.parseMode } : {}),
    });

    const parsed = messageResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new TransportError('sendMessage', `Unexpected Telegram sendMessage result: ${parsed.error.message}`);
    }
    return { chatId: String(parsed.data.chat.id), messageId: parsed.data.message_id };
  }

  async editMessageText(chatId: string, messageId: number, text: string, options: SendOptions = {}): Promise<void> {
    await this.call('editMessageText', {
      chat_id: chatId,
      message_id: messageId,
      text,
      ...(options.parseMode ? { parse_mode: options.parseMode } : {}),
    });
  }

  async deleteMessage(chatId: string, messageId: number): Promise<void> {
    await this.call('deleteMessage', { chat_id: chatId, message_id: messageId });
  }

  async getUpdates(offset: number | null, signal?: AbortSignal): Promise<UpdateBatch> {
    const body = {
      timeout: this.pollTimeoutSeconds,
      allowed_updates: ['message'],
      ...(offset === null ? {} : { offset }),
    };
    // The long poll itself may legitimately take `timeout` seconds.
    const timeoutMs = this.requestTimeoutMs + this.pollTimeoutSeconds * 1000;

    for (let attempt = 1; attempt <= this.pollMaxAttempts; attempt += 1) {
      try {
        const result = await this.call('getUpdates', body, { timeoutMs, signal });
        const parsed = updatesSchema.safeParse(result);
        if (!parsed.success) {
          throw new TransportError('getUpdates', `Unexpected Telegram getUpdates result: ${parsed.error.message}`);
        }
        return toUpdateBatch(parsed.data);
      } catch (error) {
        if (signal?.aborted || !this.isRetryable(error) || attempt >= this.pollMaxAttempts) {
          throw error;
        }
        await this.sleepBeforeRetry(attempt, signal);
      }
    }

    throw new TransportError('getUpdates', 'Telegram getUpdates failed after retries');
  }

  private async call(
    method: string,
    payload: Record<string, unknown>,
    options: { timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onOuterAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onOuterAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(`${this.apiBase}/bot${this.token}/${method}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new TransportError(method, `Telegram ${method} aborted`, { cause: error });
      }
      if (isAbortError(error)) {
        throw new TransportError(method, `Telegram ${method} timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw new TransportError(method, `Telegram ${method} network error: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onOuterAbort);
    }

    const bodyText = await response.text();
    const parsed = apiResponseSchema.safeParse(safeJsonParse(bodyText));
    if (!parsed.success) {
      throw new TransportError(method, `Telegram ${method} failed: ${response.status} ${bodyText.slice(0, 200)}`, {
        status: response.status,
      });
    }
    if (!response.ok || !parsed.data.ok) {
      throw new TransportError(
        method,
        `Telegram ${method} failed: ${parsed.data.error_code ?? response.status} ${parsed.data.description ?? ''}`.trim(),
        { status: response.status, errorCode: parsed.data.error_code ?? null },
      );
    }
    return parsed.data.result;
  }

  private isRetryable(error: unknown): boolean {
    if (!(error instanceof TransportError)) {
      return false;
    }
    if (error.status !== null) {
      return TelegramClient.RETRYABLE_STATUSES.has(error.status);
    }
    return /timed out|network/i.test(error.message);
  }

  private async sleepBeforeRetry(attempt: number, signal?: AbortSignal): Promise<void> {
    if (this.pollInitialBackoffMs === 0) {
      return;
    }
    const exponentialMs = this.pollInitialBackoffMs * 2 ** Math.max(0, attempt - 1);
    const cappedMs = Math.min(this.pollMaxBackoffMs, exponentialMs);
    const jitterMs = Math.floor(Math.random() * Math.max(1, Math.floor(cappedMs * 0.2)));
    await sleep(cappedMs + jitterMs, signal);
  }
}

function toUpdateBatch(updates: z.infer<typeof updatesSchema>): UpdateBatch {
  let nextOffset: number | null = null;
  const messages: InboundMessage[] = [];
  for (const update of updates) {
    nextOffset = Math.max(nextOffset ?? 0, update.update_id + 1);
    const message = update.message;
    if (!message || message.text === undefined) {
      continue;
    }
    messages.push({
      updateId: update.update_id,
      chatId: String(message.chat.id),
      messageId: message.message_id,
      text: message.text,
      fromUsername: message.from?.username ?? null,
    });
  }
  return { nextOffset, messages };
}

function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
