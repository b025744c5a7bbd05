import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { elideCodePoints } from '../utils.js';

export const NOTIFICATION_STATUSES = ['started', 'success', 'failed', 'completed'] as const;

export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export interface NotificationRecord {
  id: number;
  chatId: string;
  messageId: number;
  timestamp: string;
  command: string;
  deviceName: string | null;
  osName: string | null;
  status: NotificationStatus;
}

export interface NewNotification {
  chatId: string;
  messageId: number;
  command: string;
  deviceName?: string | null;
  osName?: string | null;
  status?: NotificationStatus;
}

export interface HistoryStatistics {
  totalNotifications: number;
  uniqueChats: number;
  uniqueDevices: number;
  uniqueOperatingSystems: number;
}

export interface HistoryStore {
  /** Inserts one record; the store stamps `id` and `timestamp`. */
  add(input: NewNotification): Promise<NotificationRecord>;
  /** Most recent first. Empty when the chat has no history. */
  listForChat(chatId: string, limit?: number): Promise<NotificationRecord[]>;
  /** Removes every record of the chat and returns how many went. */
  deleteForChat(chatId: string): Promise<number>;
  statistics(): Promise<HistoryStatistics>;
  close(): Promise<void>;
}

export const MAX_STORED_COMMAND_CHARS = 1000;

const newNotificationSchema = z.object({
  chatId: z.string().trim().min(1, 'chatId must not be empty'),
  messageId: z.number({ invalid_type_error: 'messageId is missing or invalid' }).int().positive(),
  command: z.string(),
  deviceName: z.string().nullish().transform((value) => value ?? null),
  osName: z.string().nullish().transform((value) => value ?? null),
  status: z.enum(NOTIFICATION_STATUSES).default('completed'),
});

export type ValidatedNotification = z.output<typeof newNotificationSchema>;

export function validateNewNotification(input: NewNotification): ValidatedNotification {
  const parsed = newNotificationSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'record';
    throw new ValidationError(field, `Invalid notification record: ${field}: ${issue?.message ?? 'invalid'}`);
  }
  return {
    ...parsed.data,
    command: clipCommand(parsed.data.command),
  };
}

export function validateLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) {
    return undefined;
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit', `limit must be a positive integer, got ${limit}`);
  }
  return limit;
}

export function parseStatus(value: string | null | undefined): NotificationStatus {
  const parsed = z.enum(NOTIFICATION_STATUSES).safeParse(value);
  return parsed.success ? parsed.data : 'completed';
}

function clipCommand(command: string): string {
  return elideCodePoints(command, MAX_STORED_COMMAND_CHARS, MAX_STORED_COMMAND_CHARS - 3);
}

/** Orders most recent first; ties fall back to the later insert. */
export function compareRecency(a: NotificationRecord, b: NotificationRecord): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? 1 : -1;
  }
  return b.id - a.id;
}
