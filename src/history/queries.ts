import { elideCodePoints } from '../utils.js';
import type { HistoryStore } from './types.js';

export const COMMAND_PREVIEW_CHARS = 40;

export interface RecentCommand {
  command: string;
  deviceName: string;
}

export function elideCommand(command: string, maxChars = COMMAND_PREVIEW_CHARS): string {
  return elideCodePoints(command, maxChars);
}

export async function recentCommandsForChat(store: HistoryStore, chatId: string, limit = 5): Promise<RecentCommand[]> {
  const records = await store.listForChat(chatId, limit);
  return records.map((record) => ({
    command: elideCommand(record.command),
    deviceName: record.deviceName ?? 'unknown',
  }));
}
