import { parseStatus, type HistoryStatistics, type NotificationRecord } from './types.js';

export interface NotificationRow {
  id: number | string;
  chat_id: string;
  message_id: number | string;
  timestamp: string;
  command: string;
  device_name: string | null;
  os_name: string | null;
  status: string | null;
}

/** pg hands COUNT(*) back as a string (int8); SQLite as a number. */
export interface StatisticsRow {
  total_notifications: number | string;
  unique_chats: number | string;
  unique_devices: number | string;
  unique_os: number | string;
}

export const NOTIFICATION_COLUMNS = 'id, chat_id, message_id, timestamp, command, device_name, os_name, status';

export const STATISTICS_SQL = `SELECT
  COUNT(*) AS total_notifications,
  COUNT(DISTINCT chat_id) AS unique_chats,
  COUNT(DISTINCT device_name) AS unique_devices,
  COUNT(DISTINCT os_name) AS unique_os
FROM notifications`;

export function parseNotificationRow(row: NotificationRow): NotificationRecord {
  return {
    id: Number(row.id),
    chatId: row.chat_id,
    messageId: Number(row.message_id),
    timestamp: row.timestamp,
    command: row.command,
    deviceName: row.device_name,
    osName: row.os_name,
    status: parseStatus(row.status),
  };
}

export function parseStatisticsRow(row: StatisticsRow | undefined): HistoryStatistics {
  return {
    totalNotifications: Number(row?.total_notifications ?? 0),
    uniqueChats: Number(row?.unique_chats ?? 0),
    uniqueDevices: Number(row?.unique_devices ?? 0),
    uniqueOperatingSystems: Number(row?.unique_os ?? 0),
  };
}
