import { describe, expect, it, vi } from 'vitest';
import { PersistenceError, TransportError } from '../src/errors.js';
import { SqliteHistoryStore } from '../src/history/sqliteStore.js';
import type { HistoryStore } from '../src/history/types.js';
import { countdownText } from '../src/retraction/countdown.js';
import { DISCLAIMER_TEXT, RetractionProtocol } from '../src/retraction/protocol.js';
import { FakeTransport, createRecordingLogger, steppingClock } from './helpers.js';

async function seededStore(chatId: string, messageIds: number[]): Promise<SqliteHistoryStore> {
  const store = new SqliteHistoryStore(':memory:', { now: steppingClock() });
  for (const messageId of messageIds) {
    await store.add({ chatId, messageId, command: `job ${messageId}` });
  }
  return store;
}

function setup(store: HistoryStore) {
  const transport = new FakeTransport(500);
  const logger = createRecordingLogger();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
  const protocol = new RetractionProtocol({ transport, store, logger, sleep });
  return { transport, logger, sleep, protocol };
}

function failDeletesFor(transport: FakeTransport, failing: Set<number>): void {
  transport.deleteMessage.mockImplementation(async (chatId: string, messageId: number) => {
    if (failing.has(messageId)) {
      throw new TransportError('deleteMessage', 'Telegram deleteMessage failed: 400 Bad Request: message to delete not found', {
        status: 400,
        errorCode: 400,
      });
    }
    transport.deletes.push({ chatId, messageId });
  });
}

describe('RetractionProtocol', () => {
  it('sweeps every record, purges them all and counts only confirmed deletions', async () => {
    const store = await seededStore('42', [1, 2, 3, 4]);
    await store.add({ chatId: '7', messageId: 99, command: 'elsewhere' });
    const { transport, logger, protocol } = setup(store);
    failDeletesFor(transport, new Set([2, 4]));

    const report = await protocol.retract('42');

    expect(report).toEqual({
      chatId: '42',
      attempted: 4,
      deleted: 2,
      failures: [
        { messageId: 4, reason: 'TransportError: Telegram deleteMessage failed: 400 Bad Request: message to delete not found' },
        { messageId: 2, reason: 'TransportError: Telegram deleteMessage failed: 400 Bad Request: message to delete not found' },
      ],
      purged: 4,
      countdown: { phase: 'done' },
    });
    expect(await store.listForChat('42')).toEqual([]);
    expect(await store.listForChat('7')).toHaveLength(1);
    expect(logger.entries.filter((entry) => entry.level === 'error').map((entry) => entry.message)).toEqual([
      '❌ Failed to delete message 4 in chat 42',
      '❌ Failed to delete message 2 in chat 42',
    ]);
  });

  it('confirms with a countdown and a disclaimer, then removes both', async () => {
    const store = await seededStore('42', [10]);
    const { transport, sleep, protocol } = setup(store);

    await protocol.retract('42');

    expect(transport.sent).toEqual([
      { chatId: '42', text: countdownText(1, 5), options: undefined },
      { chatId: '42', text: DISCLAIMER_TEXT, options: { parseMode: 'HTML' } },
    ]);
    expect(transport.edits.map((edit) => [edit.messageId, edit.text])).toEqual([
      [500, countdownText(1, 4)],
      [500, countdownText(1, 3)],
      [500, countdownText(1, 2)],
      [500, countdownText(1, 1)],
    ]);
    expect(transport.deletes).toEqual([
      { chatId: '42', messageId: 10 },
      { chatId: '42', messageId: 500 },
      { chatId: '42', messageId: 501 },
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000, 1_000, 1_000, 1_000, 1_000, 10_000]);
  });

  it('handles a chat with no history', async () => {
    const store = await seededStore('42', []);
    const { transport, protocol } = setup(store);

    const report = await protocol.retract('42');

    expect(report).toMatchObject({ attempted: 0, deleted: 0, failures: [], purged: 0 });
    expect(transport.sent[0]?.text).toBe(countdownText(0, 5));
  });

  it('reports records without a usable message id as failures', async () => {
    const store: HistoryStore = {
      add: vi.fn(),
      listForChat: vi.fn(async () => [
        {
          id: 1,
          chatId: '42',
          messageId: 0,
          timestamp: '2024-01-01T00:00:00.000Z',
          command: 'legacy',
          deviceName: null,
          osName: null,
          status: 'completed' as const,
        },
      ]),
      deleteForChat: vi.fn(async () => 1),
      statistics: vi.fn(),
      close: vi.fn(async () => undefined),
    };
    const { transport, protocol } = setup(store);

    const report = await protocol.retract('42');

    expect(report.failures).toEqual([{ messageId: 0, reason: 'ValidationError: message_id is missing or invalid.' }]);
    expect(report.purged).toBe(1);
    expect(transport.deletes.some((entry) => entry.messageId === 0)).toBe(false);
  });

  it('aborts the countdown on a failed edit and still tears down', async () => {
    const store = await seededStore('42', [1]);
    const { transport, protocol } = setup(store);
    transport.editMessageText.mockRejectedValueOnce(new TransportError('editMessageText', 'Telegram editMessageText failed: 400'));

    const report = await protocol.retract('42');

    expect(report.countdown).toEqual({
      phase: 'aborted',
      remaining: 5,
      reason: 'TransportError: Telegram editMessageText failed: 400',
    });
    expect(transport.deletes.map((entry) => entry.messageId)).toEqual([1, 500, 501]);
  });

  it('skips the countdown when its message cannot be sent', async () => {
    const store = await seededStore('42', [1]);
    const { transport, protocol } = setup(store);
    transport.sendMessage.mockRejectedValueOnce(new TransportError('sendMessage', 'Telegram sendMessage failed: 429'));

    const report = await protocol.retract('42');

    expect(report.countdown).toBeNull();
    expect(transport.edits).toEqual([]);
    expect(transport.sent.map((entry) => entry.text)).toEqual([DISCLAIMER_TEXT]);
    expect(transport.deletes.map((entry) => entry.messageId)).toEqual([1, 500]);
  });

  it('swallows teardown deletion failures with a warning', async () => {
    const store = await seededStore('42', []);
    const { transport, logger, protocol } = setup(store);
    failDeletesFor(transport, new Set([500]));

    await protocol.retract('42');

    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: '❗ Failed to delete countdown message 500 in chat 42',
      meta: 'TransportError: Telegram deleteMessage failed: 400 Bad Request: message to delete not found',
    });
    expect(transport.deletes).toEqual([{ chatId: '42', messageId: 501 }]);
  });

  it('cancels the countdown when the signal aborts', async () => {
    const store = await seededStore('42', [1]);
    const { transport, sleep, protocol } = setup(store);
    const controller = new AbortController();
    controller.abort();

    const report = await protocol.retract('42', { signal: controller.signal });

    expect(report.countdown).toEqual({ phase: 'aborted', remaining: 5, reason: 'cancelled' });
    expect(transport.edits).toEqual([]);
    expect(sleep).toHaveBeenLastCalledWith(10_000, controller.signal);
    expect(transport.deletes.map((entry) => entry.messageId)).toEqual([1, 500, 501]);
  });

  it('propagates store failures before touching the chat', async () => {
    const store = await seededStore('42', [1]);
    await store.close();
    const { transport, protocol } = setup(store);

    await expect(protocol.retract('42')).rejects.toBeInstanceOf(PersistenceError);
    expect(transport.sendMessage).not.toHaveBeenCalled();
    expect(transport.deleteMessage).not.toHaveBeenCalled();
  });

  it('serialises two retractions of the same chat', async () => {
    const store = await seededStore('42', [1, 2]);
    const { transport, protocol } = setup(store);

    const [first, second] = await Promise.all([protocol.retract('42'), protocol.retract('42')]);

    expect(first.attempted).toBe(2);
    expect(second.attempted).toBe(0);
    expect(transport.deletes.filter((entry) => entry.messageId < 500).map((entry) => entry.messageId)).toEqual([2, 1]);
  });
});
