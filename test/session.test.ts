import { describe, expect, it, vi } from 'vitest';
import { livenessFrame } from '../src/liveness.js';
import type { RunOutcome } from '../src/runner/commandRunner.js';
import { runSession } from '../src/session.js';
import { createRecordingLogger } from './helpers.js';

const outcome: RunOutcome = {
  status: 'success',
  exitCode: 0,
  elapsedSeconds: 1.5,
  elapsed: '0d00:00:01.50',
  errorSummary: null,
  logFiles: null,
  message: 'done',
  startNotification: null,
  finishNotification: null,
};

function setup() {
  const controller = new AbortController();
  const bot = { start: vi.fn() };
  const runner = { run: vi.fn(async (_command: readonly string[]) => outcome) };
  const chunks: string[] = [];
  const logger = createRecordingLogger();
  return { controller, bot, runner, chunks, logger };
}

describe('runSession', () => {
  it('settles, runs the command and keeps the bot alive afterwards', async () => {
    const { controller, bot, runner, chunks, logger } = setup();
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);

    const result = await runSession(['make', 'test'], {
      bot,
      runner,
      logger,
      settleMs: 2_000,
      alivePeriodSeconds: 1,
      write: (chunk) => chunks.push(chunk),
      signal: controller.signal,
      sleep,
    });

    expect(result).toBe(outcome);
    expect(bot.start).toHaveBeenCalledTimes(1);
    expect(runner.run).toHaveBeenCalledWith(['make', 'test']);
    expect(sleep.mock.calls[0]?.[0]).toBe(2_000);
    expect(chunks).toEqual([`\r${livenessFrame(0, 1)}`, `\r${livenessFrame(1, 1)}`, '\n']);
    expect(logger.entries).toContainEqual({ level: 'info', message: 'Command success after 0d00:00:01.50', meta: undefined });
  });

  it('does not launch the command when shutdown arrives during the settle', async () => {
    const { controller, bot, runner, chunks, logger } = setup();
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {
      controller.abort();
    });

    const result = await runSession(['make', 'test'], {
      bot,
      runner,
      logger,
      settleMs: 2_000,
      alivePeriodSeconds: 60,
      write: (chunk) => chunks.push(chunk),
      signal: controller.signal,
      sleep,
    });

    expect(result).toBeNull();
    expect(bot.start).toHaveBeenCalledTimes(1);
    expect(runner.run).not.toHaveBeenCalled();
    expect(chunks).toEqual([]);
    expect(logger.entries).toContainEqual({
      level: 'info',
      message: 'Shutdown requested before the command started; not launching it',
      meta: undefined,
    });
  });
});
