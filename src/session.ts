import { runLivenessTicker } from './liveness.js';
import type { Logger } from './logger.js';
import type { RunOutcome } from './runner/commandRunner.js';
import { sleep as defaultSleep, type Sleep } from './utils.js';

export interface SessionDeps {
  bot: { start(): void };
  runner: { run(command: readonly string[]): Promise<RunOutcome> };
  logger: Logger;
  settleMs: number;
  alivePeriodSeconds: number;
  write: (chunk: string) => void;
  signal: AbortSignal;
  sleep?: Sleep;
}

/**
 * Starts polling, lets the bot settle, runs the command and keeps the bot
 * alive afterwards. Returns null when a shutdown arrived before the command
 * was launched.
 */
export async function runSession(command: readonly string[], deps: SessionDeps): Promise<RunOutcome | null> {
  const sleep = deps.sleep ?? defaultSleep;

  deps.bot.start();
  await sleep(deps.settleMs, deps.signal);
  if (deps.signal.aborted) {
    deps.logger.info('Shutdown requested before the command started; not launching it');
    return null;
  }

  const outcome = await deps.runner.run(command);
  deps.logger.info(`Command ${outcome.status} after ${outcome.elapsed}`);

  await runLivenessTicker({
    seconds: deps.alivePeriodSeconds,
    write: deps.write,
    logger: deps.logger,
    sleep,
    signal: deps.signal,
  });
  return outcome;
}
