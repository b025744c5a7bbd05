import type { Logger } from '../logger.js';
import { describeError } from '../errors.js';
import type { Sleep } from '../utils.js';

export type CountdownState =
  | { phase: 'counting'; remaining: number }
  | { phase: 'done' }
  | { phase: 'aborted'; remaining: number; reason: string };

export type CountdownEvent =
  | { type: 'edited' }
  | { type: 'expired' }
  | { type: 'failed'; reason: string }
  | { type: 'cancelled' };

export function startCountdown(seconds: number): CountdownState {
  return seconds > 0 ? { phase: 'counting', remaining: seconds } : { phase: 'done' };
}

export function advanceCountdown(state: CountdownState, event: CountdownEvent): CountdownState {
  if (state.phase !== 'counting') {
    return state;
  }
  switch (event.type) {
    case 'edited':
      return { phase: 'counting', remaining: state.remaining - 1 };
    case 'expired':
      return { phase: 'done' };
    case 'failed':
      return { phase: 'aborted', remaining: state.remaining, reason: event.reason };
    case 'cancelled':
      return { phase: 'aborted', remaining: state.remaining, reason: 'cancelled' };
  }
}

export function countdownText(deleted: number, remaining: number): string {
  return `🧹 Cleared ${deleted} message(s). 🧹\nThis message will self-destruct in ${remaining} seconds...`;
}

export interface CountdownRun {
  seconds: number;
  tickMs: number;
  sleep: Sleep;
  /** Shows `remaining` in the countdown message; a rejection aborts the countdown. */
  render: (remaining: number) => Promise<void>;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Drives the countdown: each tick waits, then renders one less. The last tick
 * renders nothing and ends in `done`. A failed render or an aborted signal ends
 * in `aborted`; nothing is retried.
 */
export async function runCountdown(run: CountdownRun): Promise<CountdownState> {
  let state = startCountdown(run.seconds);

  while (state.phase === 'counting') {
    await run.sleep(run.tickMs, run.signal);
    if (run.signal?.aborted) {
      state = advanceCountdown(state, { type: 'cancelled' });
      break;
    }

    const next = state.remaining - 1;
    if (next < 1) {
      state = advanceCountdown(state, { type: 'expired' });
      break;
    }

    try {
      await run.render(next);
      state = advanceCountdown(state, { type: 'edited' });
    } catch (error) {
      run.logger.error('Failed to update countdown message', describeError(error));
      state = advanceCountdown(state, { type: 'failed', reason: describeError(error) });
    }
  }

  return state;
}
